import { Request, Response } from 'express';
import { AuthRequest, actorOf } from '../middleware/auth';
import { getServices } from '../services/registry';
import { parseUserRole } from '../services/userService';
import { ForbiddenError } from '../lib/errors';
import { queryString, rejectInvalid } from './helpers';

/**
 * Admin controller - staff accounts
 */

export const createUser = async (req: Request, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const { name, email, role, password } = req.body;
  const issued = await getServices().users.createUser({ name, email, role: parseUserRole(role), password });

  res.status(201).json({ message: 'User created successfully', ...issued });
};

export const listUsers = async (req: Request, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const role = queryString(req, 'role');
  const users = await getServices().users.listUsers(role ? parseUserRole(role) : undefined);
  res.json({ users });
};

/**
 * Generates a temporary password unless one is supplied
 */
export const resetPassword = async (req: Request, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const issued = await getServices().users.resetPassword(req.params.userId, req.body.password);
  res.json({ message: 'Password reset successfully', ...issued });
};

export const setUserActive = async (req: AuthRequest, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const isActive: boolean = req.body.isActive;
  if (!isActive && req.params.userId === actorOf(req)) {
    throw new ForbiddenError('You cannot deactivate your own account');
  }
  const user = await getServices().users.setActive(req.params.userId, isActive);
  res.json({ message: isActive ? 'User activated' : 'User deactivated', user });
};
