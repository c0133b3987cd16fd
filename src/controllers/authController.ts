import { Request, Response } from 'express';
import jwt from 'jsonwebtoken';
import { AuthRequest, actorOf } from '../middleware/auth';
import { config, getJwtSecret } from '../config';
import { logger } from '../lib/logger';
import { getServices } from '../services/registry';
import { rejectInvalid } from './helpers';

/**
 * Auth controller - staff login
 */

export const login = async (req: Request, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const { email, password } = req.body;
  const user = await getServices().users.verifyCredentials(email, password);

  if (!user) {
    logger.warn('Failed login attempt', { email });
    return res.status(401).json({ error: 'Invalid credentials' });
  }

  const token = jwt.sign(
    { id: user.id, role: user.role },
    getJwtSecret(),
    { expiresIn: config.jwtExpiresIn }
  );

  res.json({
    token,
    user: {
      id: user.id,
      name: user.name,
      email: user.email,
      role: user.role
    }
  });
};

export const me = async (req: AuthRequest, res: Response) => {
  const user = await getServices().users.getUser(actorOf(req));
  res.json({ user });
};

export const changePassword = async (req: AuthRequest, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const { currentPassword, newPassword } = req.body;
  await getServices().users.changePassword(actorOf(req), currentPassword, newPassword);
  res.json({ message: 'Password changed successfully' });
};
