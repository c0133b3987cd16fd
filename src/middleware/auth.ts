import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { UserRole } from '../models/User';
import { getJwtSecret } from '../config';
import { UnauthorizedError } from '../lib/errors';

export interface AuthUser {
  id: string;
  role: UserRole;
}

export interface AuthRequest extends Request {
  user?: AuthUser;
}

const parseRole = (value: unknown): UserRole | undefined =>
  Object.values(UserRole).find((role) => role === value);

/**
 * Middleware to verify JWT token and attach user info to request
 */
export const authenticate = (req: AuthRequest, res: Response, next: NextFunction) => {
  const authHeader = req.headers.authorization;

  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    return res.status(401).json({ error: 'No token provided' });
  }

  const token = authHeader.substring(7);

  // Basic token format validation
  if (!token || token.length < 10 || token.length > 2000) {
    return res.status(401).json({ error: 'Invalid token format' });
  }

  let decoded: string | jwt.JwtPayload;
  try {
    decoded = jwt.verify(token, getJwtSecret());
  } catch (error) {
    if (error instanceof jwt.TokenExpiredError) {
      return res.status(401).json({ error: 'Token expired' });
    }
    if (error instanceof jwt.JsonWebTokenError) {
      return res.status(401).json({ error: 'Invalid token' });
    }
    return next(error);
  }

  // Validate decoded payload structure
  if (typeof decoded === 'string' || typeof decoded.id !== 'string') {
    return res.status(401).json({ error: 'Invalid token payload' });
  }
  const role = parseRole(decoded.role);
  if (!role) {
    return res.status(401).json({ error: 'Invalid user role' });
  }

  req.user = { id: decoded.id, role };
  next();
};

/**
 * Middleware to check if user has required role
 */
export const requireRole = (...roles: UserRole[]) => {
  return (req: AuthRequest, res: Response, next: NextFunction) => {
    if (!req.user) {
      return res.status(401).json({ error: 'Authentication required' });
    }

    if (!roles.includes(req.user.role)) {
      return res.status(403).json({ error: 'Insufficient permissions' });
    }
    next();
  };
};

/**
 * Role check for the requests `applies` selects; the rest pass straight through.
 */
export const requireRoleWhen = (applies: (req: AuthRequest) => boolean, ...roles: UserRole[]) => {
  const guard = requireRole(...roles);
  return (req: AuthRequest, res: Response, next: NextFunction) => {
    if (!applies(req)) {
      return next();
    }
    return guard(req, res, next);
  };
};

/** Id of the signed-in user; routes behind `authenticate` always have one. */
export const actorOf = (req: AuthRequest): string => {
  if (!req.user) {
    throw new UnauthorizedError();
  }
  return req.user.id;
};
