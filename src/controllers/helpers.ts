import { Request, Response } from 'express';
import { validationResult } from 'express-validator';

/**
 * Sends the express-validator failures as 400 and reports whether it did.
 */
export const rejectInvalid = (req: Request, res: Response): boolean => {
  const errors = validationResult(req);
  if (errors.isEmpty()) {
    return false;
  }
  res.status(400).json({ errors: errors.array() });
  return true;
};

/** A single-valued query string parameter, if present. */
export const queryString = (req: Request, name: string): string | undefined => {
  const value = req.query[name];
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
};

export const queryInt = (req: Request, name: string, fallback: number): number => {
  const value = Number(queryString(req, name));
  return Number.isInteger(value) && value > 0 ? value : fallback;
};

/** An integral query parameter, if present. */
export const queryNumber = (req: Request, name: string): number | undefined => {
  const value = queryString(req, name);
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : undefined;
};
