import { Request, Response } from 'express';
import { getServices } from '../services/registry';
import { AuditAction } from '../models/AuditLog';
import { ValidationError } from '../lib/errors';
import { queryInt, rejectInvalid } from './helpers';

/**
 * Audit controller - read-only views of the audit trail, newest first
 */

const parseAction = (value: string): AuditAction => {
  const action = Object.values(AuditAction).find((candidate) => candidate === value.trim().toUpperCase());
  if (!action) {
    throw new ValidationError(`Invalid audit action: ${value}`);
  }
  return action;
};

export const listByRecord = async (req: Request, res: Response) => {
  const logs = await getServices().audit.listByRecord(req.params.tableName, req.params.recordId);
  res.json({ logs });
};

export const listByActor = async (req: Request, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const logs = await getServices().audit.listByActor(req.params.actorId, queryInt(req, 'limit', 100));
  res.json({ logs });
};

export const listByAction = async (req: Request, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const logs = await getServices().audit.listByAction(parseAction(req.params.actionType), queryInt(req, 'limit', 100));
  res.json({ logs });
};

export const listRecent = async (req: Request, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const logs = await getServices().audit.listRecent(queryInt(req, 'limit', 100));
  res.json({ logs });
};

export const getEntry = async (req: Request, res: Response) => {
  const log = await getServices().audit.getById(req.params.logId);
  res.json({ log });
};
