import { Request, Response } from 'express';
import { getServices } from '../services/registry';
import { logger } from '../lib/logger';

/**
 * Backup controller - full JSON export as a file download
 */
export const exportBackup = async (_req: Request, res: Response) => {
  const snapshot = await getServices().backup.exportSnapshot();
  const { backupName, counts } = snapshot.metadata;

  logger.info('Backup exported', { backupName, counts });

  res.setHeader('Content-Type', 'application/json');
  res.setHeader('Content-Disposition', `attachment; filename=${backupName}.json`);
  res.send(JSON.stringify(snapshot, null, 2));
};
