import { Router } from 'express';
import { authenticate, requireRole } from '../middleware/auth';
import { asyncHandler } from '../middleware/errorHandler';
import { UserRole } from '../models/User';
import * as backupController from '../controllers/backupController';

const router = Router();

/**
 * GET /api/backup/export
 * Snapshot of every table (admin only)
 */
router.get('/export', authenticate, requireRole(UserRole.ADMIN), asyncHandler(backupController.exportBackup));

export default router;
