import { Router } from 'express';
import { query } from 'express-validator';
import { authenticate, requireRole } from '../middleware/auth';
import { asyncHandler } from '../middleware/errorHandler';
import { UserRole } from '../models/User';
import * as auditController from '../controllers/auditController';

const router = Router();

router.use(authenticate, requireRole(UserRole.ADMIN));

const limitRule = query('limit').optional().isInt({ min: 1, max: 500 }).withMessage('Limit must be between 1 and 500');

/**
 * GET /api/audit
 * Most recent entries across all records
 */
router.get('/', [limitRule], asyncHandler(auditController.listRecent));

router.get('/records/:tableName/:recordId', asyncHandler(auditController.listByRecord));

router.get('/actors/:actorId', [limitRule], asyncHandler(auditController.listByActor));

router.get('/actions/:actionType', [limitRule], asyncHandler(auditController.listByAction));

router.get('/:logId', asyncHandler(auditController.getEntry));

export default router;
