import { Router } from 'express';
import { body } from 'express-validator';
import { authenticate } from '../middleware/auth';
import { asyncHandler } from '../middleware/errorHandler';
import * as dischargeController from '../controllers/dischargeController';

const router = Router();

router.use(authenticate);

/**
 * GET /api/discharge/:admissionId/bill
 * Itemized bill with advances and the balance due
 */
router.get('/:admissionId/bill', asyncHandler(dischargeController.getDischargeBill));

router.get('/:admissionId/pending', asyncHandler(dischargeController.getPendingAmount));

/**
 * POST /api/discharge/:admissionId
 * Close the admission and free its bed
 */
router.post('/:admissionId', [
  body('dischargeDate').optional().isISO8601().withMessage('Discharge date must be an ISO 8601 date')
], asyncHandler(dischargeController.processDischarge));

export default router;
