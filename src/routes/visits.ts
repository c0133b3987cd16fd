import { Router } from 'express';
import { body, query } from 'express-validator';
import { authenticate } from '../middleware/auth';
import { asyncHandler } from '../middleware/errorHandler';
import { VisitStatus, VisitType } from '../models/Visit';
import { PaymentMode } from '../models/Payment';
import * as visitController from '../controllers/visitController';

const router = Router();

router.use(authenticate);

/**
 * POST /api/visits
 * Register an OPD visit; the fee follows the doctor's rate for the visit type
 */
router.post('/', [
  body('patientId').trim().notEmpty().withMessage('Patient ID is required'),
  body('doctorId').trim().notEmpty().withMessage('Doctor ID is required'),
  body('visitType').trim().toUpperCase().isIn(Object.values(VisitType)).withMessage('Invalid visit type'),
  body('paymentMode').trim().toUpperCase().isIn(Object.values(PaymentMode)).withMessage('Invalid payment mode')
], asyncHandler(visitController.createVisit));

/**
 * GET /api/visits
 * Daily OPD register
 */
router.get('/', [
  query('date').optional().isDate({ format: 'YYYY-MM-DD', strictMode: true }).withMessage('Date must be YYYY-MM-DD')
], asyncHandler(visitController.listDailyVisits));

router.get('/:visitId', asyncHandler(visitController.getVisit));

/**
 * PATCH /api/visits/:visitId/status
 */
router.patch('/:visitId/status', [
  body('status').trim().toUpperCase().isIn(Object.values(VisitStatus)).withMessage('Invalid visit status')
], asyncHandler(visitController.updateVisitStatus));

/**
 * GET /api/visits/:visitId/slip
 * Printable OPD slip with QR code
 */
router.get('/:visitId/slip', asyncHandler(visitController.getVisitSlip));

export default router;
