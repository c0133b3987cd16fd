import { Router } from 'express';
import { body } from 'express-validator';
import { authenticate } from '../middleware/auth';
import { asyncHandler } from '../middleware/errorHandler';
import * as otController from '../controllers/otController';

const router = Router();

router.use(authenticate);

const charge = (field: string) =>
  body(field).isDecimal({ decimal_digits: '0,2' }).withMessage(`${field} must be an amount with at most 2 decimals`);

/**
 * POST /api/ot/admissions/:admissionId/procedures
 */
router.post('/admissions/:admissionId/procedures', [
  body('operationName').trim().notEmpty().withMessage('Operation name is required').isLength({ max: 100 }).withMessage('Operation name too long'),
  body('operationDate').isISO8601().withMessage('Operation date must be an ISO 8601 date'),
  body('durationMinutes').isInt({ min: 1 }).withMessage('Duration must be a positive number of minutes').toInt(),
  body('surgeonName').trim().notEmpty().withMessage('Surgeon name is required').isLength({ max: 100 }).withMessage('Surgeon name too long'),
  body('anesthesiaType').optional({ values: 'null' }).trim().isLength({ max: 50 }).withMessage('Anesthesia type too long'),
  body('notes').optional({ values: 'null' }).trim().isLength({ max: 1000 }).withMessage('Notes too long')
], asyncHandler(otController.createProcedure));

router.get('/admissions/:admissionId/procedures', asyncHandler(otController.listProcedures));

router.get('/procedures/:otId', asyncHandler(otController.getProcedure));

/**
 * POST /api/ot/admissions/:admissionId/procedures/:otId/charges
 * Surgeon, anesthesia, facility and optional assistant fees as OT charge lines
 */
router.post('/admissions/:admissionId/procedures/:otId/charges', [
  charge('surgeonCharge'),
  charge('anesthesiaCharge'),
  charge('facilityCharge'),
  charge('assistantCharge').optional({ values: 'null' })
], asyncHandler(otController.addOtCharges));

router.get('/admissions/:admissionId/charges', asyncHandler(otController.listOtCharges));

export default router;
