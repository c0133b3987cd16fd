import { Router } from 'express';
import { body } from 'express-validator';
import { authenticate } from '../middleware/auth';
import { asyncHandler } from '../middleware/errorHandler';
import { PrinterFormat, SlipType } from '../models/Slip';
import * as slipController from '../controllers/slipController';

const router = Router();

router.use(authenticate);

const printerFormatRule = body('printerFormat')
  .optional({ values: 'null' })
  .trim()
  .toUpperCase()
  .isIn(Object.values(PrinterFormat))
  .withMessage('Invalid printer format');

const CHARGE_SLIP_TYPES = [SlipType.INVESTIGATION, SlipType.PROCEDURE, SlipType.SERVICE, SlipType.OT];

/**
 * POST /api/slips/visits/:visitId/opd
 */
router.post('/visits/:visitId/opd', [printerFormatRule], asyncHandler(slipController.generateOpdSlip));

/**
 * POST /api/slips/charges
 * Body: slipType, and visitId or admissionId
 */
router.post('/charges', [
  body('slipType').trim().toUpperCase().isIn(CHARGE_SLIP_TYPES).withMessage('Invalid slip type'),
  body('visitId').optional({ values: 'null' }).trim(),
  body('admissionId').optional({ values: 'null' }).trim(),
  printerFormatRule
], asyncHandler(slipController.generateChargeSlip));

router.post('/admissions/:admissionId/ot', [printerFormatRule], asyncHandler(slipController.generateOtSlip));

/**
 * POST /api/slips/admissions/:admissionId/discharge
 * The discharge bill as it stands now
 */
router.post('/admissions/:admissionId/discharge', [printerFormatRule], asyncHandler(slipController.generateDischargeSlip));

router.get('/patients/:patientId', asyncHandler(slipController.listPatientSlips));

router.get('/visits/:visitId', asyncHandler(slipController.listVisitSlips));

router.get('/admissions/:admissionId', asyncHandler(slipController.listAdmissionSlips));

router.post('/:slipId/reprint', asyncHandler(slipController.reprintSlip));

router.get('/:slipId', asyncHandler(slipController.getSlip));

export default router;
