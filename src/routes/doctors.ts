import { Router } from 'express';
import { body, query } from 'express-validator';
import { authenticate, requireRole } from '../middleware/auth';
import { asyncHandler } from '../middleware/errorHandler';
import { UserRole } from '../models/User';
import { DoctorStatus } from '../models/Doctor';
import * as doctorController from '../controllers/doctorController';

const router = Router();

router.use(authenticate);

const feeRule = (field: string) =>
  body(field).isDecimal({ decimal_digits: '0,2' }).withMessage(`${field} must be an amount with at most 2 decimals`);

/**
 * POST /api/doctors
 * Add a doctor (admin only)
 */
router.post('/', requireRole(UserRole.ADMIN), [
  body('name').trim().notEmpty().withMessage('Doctor name is required').isLength({ max: 100 }).withMessage('Name too long'),
  body('department').trim().notEmpty().withMessage('Department is required').isLength({ max: 50 }).withMessage('Department too long'),
  feeRule('newPatientFee'),
  feeRule('followupFee')
], asyncHandler(doctorController.createDoctor));

/**
 * GET /api/doctors
 * List doctors
 */
router.get('/', [
  query('department').optional().trim().isLength({ max: 50 })
], asyncHandler(doctorController.listDoctors));

/**
 * GET /api/doctors/:doctorId
 */
router.get('/:doctorId', asyncHandler(doctorController.getDoctor));

/**
 * PATCH /api/doctors/:doctorId/fees
 * Change consultation fees (admin only, audited)
 */
router.patch('/:doctorId/fees', requireRole(UserRole.ADMIN), [
  feeRule('newPatientFee').optional(),
  feeRule('followupFee').optional()
], asyncHandler(doctorController.updateFees));

/**
 * PATCH /api/doctors/:doctorId/status
 * Activate or deactivate a doctor (admin only)
 */
router.patch('/:doctorId/status', requireRole(UserRole.ADMIN), [
  body('status').trim().toUpperCase().isIn(Object.values(DoctorStatus)).withMessage('Invalid status')
], asyncHandler(doctorController.setStatus));

export default router;
