import { Router } from 'express';
import { body, query } from 'express-validator';
import { authenticate, requireRole } from '../middleware/auth';
import { asyncHandler } from '../middleware/errorHandler';
import { UserRole } from '../models/User';
import { BedStatus, WardType } from '../models/Bed';
import * as ipdController from '../controllers/ipdController';

const router = Router();

router.use(authenticate);

const wardQuery = query('wardType').optional().trim().toUpperCase().isIn(Object.values(WardType)).withMessage('Invalid ward type');
const rateRule = body('perDayCharge').isDecimal({ decimal_digits: '0,2' }).withMessage('Per day charge must be an amount with at most 2 decimals');
const dateRule = (field: string) => body(field).optional().isISO8601().withMessage(`${field} must be an ISO 8601 date`);

/**
 * POST /api/ipd/beds
 * Add a bed (admin only)
 */
router.post('/beds', requireRole(UserRole.ADMIN), [
  body('bedNumber').trim().notEmpty().withMessage('Bed number is required').isLength({ max: 20 }).withMessage('Bed number too long'),
  body('wardType').trim().toUpperCase().isIn(Object.values(WardType)).withMessage('Invalid ward type'),
  rateRule
], asyncHandler(ipdController.createBed));

router.get('/beds', [wardQuery], asyncHandler(ipdController.listBeds));

router.get('/beds/available', [wardQuery], asyncHandler(ipdController.listAvailableBeds));

/**
 * GET /api/ipd/beds/stats
 * Occupancy per ward
 */
router.get('/beds/stats', asyncHandler(ipdController.getOccupancyStats));

router.get('/beds/:bedId', asyncHandler(ipdController.getBed));

/**
 * PATCH /api/ipd/beds/:bedId/status
 * Take a bed in or out of maintenance
 */
router.patch('/beds/:bedId/status', [
  body('status').trim().toUpperCase().isIn(Object.values(BedStatus)).withMessage('Invalid bed status')
], asyncHandler(ipdController.updateBedStatus));

/**
 * PATCH /api/ipd/beds/:bedId/rate
 * Change the per-day charge (admin only, audited)
 */
router.patch('/beds/:bedId/rate', requireRole(UserRole.ADMIN), [rateRule], asyncHandler(ipdController.updateBedRate));

/**
 * POST /api/ipd/admissions
 * Admit a patient to an available bed
 */
router.post('/admissions', [
  body('patientId').trim().notEmpty().withMessage('Patient ID is required'),
  body('bedId').trim().notEmpty().withMessage('Bed ID is required'),
  body('fileCharge').isDecimal({ decimal_digits: '0,2' }).withMessage('File charge must be an amount with at most 2 decimals'),
  body('visitId').optional({ values: 'null' }).trim().notEmpty().withMessage('Visit ID cannot be empty'),
  dateRule('admissionDate')
], asyncHandler(ipdController.admitPatient));

router.get('/admissions', asyncHandler(ipdController.listActiveAdmissions));

router.get('/admissions/:admissionId', asyncHandler(ipdController.getAdmission));

/**
 * POST /api/ipd/admissions/:admissionId/change-bed
 */
router.post('/admissions/:admissionId/change-bed', [
  body('newBedId').trim().notEmpty().withMessage('New bed ID is required')
], asyncHandler(ipdController.changeBed));

/**
 * POST /api/ipd/admissions/:admissionId/discharge
 */
router.post('/admissions/:admissionId/discharge', [dateRule('dischargeDate')], asyncHandler(ipdController.dischargePatient));

/**
 * POST /api/ipd/admissions/:admissionId/transfer
 * Transfer the patient to another facility; frees the bed
 */
router.post('/admissions/:admissionId/transfer', [dateRule('transferDate')], asyncHandler(ipdController.transferOut));

router.get('/admissions/:admissionId/bed-charges', asyncHandler(ipdController.getBedCharges));

router.post('/admissions/:admissionId/bed-charges', asyncHandler(ipdController.postBedCharge));

export default router;
