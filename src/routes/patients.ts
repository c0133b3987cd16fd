import { Router } from 'express';
import { body, param, query, ValidationChain } from 'express-validator';
import { authenticate } from '../middleware/auth';
import { asyncHandler } from '../middleware/errorHandler';
import { Gender } from '../models/Patient';
import * as patientController from '../controllers/patientController';

const router = Router();

router.use(authenticate);

const mobileRule = (field: ValidationChain) =>
  field.trim().matches(/^[6-9]\d{9}$/).withMessage('Mobile number must be 10 digits starting with 6-9');

/**
 * POST /api/patients
 * Register a new patient
 */
router.post('/', [
  body('name').trim().notEmpty().withMessage('Name is required').isLength({ max: 100 }).withMessage('Name too long'),
  body('age').isInt({ min: 0, max: 150 }).withMessage('Age must be between 0 and 150').toInt(),
  body('gender').trim().toUpperCase().isIn(Object.values(Gender)).withMessage('Invalid gender'),
  body('address').trim().notEmpty().withMessage('Address is required').isLength({ max: 500 }).withMessage('Address too long'),
  mobileRule(body('mobileNumber'))
], asyncHandler(patientController.createPatient));

/**
 * GET /api/patients/search?q=
 * Search by patient id, mobile number or name
 */
router.get('/search', [
  query('q').optional().trim().isLength({ max: 100 }).withMessage('Search query too long'),
  query('limit').optional().isInt({ min: 1, max: 100 }).withMessage('Limit must be between 1 and 100')
], asyncHandler(patientController.searchPatients));

/**
 * GET /api/patients/mobile/:mobileNumber
 */
router.get('/mobile/:mobileNumber', [
  param('mobileNumber').matches(/^[6-9]\d{9}$/).withMessage('Invalid mobile number format')
], asyncHandler(patientController.getPatientByMobile));

/**
 * GET /api/patients/:patientId
 */
router.get('/:patientId', asyncHandler(patientController.getPatient));

/**
 * PUT /api/patients/:patientId
 * Update patient details
 */
router.put('/:patientId', [
  body('name').optional().trim().notEmpty().withMessage('Name cannot be empty').isLength({ max: 100 }).withMessage('Name too long'),
  body('age').optional().isInt({ min: 0, max: 150 }).withMessage('Age must be between 0 and 150').toInt(),
  body('gender').optional().trim().toUpperCase().isIn(Object.values(Gender)).withMessage('Invalid gender'),
  body('address').optional().trim().notEmpty().withMessage('Address cannot be empty'),
  mobileRule(body('mobileNumber').optional())
], asyncHandler(patientController.updatePatient));

/**
 * GET /api/patients/:patientId/history
 * Visits and admissions of a patient
 */
router.get('/:patientId/history', asyncHandler(patientController.getPatientHistory));

export default router;
