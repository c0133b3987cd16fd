import { Router } from 'express';
import { body, query } from 'express-validator';
import { AuthRequest, authenticate, requireRole, requireRoleWhen } from '../middleware/auth';
import { asyncHandler } from '../middleware/errorHandler';
import { UserRole } from '../models/User';
import { ChargeType } from '../models/Charge';
import * as billingController from '../controllers/billingController';

const router = Router();

router.use(authenticate);

const amount = (field: string) =>
  body(field).isDecimal({ decimal_digits: '0,2' }).withMessage('Rate must be an amount with at most 2 decimals');

const targetRules = [
  body('visitId').optional({ values: 'null' }).trim().notEmpty().withMessage('Visit ID cannot be empty'),
  body('admissionId').optional({ values: 'null' }).trim().notEmpty().withMessage('Admission ID cannot be empty')
];

const itemRules = [
  body('items').isArray({ min: 1, max: 100 }).withMessage('Items must be a list of 1 to 100 charges'),
  body('items.*.name').trim().notEmpty().withMessage('Charge name is required').isLength({ max: 100 }).withMessage('Charge name too long'),
  amount('items.*.rate'),
  body('items.*.quantity').optional().isInt({ min: 1 }).withMessage('Quantity must be a positive whole number').toInt()
];

const targetQuery = [
  query('visitId').optional().trim(),
  query('admissionId').optional().trim()
];

const isManualCharge = (req: AuthRequest): boolean => req.body?.chargeType === ChargeType.MANUAL;

/**
 * POST /api/billing/charges
 * Single charge line; MANUAL lines need an admin, as on /charges/manual
 */
router.post('/charges', [
  ...targetRules,
  body('chargeType').trim().toUpperCase().isIn(Object.values(ChargeType)).withMessage('Invalid charge type'),
  body('chargeName').trim().notEmpty().withMessage('Charge name is required').isLength({ max: 100 }).withMessage('Charge name too long'),
  amount('rate'),
  body('quantity').optional().isInt({ min: 1 }).withMessage('Quantity must be a positive whole number').toInt()
], requireRoleWhen(isManualCharge, UserRole.ADMIN), asyncHandler(billingController.createCharge));

router.post('/charges/investigations', [...targetRules, ...itemRules], asyncHandler(billingController.addInvestigationCharges));

router.post('/charges/procedures', [...targetRules, ...itemRules], asyncHandler(billingController.addProcedureCharges));

/**
 * POST /api/billing/charges/services
 * Hourly services; quantity comes from start and end time when both are given
 */
router.post('/charges/services', [
  ...targetRules,
  ...itemRules,
  body('items.*.startTime').optional().isISO8601().withMessage('Start time must be an ISO 8601 date'),
  body('items.*.endTime').optional().isISO8601().withMessage('End time must be an ISO 8601 date')
], asyncHandler(billingController.addServiceCharges));

/**
 * POST /api/billing/charges/manual
 * Manual charges (admin only, audited)
 */
router.post('/charges/manual', requireRole(UserRole.ADMIN), [...targetRules, ...itemRules], asyncHandler(billingController.addManualCharges));

/**
 * GET /api/billing/charges?visitId=|admissionId=&chargeType=
 */
router.get('/charges', [
  ...targetQuery,
  query('chargeType').optional().trim().toUpperCase().isIn(Object.values(ChargeType)).withMessage('Invalid charge type')
], asyncHandler(billingController.listCharges));

router.get('/charges/total', targetQuery, asyncHandler(billingController.getChargeTotal));

router.get('/charges/:chargeId', asyncHandler(billingController.getCharge));

/**
 * PUT /api/billing/charges/:chargeId
 * Edit a charge line (admin only; manual lines are audited)
 */
router.put('/charges/:chargeId', requireRole(UserRole.ADMIN), [
  body('chargeName').optional().trim().notEmpty().withMessage('Charge name cannot be empty').isLength({ max: 100 }).withMessage('Charge name too long'),
  amount('rate').optional(),
  body('quantity').optional().isInt({ min: 1 }).withMessage('Quantity must be a positive whole number').toInt()
], asyncHandler(billingController.updateCharge));

router.delete('/charges/:chargeId', asyncHandler(billingController.deleteCharge));

export default router;
