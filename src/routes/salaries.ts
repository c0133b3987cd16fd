import { Router } from 'express';
import { body, query } from 'express-validator';
import { authenticate, requireRole } from '../middleware/auth';
import { asyncHandler } from '../middleware/errorHandler';
import { UserRole } from '../models/User';
import { SalaryStatus } from '../models/SalaryPayment';
import * as salaryController from '../controllers/salaryController';

const router = Router();

router.use(authenticate, requireRole(UserRole.ADMIN));

const periodFilters = [
  query('month').optional().isInt({ min: 1, max: 12 }).withMessage('Month must be between 1 and 12'),
  query('year').optional().isInt({ min: 2000, max: 2100 }).withMessage('Year must be between 2000 and 2100')
];

const amountRule = body('amount')
  .optional({ values: 'null' })
  .isDecimal({ decimal_digits: '0,2' }).withMessage('Amount must have at most 2 decimals');

const paymentDateRule = body('paymentDate')
  .optional({ values: 'null' })
  .isDate({ format: 'YYYY-MM-DD', strictMode: true }).withMessage('Payment date must be YYYY-MM-DD');

const notesRule = body('notes').optional({ values: 'null' }).trim().isLength({ max: 500 }).withMessage('Notes too long');

/**
 * POST /api/salary-payments
 * One entry per employee and month; the amount defaults to the monthly salary
 */
router.post('/', [
  body('employeeId').trim().notEmpty().withMessage('Employee ID is required'),
  body('month').isInt({ min: 1, max: 12 }).withMessage('Month must be between 1 and 12').toInt(),
  body('year').isInt({ min: 2000, max: 2100 }).withMessage('Year must be between 2000 and 2100').toInt(),
  body('status').optional().trim().toUpperCase().isIn(Object.values(SalaryStatus)).withMessage('Invalid salary status'),
  amountRule,
  paymentDateRule,
  notesRule
], asyncHandler(salaryController.createPayment));

router.get('/', [
  ...periodFilters,
  query('status').optional().trim().toUpperCase().isIn(Object.values(SalaryStatus)).withMessage('Invalid salary status')
], asyncHandler(salaryController.listPayments));

router.get('/pending', periodFilters, asyncHandler(salaryController.listPendingPayments));

router.get('/employees/:employeeId', [
  query('year').optional().isInt({ min: 2000, max: 2100 }).withMessage('Year must be between 2000 and 2100')
], asyncHandler(salaryController.listEmployeePayments));

router.get('/:paymentId', asyncHandler(salaryController.getPayment));

/**
 * PATCH /api/salary-payments/:paymentId/paid
 */
router.patch('/:paymentId/paid', [paymentDateRule, notesRule], asyncHandler(salaryController.markPaid));

router.patch('/:paymentId', [amountRule, notesRule], asyncHandler(salaryController.updatePayment));

export default router;
