import { Router } from 'express';
import { body } from 'express-validator';
import { authenticate } from '../middleware/auth';
import { asyncHandler } from '../middleware/errorHandler';
import { PaymentMode, PaymentType } from '../models/Payment';
import * as paymentController from '../controllers/paymentController';

const router = Router();

router.use(authenticate);

const receiptRules = [
  body('amount').isDecimal({ decimal_digits: '0,2' }).withMessage('Amount must be a number with at most 2 decimals'),
  body('paymentMode').trim().toUpperCase().isIn(Object.values(PaymentMode)).withMessage('Invalid payment mode'),
  body('transactionReference').optional({ values: 'null' }).trim().isLength({ max: 100 }).withMessage('Transaction reference too long'),
  body('notes').optional({ values: 'null' }).trim().isLength({ max: 500 }).withMessage('Notes too long')
];

/**
 * POST /api/payments
 * Record a receipt against a patient, optionally tied to a visit or admission
 */
router.post('/', [
  body('patientId').trim().notEmpty().withMessage('Patient ID is required'),
  body('paymentType').trim().toUpperCase().isIn(Object.values(PaymentType)).withMessage('Invalid payment type'),
  body('visitId').optional({ values: 'null' }).trim(),
  body('admissionId').optional({ values: 'null' }).trim(),
  ...receiptRules
], asyncHandler(paymentController.recordPayment));

/**
 * POST /api/payments/admissions/:admissionId/advance
 */
router.post('/admissions/:admissionId/advance', receiptRules, asyncHandler(paymentController.recordAdvance));

router.get('/admissions/:admissionId/advances', asyncHandler(paymentController.listAdvances));

router.get('/admissions/:admissionId', asyncHandler(paymentController.listAdmissionPayments));

router.get('/visits/:visitId', asyncHandler(paymentController.listVisitPayments));

router.get('/patients/:patientId', asyncHandler(paymentController.listPatientPayments));

router.get('/balance/:patientId', asyncHandler(paymentController.getBalance));

router.get('/:paymentId', asyncHandler(paymentController.getPayment));

export default router;
