import { Request, Response } from 'express';
import { AuthRequest, actorOf } from '../middleware/auth';
import { getServices } from '../services/registry';
import { parsePaymentTarget, parsePaymentType } from '../services/paymentService';
import { queryString, rejectInvalid } from './helpers';

/**
 * Payment controller - receipts, advances and balances
 */

export const recordPayment = async (req: AuthRequest, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const { patientId, amount, paymentMode, paymentType, visitId, admissionId, transactionReference, notes } = req.body;
  const payment = await getServices().payments.recordPayment({
    patientId,
    amount,
    paymentMode,
    paymentType: parsePaymentType(paymentType),
    target: parsePaymentTarget(visitId, admissionId),
    createdBy: actorOf(req),
    transactionReference,
    notes
  });
  res.status(201).json({ message: 'Payment recorded successfully', payment });
};

export const recordAdvance = async (req: AuthRequest, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const { amount, paymentMode, transactionReference, notes } = req.body;
  const payment = await getServices().payments.recordAdvance(
    req.params.admissionId,
    amount,
    paymentMode,
    actorOf(req),
    { transactionReference, notes }
  );
  res.status(201).json({ message: 'Advance recorded successfully', payment });
};

export const getPayment = async (req: Request, res: Response) => {
  const payment = await getServices().payments.getPayment(req.params.paymentId);
  res.json({ payment });
};

export const listPatientPayments = async (req: Request, res: Response) => {
  const payments = await getServices().payments.listByPatient(req.params.patientId);
  res.json({ payments });
};

export const listVisitPayments = async (req: Request, res: Response) => {
  const payments = await getServices().payments.listByVisit(req.params.visitId);
  res.json({ payments });
};

export const listAdmissionPayments = async (req: Request, res: Response) => {
  const payments = await getServices().payments.listByAdmission(req.params.admissionId);
  res.json({ payments });
};

export const listAdvances = async (req: Request, res: Response) => {
  const payments = await getServices().payments.listAdvances(req.params.admissionId);
  res.json({ payments });
};

/**
 * GET /api/payments/balance/:patientId?visitId=&admissionId=
 * Whole-patient balance unless narrowed to a visit and/or an admission
 */
export const getBalance = async (req: Request, res: Response) => {
  const balance = await getServices().payments.calculateBalance(req.params.patientId, {
    visitId: queryString(req, 'visitId'),
    admissionId: queryString(req, 'admissionId')
  });
  res.json(balance);
};
