import { Request, Response } from 'express';
import { AuthRequest, actorOf } from '../middleware/auth';
import { getServices } from '../services/registry';
import { parseSalaryStatus } from '../services/salaryService';
import { queryNumber, queryString, rejectInvalid } from './helpers';

/**
 * Salary controller - the monthly salary ledger
 */

export const createPayment = async (req: AuthRequest, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const { employeeId, month, year, amount, status, paymentDate, notes } = req.body;
  const payment = await getServices().salaries.createPayment({
    employeeId,
    month,
    year,
    amount,
    status: status ? parseSalaryStatus(status) : undefined,
    paymentDate,
    notes,
    createdBy: actorOf(req)
  });
  res.status(201).json({ message: 'Salary recorded successfully', payment });
};

/**
 * GET /api/salary-payments?month=&year=&status=
 */
export const listPayments = async (req: Request, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const status = queryString(req, 'status');
  const payments = await getServices().salaries.listPayments({
    month: queryNumber(req, 'month'),
    year: queryNumber(req, 'year'),
    status: status ? parseSalaryStatus(status) : undefined
  });
  res.json({ payments, total: payments.length });
};

export const listPendingPayments = async (req: Request, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const payments = await getServices().salaries.listPendingPayments(queryNumber(req, 'month'), queryNumber(req, 'year'));
  res.json({ payments, total: payments.length });
};

export const listEmployeePayments = async (req: Request, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const payments = await getServices().salaries.listEmployeePayments(req.params.employeeId, queryNumber(req, 'year'));
  res.json({ payments });
};

export const getPayment = async (req: Request, res: Response) => {
  const payment = await getServices().salaries.getPayment(req.params.paymentId);
  res.json({ payment });
};

export const markPaid = async (req: Request, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const payment = await getServices().salaries.markPaid(req.params.paymentId, req.body.paymentDate, req.body.notes);
  res.json({ message: 'Salary marked as paid', payment });
};

export const updatePayment = async (req: Request, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const { amount, notes } = req.body;
  const payment = await getServices().salaries.updatePayment(req.params.paymentId, { amount, notes });
  res.json({ message: 'Salary payment updated', payment });
};
