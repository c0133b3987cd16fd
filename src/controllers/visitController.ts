import { Request, Response } from 'express';
import { getServices } from '../services/registry';
import { parseVisitStatus, parseVisitType } from '../services/visitService';
import { queryString, rejectInvalid } from './helpers';

/**
 * Visit controller - OPD registration and slips
 */

export const createVisit = async (req: Request, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const { patientId, doctorId, visitType, paymentMode } = req.body;
  const visit = await getServices().visits.createVisit({
    patientId,
    doctorId,
    visitType: parseVisitType(visitType),
    paymentMode
  });

  res.status(201).json({ message: 'Visit registered successfully', visit });
};

/**
 * GET /api/visits?date=YYYY-MM-DD&doctorId=
 * Today's visits when no date is given
 */
export const listDailyVisits = async (req: Request, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const visits = await getServices().visits.listDailyVisits(queryString(req, 'date'), queryString(req, 'doctorId'));
  res.json({ visits, total: visits.length });
};

export const getVisit = async (req: Request, res: Response) => {
  const visit = await getServices().visits.getVisit(req.params.visitId);
  res.json({ visit });
};

export const updateVisitStatus = async (req: Request, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const visit = await getServices().visits.updateVisitStatus(req.params.visitId, parseVisitStatus(req.body.status));
  res.json({ message: 'Visit status updated', visit });
};

export const getVisitSlip = async (req: Request, res: Response) => {
  const slip = await getServices().visits.generateSlip(req.params.visitId);
  res.json({ slip });
};
