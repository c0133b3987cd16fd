import { Request, Response } from 'express';
import { getServices } from '../services/registry';
import { rejectInvalid } from './helpers';

/**
 * Discharge controller - bill summary and closing an admission
 */

export const getDischargeBill = async (req: Request, res: Response) => {
  const bill = await getServices().discharge.generateDischargeBill(req.params.admissionId);
  res.json({ bill });
};

export const getPendingAmount = async (req: Request, res: Response) => {
  const pending = await getServices().discharge.calculatePendingAmount(req.params.admissionId);
  res.json({ admissionId: req.params.admissionId, pending });
};

export const processDischarge = async (req: Request, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const admission = await getServices().discharge.processDischarge(req.params.admissionId, req.body.dischargeDate);
  res.json({ message: 'Patient discharged successfully', admission });
};
