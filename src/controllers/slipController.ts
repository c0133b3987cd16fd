import { Request, Response } from 'express';
import { AuthRequest, actorOf } from '../middleware/auth';
import { getServices } from '../services/registry';
import { parseChargeTarget } from '../services/billingService';
import { parseChargeSlipType, parsePrinterFormat } from '../services/slipService';
import { rejectInvalid } from './helpers';

/**
 * Slip controller - printed slips, reprints and slip history
 */

export const generateOpdSlip = async (req: AuthRequest, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const slip = await getServices().slips.generateOpdSlip(
    req.params.visitId,
    actorOf(req),
    parsePrinterFormat(req.body.printerFormat)
  );
  res.status(201).json({ message: 'OPD slip generated', slip });
};

/**
 * Investigation, procedure, service or OT slip of a visit or an admission
 */
export const generateChargeSlip = async (req: AuthRequest, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const { slipType, visitId, admissionId, printerFormat } = req.body;
  const slip = await getServices().slips.generateChargeSlip(
    parseChargeSlipType(slipType),
    parseChargeTarget(visitId, admissionId),
    actorOf(req),
    parsePrinterFormat(printerFormat)
  );
  res.status(201).json({ message: 'Slip generated', slip });
};

export const generateOtSlip = async (req: AuthRequest, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const slip = await getServices().slips.generateOtSlip(
    req.params.admissionId,
    actorOf(req),
    parsePrinterFormat(req.body.printerFormat)
  );
  res.status(201).json({ message: 'OT slip generated', slip });
};

export const generateDischargeSlip = async (req: AuthRequest, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const slip = await getServices().slips.generateDischargeSlip(
    req.params.admissionId,
    actorOf(req),
    parsePrinterFormat(req.body.printerFormat)
  );
  res.status(201).json({ message: 'Discharge slip generated', slip });
};

export const reprintSlip = async (req: AuthRequest, res: Response) => {
  const slip = await getServices().slips.reprintSlip(req.params.slipId, actorOf(req));
  res.status(201).json({ message: 'Slip reprinted', slip });
};

export const getSlip = async (req: Request, res: Response) => {
  const slip = await getServices().slips.getSlip(req.params.slipId);
  res.json({ slip });
};

export const listPatientSlips = async (req: Request, res: Response) => {
  const slips = await getServices().slips.listPatientSlips(req.params.patientId);
  res.json({ slips });
};

export const listVisitSlips = async (req: Request, res: Response) => {
  const slips = await getServices().slips.listVisitSlips(req.params.visitId);
  res.json({ slips });
};

export const listAdmissionSlips = async (req: Request, res: Response) => {
  const slips = await getServices().slips.listAdmissionSlips(req.params.admissionId);
  res.json({ slips });
};
