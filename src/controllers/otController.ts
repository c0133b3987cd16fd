import { Request, Response } from 'express';
import { AuthRequest, actorOf } from '../middleware/auth';
import { getServices } from '../services/registry';
import { rejectInvalid } from './helpers';

/**
 * OT controller - operation theatre procedures of an admission
 */

export const createProcedure = async (req: AuthRequest, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const { operationName, operationDate, durationMinutes, surgeonName, anesthesiaType, notes } = req.body;
  const procedure = await getServices().ot.createProcedure({
    admissionId: req.params.admissionId,
    operationName,
    operationDate,
    durationMinutes,
    surgeonName,
    anesthesiaType,
    notes,
    createdBy: actorOf(req)
  });
  res.status(201).json({ message: 'OT procedure recorded', procedure });
};

export const listProcedures = async (req: Request, res: Response) => {
  const procedures = await getServices().ot.listProcedures(req.params.admissionId);
  res.json({ procedures });
};

export const getProcedure = async (req: Request, res: Response) => {
  const procedure = await getServices().ot.getProcedure(req.params.otId);
  res.json({ procedure });
};

export const addOtCharges = async (req: AuthRequest, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const { surgeonCharge, anesthesiaCharge, facilityCharge, assistantCharge } = req.body;
  const charges = await getServices().ot.addOtCharges(
    req.params.admissionId,
    req.params.otId,
    { surgeonCharge, anesthesiaCharge, facilityCharge, assistantCharge },
    actorOf(req)
  );
  res.status(201).json({ message: `${charges.length} OT charge(s) added`, charges });
};

export const listOtCharges = async (req: Request, res: Response) => {
  const charges = await getServices().ot.listOtCharges(req.params.admissionId);
  res.json({ charges });
};
