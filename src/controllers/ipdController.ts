import { Request, Response } from 'express';
import { AuthRequest, actorOf } from '../middleware/auth';
import { getServices } from '../services/registry';
import { parseBedStatus, parseWardType } from '../services/admissionService';
import { queryString, rejectInvalid } from './helpers';

/**
 * IPD controller - beds, admissions and bed movements
 */

const wardFilter = (req: Request) => {
  const ward = queryString(req, 'wardType');
  return ward ? parseWardType(ward) : undefined;
};

// ---- Beds ----

export const createBed = async (req: Request, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const { bedNumber, wardType, perDayCharge } = req.body;
  const bed = await getServices().admissions.createBed({
    bedNumber,
    wardType: parseWardType(wardType),
    perDayCharge
  });
  res.status(201).json({ message: 'Bed created successfully', bed });
};

export const listBeds = async (req: Request, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const beds = await getServices().admissions.listBeds(wardFilter(req));
  res.json({ beds });
};

export const listAvailableBeds = async (req: Request, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const beds = await getServices().admissions.listAvailableBeds(wardFilter(req));
  res.json({ beds });
};

export const getOccupancyStats = async (_req: Request, res: Response) => {
  const stats = await getServices().admissions.getOccupancyStats();
  res.json(stats);
};

export const getBed = async (req: Request, res: Response) => {
  const bed = await getServices().admissions.getBed(req.params.bedId);
  res.json({ bed });
};

export const updateBedStatus = async (req: Request, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const bed = await getServices().admissions.updateBedStatus(req.params.bedId, parseBedStatus(req.body.status));
  res.json({ message: 'Bed status updated', bed });
};

export const updateBedRate = async (req: AuthRequest, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const bed = await getServices().admissions.updateBedRate(req.params.bedId, req.body.perDayCharge, actorOf(req));
  res.json({ message: 'Bed rate updated', bed });
};

// ---- Admissions ----

export const admitPatient = async (req: Request, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const { patientId, bedId, fileCharge, visitId, admissionDate } = req.body;
  const admission = await getServices().admissions.admit({ patientId, bedId, fileCharge, visitId, admissionDate });
  res.status(201).json({ message: 'Patient admitted successfully', admission });
};

export const listActiveAdmissions = async (_req: Request, res: Response) => {
  const admissions = await getServices().admissions.listActiveAdmissions();
  res.json({ admissions, total: admissions.length });
};

export const getAdmission = async (req: Request, res: Response) => {
  const admission = await getServices().admissions.getAdmission(req.params.admissionId);
  res.json({ admission });
};

export const changeBed = async (req: Request, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const admission = await getServices().admissions.changeBed(req.params.admissionId, req.body.newBedId);
  res.json({ message: 'Bed changed successfully', admission });
};

export const dischargePatient = async (req: Request, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const admission = await getServices().admissions.discharge(req.params.admissionId, req.body.dischargeDate);
  res.json({ message: 'Patient discharged successfully', admission });
};

export const transferOut = async (req: Request, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const admission = await getServices().admissions.transferOut(req.params.admissionId, req.body.transferDate);
  res.json({ message: 'Patient transferred out', admission });
};

export const getBedCharges = async (req: Request, res: Response) => {
  const summary = await getServices().admissions.computeBedCharges(req.params.admissionId);
  res.json(summary);
};

/**
 * Posts the accumulated bed charge to the admission's billing ledger
 */
export const postBedCharge = async (req: AuthRequest, res: Response) => {
  const charge = await getServices().billing.addBedCharge(req.params.admissionId, actorOf(req));
  res.status(201).json({ message: 'Bed charges posted', charge });
};
