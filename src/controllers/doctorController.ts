import { Request, Response } from 'express';
import { AuthRequest, actorOf } from '../middleware/auth';
import { getServices } from '../services/registry';
import { parseDoctorStatus } from '../services/doctorService';
import { queryString, rejectInvalid } from './helpers';

/**
 * Doctor controller - consultants and their OPD fees
 */

export const createDoctor = async (req: Request, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const { name, department, newPatientFee, followupFee } = req.body;
  const doctor = await getServices().doctors.createDoctor({ name, department, newPatientFee, followupFee });

  res.status(201).json({ message: 'Doctor created successfully', doctor });
};

/**
 * Active doctors by default; ?all=true includes inactive ones
 */
export const listDoctors = async (req: Request, res: Response) => {
  const { doctors: service } = getServices();
  const doctors = queryString(req, 'all') === 'true'
    ? await service.listDoctors()
    : await service.listActiveDoctors(queryString(req, 'department'));
  res.json({ doctors });
};

export const getDoctor = async (req: Request, res: Response) => {
  const doctor = await getServices().doctors.getDoctor(req.params.doctorId);
  res.json({ doctor });
};

export const updateFees = async (req: AuthRequest, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const { newPatientFee, followupFee } = req.body;
  const doctor = await getServices().doctors.updateFees(
    req.params.doctorId,
    { newPatientFee, followupFee },
    actorOf(req)
  );
  res.json({ message: 'Fees updated successfully', doctor });
};

export const setStatus = async (req: Request, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const doctor = await getServices().doctors.setStatus(req.params.doctorId, parseDoctorStatus(req.body.status));
  res.json({ message: 'Doctor status updated', doctor });
};
