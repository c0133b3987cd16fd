import { Request, Response } from 'express';
import { getServices } from '../services/registry';
import { queryInt, queryString, rejectInvalid } from './helpers';

/**
 * Patient controller - registration, search and history
 */

export const createPatient = async (req: Request, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const { name, age, gender, address, mobileNumber } = req.body;
  const patient = await getServices().patients.createPatient({ name, age, gender, address, mobileNumber });

  res.status(201).json({ message: 'Patient registered successfully', patient });
};

export const searchPatients = async (req: Request, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const patients = await getServices().patients.searchPatients(
    queryString(req, 'q') ?? '',
    queryInt(req, 'limit', 50)
  );
  res.json({ patients });
};

export const getPatient = async (req: Request, res: Response) => {
  const patient = await getServices().patients.getPatient(req.params.patientId);
  res.json({ patient });
};

export const getPatientByMobile = async (req: Request, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const patient = await getServices().patients.getPatientByMobile(req.params.mobileNumber);
  res.json({ patient });
};

export const updatePatient = async (req: Request, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const { name, age, gender, address, mobileNumber } = req.body;
  const patient = await getServices().patients.updatePatient(req.params.patientId, {
    name,
    age,
    gender,
    address,
    mobileNumber
  });
  res.json({ message: 'Patient updated successfully', patient });
};

export const getPatientHistory = async (req: Request, res: Response) => {
  const history = await getServices().patients.getPatientHistory(req.params.patientId);
  res.json(history);
};
