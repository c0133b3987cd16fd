import { DataSource, DeepPartial } from 'typeorm';
import { Patient, Gender } from '../models/Patient';
import { Visit } from '../models/Visit';
import { Admission } from '../models/Admission';
import { ConflictError, NotFoundError, ValidationError } from '../lib/errors';
import { escapeLike, titleCase } from '../lib/text';
import { createLogger } from '../lib/logger';
import { runInTransaction } from '../lib/transactions';
import { IdGenerator } from './idGenerator';

const log = createLogger({ service: 'patient' });

// Indian mobile numbers: ten digits, leading 6-9
export const MOBILE_PATTERN = /^[6-9]\d{9}$/;
const MAX_AGE = 150;
const DUPLICATE_MOBILE = 'Mobile number already exists';

export interface PatientInput {
  name: string;
  age: number;
  gender: Gender;
  address: string;
  mobileNumber: string;
}

export type PatientChanges = Partial<PatientInput>;

export interface PatientHistory {
  patient: Patient;
  visits: Visit[];
  admissions: Admission[];
}

export function parseGender(value: string): Gender {
  const gender = Object.values(Gender).find((candidate) => candidate === value.trim().toUpperCase());
  if (!gender) {
    throw new ValidationError(`Gender must be one of: ${Object.values(Gender).join(', ')}`);
  }
  return gender;
}

function checkMobile(mobileNumber: string) {
  if (!MOBILE_PATTERN.test(mobileNumber)) {
    throw new ValidationError('Invalid mobile number format');
  }
}

function checkAge(age: number) {
  if (!Number.isInteger(age) || age < 0 || age > MAX_AGE) {
    throw new ValidationError(`Age must be between 0 and ${MAX_AGE}`);
  }
}

function requireText(value: string | undefined, message: string): string {
  const trimmed = value?.trim();
  if (!trimmed) {
    throw new ValidationError(message);
  }
  return trimmed;
}

export class PatientService {
  constructor(
    private readonly dataSource: DataSource,
    private readonly ids: IdGenerator
  ) {}

  async createPatient(input: PatientInput): Promise<Patient> {
    checkMobile(input.mobileNumber);
    checkAge(input.age);
    const name = titleCase(requireText(input.name, 'Patient name is required'));
    const address = requireText(input.address, 'Patient address is required');
    const gender = parseGender(input.gender);

    const patient = await runInTransaction(this.dataSource, DUPLICATE_MOBILE, async (manager) => {
      if (await manager.existsBy(Patient, { mobileNumber: input.mobileNumber })) {
        throw new ConflictError(DUPLICATE_MOBILE);
      }
      const created = manager.create(Patient, {
        id: await this.ids.generatePatientId(),
        name,
        age: input.age,
        gender,
        address,
        mobileNumber: input.mobileNumber
      });
      return manager.save(created);
    });

    log.info('Patient registered', { patientId: patient.id });
    return patient;
  }

  async getPatient(patientId: string): Promise<Patient> {
    const patient = await this.dataSource.getRepository(Patient).findOneBy({ id: patientId });
    if (!patient) {
      throw new NotFoundError('Patient', patientId);
    }
    return patient;
  }

  async getPatientByMobile(mobileNumber: string): Promise<Patient> {
    const patient = await this.dataSource.getRepository(Patient).findOneBy({ mobileNumber });
    if (!patient) {
      throw new NotFoundError('Patient with mobile', mobileNumber);
    }
    return patient;
  }

  /**
   * Case-insensitive substring match on id, mobile number or name.
   */
  searchPatients(term: string, limit = 50): Promise<Patient[]> {
    const trimmed = term.trim();
    if (!trimmed) {
      return Promise.resolve([]);
    }
    return this.dataSource
      .getRepository(Patient)
      .createQueryBuilder('patient')
      .where(
        "(LOWER(patient.id) LIKE :term ESCAPE '\\' OR patient.mobileNumber LIKE :term ESCAPE '\\' OR LOWER(patient.name) LIKE :term ESCAPE '\\')",
        { term: `%${escapeLike(trimmed.toLowerCase())}%` }
      )
      .orderBy('patient.name', 'ASC')
      .addOrderBy('patient.id', 'ASC')
      .take(limit)
      .getMany();
  }

  async updatePatient(patientId: string, changes: PatientChanges): Promise<Patient> {
    const updates: DeepPartial<Patient> = {};
    if (changes.name !== undefined) {
      updates.name = titleCase(requireText(changes.name, 'Patient name cannot be empty'));
    }
    if (changes.address !== undefined) {
      updates.address = requireText(changes.address, 'Patient address cannot be empty');
    }
    if (changes.age !== undefined) {
      checkAge(changes.age);
      updates.age = changes.age;
    }
    if (changes.gender !== undefined) {
      updates.gender = parseGender(changes.gender);
    }
    if (changes.mobileNumber !== undefined) {
      checkMobile(changes.mobileNumber);
      updates.mobileNumber = changes.mobileNumber;
    }

    return runInTransaction(this.dataSource, DUPLICATE_MOBILE, async (manager) => {
      const patient = await manager.findOneBy(Patient, { id: patientId });
      if (!patient) {
        throw new NotFoundError('Patient', patientId);
      }
      if (updates.mobileNumber !== undefined && updates.mobileNumber !== patient.mobileNumber) {
        if (await manager.existsBy(Patient, { mobileNumber: updates.mobileNumber })) {
          throw new ConflictError(DUPLICATE_MOBILE);
        }
      }
      return manager.save(manager.merge<Patient>(Patient, patient, updates));
    });
  }

  async getPatientHistory(patientId: string): Promise<PatientHistory> {
    const patient = await this.getPatient(patientId);
    const visits = await this.dataSource.getRepository(Visit).find({
      where: { patientId },
      relations: { doctor: true },
      order: { visitDate: 'DESC', visitTime: 'DESC' }
    });
    const admissions = await this.dataSource.getRepository(Admission).find({
      where: { patientId },
      relations: { bed: true },
      order: { admissionDate: 'DESC' }
    });
    return { patient, visits, admissions };
  }
}
