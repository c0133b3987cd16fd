import { DataSource } from 'typeorm';
import { Doctor, DoctorStatus } from '../models/Doctor';
import { NotFoundError, ValidationError } from '../lib/errors';
import { Money, isNegative, roundMoney } from '../lib/money';
import { titleCase } from '../lib/text';
import { createLogger } from '../lib/logger';
import { runInTransaction } from '../lib/transactions';
import { IdGenerator, ID_PREFIXES } from './idGenerator';
import { RateChangeListener } from './ledgerEvents';

const log = createLogger({ service: 'doctor' });

export const DOCTORS_TABLE = 'doctors';

export interface DoctorInput {
  name: string;
  department: string;
  newPatientFee: Money | number;
  followupFee: Money | number;
}

export interface DoctorFees {
  newPatientFee?: Money | number;
  followupFee?: Money | number;
}

const FEE_FIELDS = ['newPatientFee', 'followupFee'] as const;

function checkFee(value: Money | number, label: string): Money {
  const fee = roundMoney(value, label);
  if (isNegative(fee)) {
    throw new ValidationError(`${label} cannot be negative`);
  }
  return fee;
}

function requireText(value: string | undefined, message: string): string {
  const trimmed = value?.trim();
  if (!trimmed) {
    throw new ValidationError(message);
  }
  return trimmed;
}

export function parseDoctorStatus(value: string): DoctorStatus {
  const status = Object.values(DoctorStatus).find((candidate) => candidate === value.trim().toUpperCase());
  if (!status) {
    throw new ValidationError(`Invalid doctor status: ${value}`);
  }
  return status;
}

export class DoctorService {
  private readonly onRateChange?: RateChangeListener;

  constructor(
    private readonly dataSource: DataSource,
    private readonly ids: IdGenerator,
    options: { onRateChange?: RateChangeListener } = {}
  ) {
    this.onRateChange = options.onRateChange;
  }

  async createDoctor(input: DoctorInput): Promise<Doctor> {
    const name = titleCase(requireText(input.name, 'Doctor name is required'));
    const department = titleCase(requireText(input.department, 'Department is required'));
    const newPatientFee = checkFee(input.newPatientFee, 'New patient fee');
    const followupFee = checkFee(input.followupFee, 'Follow-up fee');

    const repo = this.dataSource.getRepository(Doctor);
    const doctor = await repo.save(repo.create({
      id: await this.ids.generateId(ID_PREFIXES.doctor),
      name,
      department,
      newPatientFee,
      followupFee,
      status: DoctorStatus.ACTIVE
    }));
    log.info('Doctor created', { doctorId: doctor.id, department });
    return doctor;
  }

  async getDoctor(doctorId: string): Promise<Doctor> {
    const doctor = await this.dataSource.getRepository(Doctor).findOneBy({ id: doctorId });
    if (!doctor) {
      throw new NotFoundError('Doctor', doctorId);
    }
    return doctor;
  }

  listDoctors(): Promise<Doctor[]> {
    return this.dataSource.getRepository(Doctor).find({ order: { name: 'ASC' } });
  }

  listActiveDoctors(department?: string): Promise<Doctor[]> {
    return this.dataSource.getRepository(Doctor).find({
      where: department
        ? { status: DoctorStatus.ACTIVE, department: titleCase(department) }
        : { status: DoctorStatus.ACTIVE },
      order: { name: 'ASC' }
    });
  }

  /**
   * Changes consultation fees. Each fee that actually changes is audited as a
   * RATE_CHANGE in the same transaction. Existing visits keep the fee they
   * were charged.
   */
  async updateFees(doctorId: string, fees: DoctorFees, actorId: string): Promise<Doctor> {
    const next: Partial<Record<(typeof FEE_FIELDS)[number], Money>> = {};
    if (fees.newPatientFee !== undefined) {
      next.newPatientFee = checkFee(fees.newPatientFee, 'New patient fee');
    }
    if (fees.followupFee !== undefined) {
      next.followupFee = checkFee(fees.followupFee, 'Follow-up fee');
    }
    if (Object.keys(next).length === 0) {
      throw new ValidationError('At least one fee is required');
    }

    return runInTransaction(this.dataSource, `Doctor ${doctorId} could not be updated`, async (manager) => {
      const doctor = await manager.findOneBy(Doctor, { id: doctorId });
      if (!doctor) {
        throw new NotFoundError('Doctor', doctorId);
      }
      for (const field of FEE_FIELDS) {
        const newRate = next[field];
        if (newRate === undefined || newRate === doctor[field]) {
          continue;
        }
        const oldRate = doctor[field];
        doctor[field] = newRate;
        await manager.update(
          Doctor,
          { id: doctorId },
          field === 'newPatientFee' ? { newPatientFee: newRate } : { followupFee: newRate }
        );
        if (this.onRateChange) {
          await this.onRateChange({
            actorId,
            tableName: DOCTORS_TABLE,
            recordId: doctorId,
            field,
            oldRate,
            newRate
          }, manager);
        }
      }
      return doctor;
    });
  }

  async setStatus(doctorId: string, status: DoctorStatus): Promise<Doctor> {
    const doctor = await this.getDoctor(doctorId);
    if (doctor.status !== status) {
      await this.dataSource.getRepository(Doctor).update({ id: doctorId }, { status });
      doctor.status = status;
      log.info('Doctor status changed', { doctorId, status });
    }
    return doctor;
  }
}
