import { DataSource } from 'typeorm';
import QRCode from 'qrcode';
import { Visit, VisitStatus, VisitType } from '../models/Visit';
import { Patient } from '../models/Patient';
import { Doctor, DoctorStatus } from '../models/Doctor';
import { OpdSlipContent, SlipType } from '../models/Slip';
import { ConflictError, NotFoundError, ValidationError } from '../lib/errors';
import { Clock, isDateOnly, systemClock, toDateOnly, toTimeOfDay } from '../lib/dates';
import { KeyedMutex } from '../lib/keyedMutex';
import { createLogger } from '../lib/logger';
import { runInTransaction } from '../lib/transactions';
import { IdGenerator } from './idGenerator';
import { parsePaymentMode } from './paymentService';

const log = createLogger({ service: 'visit' });

const VISIT_TRANSITIONS: Record<VisitStatus, readonly VisitStatus[]> = {
  [VisitStatus.ACTIVE]: [VisitStatus.COMPLETED, VisitStatus.CANCELLED],
  [VisitStatus.COMPLETED]: [],
  [VisitStatus.CANCELLED]: []
};

export interface CreateVisitInput {
  patientId: string;
  doctorId: string;
  visitType: VisitType;
  paymentMode: string;
}

export type VisitSlip = OpdSlipContent & { qrData: string; qrCode: string };

/** QR payload printed on every slip: patient, record and issue time in epoch seconds. */
export const slipQrData = (patientId: string, recordId: string, at: Date): string =>
  `${patientId}-${recordId}-${Math.floor(at.getTime() / 1000)}`;

export const renderQrCode = (qrData: string): Promise<string> => QRCode.toDataURL(qrData);

export function parseVisitType(value: string): VisitType {
  const visitType = Object.values(VisitType).find((candidate) => candidate === value.trim().toUpperCase());
  if (!visitType) {
    throw new ValidationError(`Visit type must be one of: ${Object.values(VisitType).join(', ')}`);
  }
  return visitType;
}

export function parseVisitStatus(value: string): VisitStatus {
  const status = Object.values(VisitStatus).find((candidate) => candidate === value.trim().toUpperCase());
  if (!status) {
    throw new ValidationError(`Invalid visit status: ${value}`);
  }
  return status;
}

/**
 * Outpatient visits. Serial numbers rank a doctor's visits within one
 * calendar day; allocation for a (doctor, day) pair runs one at a time so
 * two registrations never read the same maximum.
 */
export class VisitService {
  private readonly clock: Clock;
  private readonly serials = new KeyedMutex();

  constructor(
    private readonly dataSource: DataSource,
    private readonly ids: IdGenerator,
    options: { clock?: Clock } = {}
  ) {
    this.clock = options.clock ?? systemClock;
  }

  async createVisit(input: CreateVisitInput): Promise<Visit> {
    const visitType = parseVisitType(input.visitType);
    const paymentMode = parsePaymentMode(input.paymentMode);
    const now = this.clock();
    const visitDate = toDateOnly(now);
    const visitTime = toTimeOfDay(now);

    const visit = await this.serials.runExclusive(`${input.doctorId}:${visitDate}`, () =>
      runInTransaction(this.dataSource, 'Serial number already taken, please retry', async (manager) => {
        if (!(await manager.existsBy(Patient, { id: input.patientId }))) {
          throw new NotFoundError('Patient', input.patientId);
        }
        const doctor = await manager.findOneBy(Doctor, { id: input.doctorId });
        if (!doctor) {
          throw new NotFoundError('Doctor', input.doctorId);
        }
        if (doctor.status !== DoctorStatus.ACTIVE) {
          throw new ConflictError(`Doctor ${doctor.name} is not accepting visits`);
        }

        const row = await manager
          .getRepository(Visit)
          .createQueryBuilder('visit')
          .select('MAX(visit.serialNumber)', 'maxSerial')
          .where('visit.doctorId = :doctorId', { doctorId: doctor.id })
          .andWhere('visit.visitDate = :visitDate', { visitDate })
          .getRawOne<{ maxSerial: number | string | null }>();
        const serialNumber = Number(row?.maxSerial ?? 0) + 1;

        const created = manager.create(Visit, {
          id: await this.ids.generateVisitId(),
          patientId: input.patientId,
          doctorId: doctor.id,
          visitType,
          department: doctor.department,
          serialNumber,
          visitDate,
          visitTime,
          opdFee: visitType === VisitType.OPD_NEW ? doctor.newPatientFee : doctor.followupFee,
          paymentMode,
          status: VisitStatus.ACTIVE
        });
        return manager.save(created);
      })
    );

    log.info('Visit registered', {
      visitId: visit.id,
      doctorId: visit.doctorId,
      serialNumber: visit.serialNumber
    });
    return visit;
  }

  async getVisit(visitId: string): Promise<Visit> {
    const visit = await this.dataSource.getRepository(Visit).findOne({
      where: { id: visitId },
      relations: { patient: true, doctor: true }
    });
    if (!visit) {
      throw new NotFoundError('Visit', visitId);
    }
    return visit;
  }

  /** Visits of one calendar day (today by default) in serial order. */
  listDailyVisits(visitDate?: string, doctorId?: string): Promise<Visit[]> {
    const day = visitDate ?? toDateOnly(this.clock());
    if (!isDateOnly(day)) {
      return Promise.reject(new ValidationError('Visit date must be YYYY-MM-DD'));
    }
    return this.dataSource.getRepository(Visit).find({
      where: doctorId ? { visitDate: day, doctorId } : { visitDate: day },
      relations: { patient: true, doctor: true },
      order: { doctorId: 'ASC', serialNumber: 'ASC' }
    });
  }

  listPatientVisits(patientId: string): Promise<Visit[]> {
    return this.dataSource.getRepository(Visit).find({
      where: { patientId },
      relations: { doctor: true },
      order: { visitDate: 'DESC', visitTime: 'DESC' }
    });
  }

  async updateVisitStatus(visitId: string, status: VisitStatus): Promise<Visit> {
    return runInTransaction(this.dataSource, `Visit ${visitId} could not be updated`, async (manager) => {
      const visit = await manager.findOneBy(Visit, { id: visitId });
      if (!visit) {
        throw new NotFoundError('Visit', visitId);
      }
      if (!VISIT_TRANSITIONS[visit.status].includes(status)) {
        throw new ConflictError(`Visit ${visitId} cannot move from ${visit.status} to ${status}`);
      }
      const result = await manager.update(Visit, { id: visitId, status: visit.status }, { status });
      if (result.affected !== 1) {
        throw new ConflictError(`Visit ${visitId} changed while updating its status`);
      }
      visit.status = status;
      return visit;
    });
  }

  /** OPD slip payload with the visit's QR code as a PNG data URL. */
  async generateSlip(visitId: string): Promise<VisitSlip> {
    const visit = await this.getVisit(visitId);
    const now = this.clock();
    const qrData = slipQrData(visit.patientId, visit.id, now);
    const qrCode = await renderQrCode(qrData);

    return {
      slipType: SlipType.OPD,
      patient: {
        id: visit.patient.id,
        name: visit.patient.name,
        age: visit.patient.age,
        gender: visit.patient.gender,
        mobile: visit.patient.mobileNumber
      },
      visit: {
        id: visit.id,
        type: visit.visitType,
        date: visit.visitDate,
        time: visit.visitTime,
        serialNumber: visit.serialNumber
      },
      doctor: {
        name: visit.doctor.name,
        department: visit.department
      },
      charges: {
        opdFee: visit.opdFee,
        paymentMode: visit.paymentMode
      },
      qrData,
      qrCode,
      generatedAt: now.toISOString()
    };
  }
}
