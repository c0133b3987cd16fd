import { DataSource, EntityManager } from 'typeorm';
import { Admission, AdmissionStatus } from '../models/Admission';
import { Bed, BedStatus, WardType } from '../models/Bed';
import { Patient } from '../models/Patient';
import { Visit } from '../models/Visit';
import { ConflictError, NotFoundError, ValidationError } from '../lib/errors';
import { Clock, parseTimestamp, systemClock, wholeDaysBetween } from '../lib/dates';
import { Money, isNegative, multiplyMoney, roundMoney } from '../lib/money';
import { createLogger } from '../lib/logger';
import { runInTransaction } from '../lib/transactions';
import { IdGenerator, ID_PREFIXES } from './idGenerator';
import { RateChangeListener } from './ledgerEvents';

const log = createLogger({ service: 'admission' });

export const BEDS_TABLE = 'beds';
const MAX_BED_NUMBER_LENGTH = 10;

// Every status change a bed may ever make
const BED_TRANSITIONS: Record<BedStatus, readonly BedStatus[]> = {
  [BedStatus.AVAILABLE]: [BedStatus.OCCUPIED, BedStatus.MAINTENANCE],
  [BedStatus.OCCUPIED]: [BedStatus.AVAILABLE],
  [BedStatus.MAINTENANCE]: [BedStatus.AVAILABLE]
};

const ADMISSION_TRANSITIONS: Record<AdmissionStatus, readonly AdmissionStatus[]> = {
  [AdmissionStatus.ADMITTED]: [AdmissionStatus.DISCHARGED, AdmissionStatus.TRANSFERRED],
  [AdmissionStatus.DISCHARGED]: [],
  [AdmissionStatus.TRANSFERRED]: []
};

// Statuses front-desk staff may set by hand; OCCUPIED is owned by admissions
const MANUAL_BED_STATUSES: readonly BedStatus[] = [BedStatus.AVAILABLE, BedStatus.MAINTENANCE];

export interface CreateBedInput {
  bedNumber: string;
  wardType: WardType;
  perDayCharge: Money | number;
}

export interface AdmitInput {
  patientId: string;
  bedId: string;
  fileCharge: Money | number;
  visitId?: string | null;
  admissionDate?: Date | string;
}

export interface BedChargeSummary {
  admissionId: string;
  bedId: string;
  days: number;
  perDayCharge: Money;
  total: Money;
}

export interface WardOccupancy {
  wardType: WardType;
  total: number;
  available: number;
  occupied: number;
  maintenance: number;
}

export interface OccupancyStats {
  wards: WardOccupancy[];
  total: number;
  available: number;
  occupied: number;
  maintenance: number;
}

export interface AdmissionServiceOptions {
  clock?: Clock;
  onRateChange?: RateChangeListener;
}

/** Billable days of a stay: whole days elapsed, never less than one. */
export const stayDays = (admittedAt: Date, endedAt: Date): number =>
  Math.max(1, wholeDaysBetween(admittedAt, endedAt));

export function parseWardType(value: string): WardType {
  const wardType = Object.values(WardType).find((candidate) => candidate === value.trim().toUpperCase());
  if (!wardType) {
    throw new ValidationError(`Invalid ward type: ${value}`);
  }
  return wardType;
}

export function parseBedStatus(value: string): BedStatus {
  const status = Object.values(BedStatus).find((candidate) => candidate === value.trim().toUpperCase());
  if (!status) {
    throw new ValidationError(`Invalid bed status: ${value}`);
  }
  return status;
}

/**
 * Bed & admission state machine. It is the only writer of Bed.status and
 * Admission.status; every change is a compare-and-set on the current status
 * inside a transaction, so two admits racing for one bed cannot both win.
 */
export class AdmissionService {
  private readonly clock: Clock;
  private readonly onRateChange?: RateChangeListener;

  constructor(
    private readonly dataSource: DataSource,
    private readonly ids: IdGenerator,
    options: AdmissionServiceOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.onRateChange = options.onRateChange;
  }

  // ---------------------------------------------------------------- beds

  async createBed(input: CreateBedInput): Promise<Bed> {
    const bedNumber = input.bedNumber?.trim();
    if (!bedNumber) {
      throw new ValidationError('Bed number is required');
    }
    if (bedNumber.length > MAX_BED_NUMBER_LENGTH) {
      throw new ValidationError(`Bed number cannot exceed ${MAX_BED_NUMBER_LENGTH} characters`);
    }
    const wardType = parseWardType(input.wardType);
    const perDayCharge = roundMoney(input.perDayCharge, 'Per-day charge');
    if (isNegative(perDayCharge)) {
      throw new ValidationError('Per-day charge cannot be negative');
    }

    const conflict = `Bed number ${bedNumber} already exists`;
    return runInTransaction(this.dataSource, conflict, async (manager) => {
      if (await manager.existsBy(Bed, { bedNumber })) {
        throw new ConflictError(conflict);
      }
      const bed = manager.create(Bed, {
        id: await this.ids.generateId(ID_PREFIXES.bed),
        bedNumber,
        wardType,
        perDayCharge,
        status: BedStatus.AVAILABLE
      });
      return manager.save(bed);
    });
  }

  async getBed(bedId: string): Promise<Bed> {
    const bed = await this.dataSource.getRepository(Bed).findOneBy({ id: bedId });
    if (!bed) {
      throw new NotFoundError('Bed', bedId);
    }
    return bed;
  }

  listBeds(wardType?: WardType): Promise<Bed[]> {
    return this.dataSource.getRepository(Bed).find({
      where: wardType ? { wardType } : {},
      order: { bedNumber: 'ASC' }
    });
  }

  listAvailableBeds(wardType?: WardType): Promise<Bed[]> {
    return this.dataSource.getRepository(Bed).find({
      where: wardType ? { wardType, status: BedStatus.AVAILABLE } : { status: BedStatus.AVAILABLE },
      order: { bedNumber: 'ASC' }
    });
  }

  async getOccupancyStats(): Promise<OccupancyStats> {
    const rows = await this.dataSource
      .getRepository(Bed)
      .createQueryBuilder('bed')
      .select('bed.wardType', 'wardType')
      .addSelect('bed.status', 'status')
      .addSelect('COUNT(*)', 'count')
      .groupBy('bed.wardType')
      .addGroupBy('bed.status')
      .getRawMany<{ wardType: string; status: string; count: string | number }>();

    const countOf = (wardType: WardType, status: BedStatus) =>
      rows
        .filter((row) => row.wardType === wardType && row.status === status)
        .reduce((acc, row) => acc + Number(row.count), 0);

    const wards = Object.values(WardType).map((wardType): WardOccupancy => {
      const available = countOf(wardType, BedStatus.AVAILABLE);
      const occupied = countOf(wardType, BedStatus.OCCUPIED);
      const maintenance = countOf(wardType, BedStatus.MAINTENANCE);
      return { wardType, total: available + occupied + maintenance, available, occupied, maintenance };
    });

    return {
      wards,
      total: wards.reduce((acc, ward) => acc + ward.total, 0),
      available: wards.reduce((acc, ward) => acc + ward.available, 0),
      occupied: wards.reduce((acc, ward) => acc + ward.occupied, 0),
      maintenance: wards.reduce((acc, ward) => acc + ward.maintenance, 0)
    };
  }

  /**
   * Takes a bed in or out of service. Occupancy is never set by hand.
   */
  async updateBedStatus(bedId: string, status: BedStatus): Promise<Bed> {
    if (!MANUAL_BED_STATUSES.includes(status)) {
      throw new ValidationError(`Bed status can only be set to ${MANUAL_BED_STATUSES.join(' or ')}`);
    }

    return runInTransaction(this.dataSource, `Bed ${bedId} could not be updated`, async (manager) => {
      const bed = await manager.findOneBy(Bed, { id: bedId });
      if (!bed) {
        throw new NotFoundError('Bed', bedId);
      }
      if (bed.status === status) {
        return bed;
      }
      if (bed.status === BedStatus.OCCUPIED) {
        throw new ConflictError(`Bed ${bed.bedNumber} is occupied; discharge or move the patient first`);
      }
      await this.transitionBed(manager, bedId, bed.status, status);
      log.info('Bed status changed', { bedId, from: bed.status, to: status });
      return this.reloadBed(manager, bedId);
    });
  }

  async updateBedRate(bedId: string, perDayCharge: Money | number, actorId: string): Promise<Bed> {
    const newRate = roundMoney(perDayCharge, 'Per-day charge');
    if (isNegative(newRate)) {
      throw new ValidationError('Per-day charge cannot be negative');
    }

    return runInTransaction(this.dataSource, `Bed ${bedId} could not be updated`, async (manager) => {
      const bed = await manager.findOneBy(Bed, { id: bedId });
      if (!bed) {
        throw new NotFoundError('Bed', bedId);
      }
      const oldRate = bed.perDayCharge;
      if (oldRate === newRate) {
        return bed;
      }
      await manager.update(Bed, { id: bedId }, { perDayCharge: newRate });
      if (this.onRateChange) {
        await this.onRateChange({
          actorId,
          tableName: BEDS_TABLE,
          recordId: bedId,
          field: 'perDayCharge',
          oldRate,
          newRate
        }, manager);
      }
      return this.reloadBed(manager, bedId);
    });
  }

  // ----------------------------------------------------------- admissions

  async admit(input: AdmitInput): Promise<Admission> {
    const fileCharge = roundMoney(input.fileCharge, 'File charge');
    if (isNegative(fileCharge)) {
      throw new ValidationError('File charge cannot be negative');
    }
    const admissionDate = input.admissionDate === undefined
      ? this.clock()
      : parseTimestamp(input.admissionDate, 'Admission date');
    const visitId = input.visitId ?? null;

    // A unique index on active admissions backs the check below when two admits race
    const admission = await runInTransaction(this.dataSource, `Patient ${input.patientId} is already admitted`, async (manager) => {
      const patient = await manager.findOneBy(Patient, { id: input.patientId });
      if (!patient) {
        throw new NotFoundError('Patient', input.patientId);
      }

      if (visitId !== null) {
        const visit = await manager.findOneBy(Visit, { id: visitId });
        if (!visit) {
          throw new NotFoundError('Visit', visitId);
        }
        if (visit.patientId !== patient.id) {
          throw new ValidationError(`Visit ${visitId} belongs to a different patient`);
        }
      }

      const active = await manager.findOneBy(Admission, {
        patientId: patient.id,
        status: AdmissionStatus.ADMITTED
      });
      if (active) {
        throw new ConflictError(`Patient ${patient.id} is already admitted (admission ${active.id})`);
      }

      await this.transitionBed(manager, input.bedId, BedStatus.AVAILABLE, BedStatus.OCCUPIED);

      const created = manager.create(Admission, {
        id: await this.ids.generateAdmissionId(),
        patientId: patient.id,
        visitId,
        bedId: input.bedId,
        admissionDate,
        dischargeDate: null,
        fileCharge,
        status: AdmissionStatus.ADMITTED
      });
      return manager.save(created);
    });

    log.info('Patient admitted', {
      admissionId: admission.id,
      patientId: admission.patientId,
      bedId: admission.bedId
    });
    return admission;
  }

  /**
   * Moves an active admission to another bed. The old bed is freed, the new
   * one occupied and the admission repointed in one transaction.
   */
  async changeBed(admissionId: string, newBedId: string): Promise<Admission> {
    const { admission, oldBedId } = await runInTransaction(this.dataSource, `Admission ${admissionId} could not be moved`, async (manager) => {
      const current = await this.requireAdmitted(manager, admissionId);
      const moved = await manager.update(
        Admission,
        { id: admissionId, status: AdmissionStatus.ADMITTED, bedId: current.bedId },
        { bedId: newBedId }
      );
      if (moved.affected !== 1) {
        throw new ConflictError(`Admission ${admissionId} changed while moving beds`);
      }
      await this.transitionBed(manager, newBedId, BedStatus.AVAILABLE, BedStatus.OCCUPIED);
      await this.transitionBed(manager, current.bedId, BedStatus.OCCUPIED, BedStatus.AVAILABLE);
      return { admission: await this.reloadAdmission(manager, admissionId), oldBedId: current.bedId };
    });

    log.info('Bed changed', { admissionId, fromBedId: oldBedId, toBedId: newBedId });
    return admission;
  }

  discharge(admissionId: string, dischargeDate?: Date | string): Promise<Admission> {
    return this.endStay(admissionId, AdmissionStatus.DISCHARGED, dischargeDate);
  }

  /** Ends the stay because the patient left for another facility. */
  transferOut(admissionId: string, transferDate?: Date | string): Promise<Admission> {
    return this.endStay(admissionId, AdmissionStatus.TRANSFERRED, transferDate);
  }

  async computeBedCharges(admissionId: string): Promise<BedChargeSummary> {
    const admission = await this.dataSource.getRepository(Admission).findOne({
      where: { id: admissionId },
      relations: { bed: true }
    });
    if (!admission) {
      throw new NotFoundError('Admission', admissionId);
    }
    const days = stayDays(admission.admissionDate, admission.dischargeDate ?? this.clock());
    return {
      admissionId,
      bedId: admission.bedId,
      days,
      perDayCharge: admission.bed.perDayCharge,
      total: multiplyMoney(admission.bed.perDayCharge, days)
    };
  }

  async getAdmission(admissionId: string): Promise<Admission> {
    const admission = await this.dataSource.getRepository(Admission).findOne({
      where: { id: admissionId },
      relations: { patient: true, bed: true }
    });
    if (!admission) {
      throw new NotFoundError('Admission', admissionId);
    }
    return admission;
  }

  listActiveAdmissions(): Promise<Admission[]> {
    return this.dataSource.getRepository(Admission).find({
      where: { status: AdmissionStatus.ADMITTED },
      relations: { patient: true, bed: true },
      order: { admissionDate: 'ASC' }
    });
  }

  listPatientAdmissions(patientId: string): Promise<Admission[]> {
    return this.dataSource.getRepository(Admission).find({
      where: { patientId },
      relations: { bed: true },
      order: { admissionDate: 'DESC' }
    });
  }

  private async endStay(admissionId: string, to: AdmissionStatus, at?: Date | string): Promise<Admission> {
    const endedAt = at === undefined ? this.clock() : parseTimestamp(at, 'Discharge date');

    const admission = await runInTransaction(this.dataSource, `Admission ${admissionId} could not be closed`, async (manager) => {
      const current = await this.requireAdmitted(manager, admissionId);
      if (!ADMISSION_TRANSITIONS[current.status].includes(to)) {
        throw new ConflictError(`Admission ${admissionId} cannot move from ${current.status} to ${to}`);
      }
      if (endedAt.getTime() < current.admissionDate.getTime()) {
        throw new ValidationError('Discharge date cannot be before the admission date');
      }
      const closed = await manager.update(
        Admission,
        { id: admissionId, status: AdmissionStatus.ADMITTED },
        { status: to, dischargeDate: endedAt }
      );
      if (closed.affected !== 1) {
        throw new ConflictError(`Admission ${admissionId} is no longer admitted`);
      }
      await this.transitionBed(manager, current.bedId, BedStatus.OCCUPIED, BedStatus.AVAILABLE);
      return this.reloadAdmission(manager, admissionId);
    });

    log.info(to === AdmissionStatus.DISCHARGED ? 'Patient discharged' : 'Patient transferred out', {
      admissionId,
      bedId: admission.bedId
    });
    return admission;
  }

  private async requireAdmitted(manager: EntityManager, admissionId: string): Promise<Admission> {
    const admission = await manager.findOneBy(Admission, { id: admissionId });
    if (!admission) {
      throw new NotFoundError('Admission', admissionId);
    }
    if (admission.status !== AdmissionStatus.ADMITTED) {
      throw new ConflictError(`Admission ${admissionId} is not active (current status: ${admission.status})`);
    }
    return admission;
  }

  /**
   * Compare-and-set on Bed.status. Fails with the bed's actual status when
   * another writer got there first.
   */
  private async transitionBed(manager: EntityManager, bedId: string, from: BedStatus, to: BedStatus) {
    if (!BED_TRANSITIONS[from].includes(to)) {
      throw new ConflictError(`Bed cannot move from ${from} to ${to}`);
    }
    const result = await manager.update(Bed, { id: bedId, status: from }, { status: to });
    if (result.affected === 1) {
      return;
    }
    const bed = await manager.findOneBy(Bed, { id: bedId });
    if (!bed) {
      throw new NotFoundError('Bed', bedId);
    }
    if (from === BedStatus.AVAILABLE) {
      throw new ConflictError(`Bed ${bed.bedNumber} is not available (current status: ${bed.status})`);
    }
    throw new ConflictError(`Bed ${bed.bedNumber} is ${bed.status}, expected ${from}`);
  }

  private async reloadBed(manager: EntityManager, bedId: string): Promise<Bed> {
    const bed = await manager.findOneBy(Bed, { id: bedId });
    if (!bed) {
      throw new NotFoundError('Bed', bedId);
    }
    return bed;
  }

  private async reloadAdmission(manager: EntityManager, admissionId: string): Promise<Admission> {
    const admission = await manager.findOneBy(Admission, { id: admissionId });
    if (!admission) {
      throw new NotFoundError('Admission', admissionId);
    }
    return admission;
  }
}
