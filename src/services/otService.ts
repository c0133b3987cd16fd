import { DataSource } from 'typeorm';
import { OtProcedure } from '../models/OtProcedure';
import { Admission } from '../models/Admission';
import { Charge, ChargeType } from '../models/Charge';
import { NotFoundError, ValidationError } from '../lib/errors';
import { parseTimestamp } from '../lib/dates';
import { Money, isNegative, roundMoney, toPaise } from '../lib/money';
import { createLogger } from '../lib/logger';
import { IdGenerator, ID_PREFIXES } from './idGenerator';
import { BillingService, ChargeItem } from './billingService';

const log = createLogger({ service: 'ot' });

export interface OtProcedureInput {
  admissionId: string;
  operationName: string;
  operationDate: Date | string;
  durationMinutes: number;
  surgeonName: string;
  anesthesiaType?: string | null;
  notes?: string | null;
  createdBy: string;
}

export interface OtChargeAmounts {
  surgeonCharge: Money | number;
  anesthesiaCharge: Money | number;
  facilityCharge: Money | number;
  assistantCharge?: Money | number | null;
}

const CHARGE_LABELS: ReadonlyArray<[keyof OtChargeAmounts, string]> = [
  ['surgeonCharge', 'Surgeon'],
  ['anesthesiaCharge', 'Anesthesia'],
  ['facilityCharge', 'Facility'],
  ['assistantCharge', 'Assistant']
];

function requireText(value: string | undefined, message: string): string {
  const trimmed = value?.trim();
  if (!trimmed) {
    throw new ValidationError(message);
  }
  return trimmed;
}

/** Operation theater records. Their fees are OT lines in the billing ledger. */
export class OtService {
  constructor(
    private readonly dataSource: DataSource,
    private readonly ids: IdGenerator,
    private readonly billing: BillingService
  ) {}

  async createProcedure(input: OtProcedureInput): Promise<OtProcedure> {
    const operationName = requireText(input.operationName, 'Operation name is required');
    const surgeonName = requireText(input.surgeonName, 'Surgeon name is required');
    if (!Number.isInteger(input.durationMinutes) || input.durationMinutes <= 0) {
      throw new ValidationError('Duration must be a positive number of minutes');
    }
    const operationDate = parseTimestamp(input.operationDate, 'Operation date');

    if (!(await this.dataSource.getRepository(Admission).existsBy({ id: input.admissionId }))) {
      throw new NotFoundError('Admission', input.admissionId);
    }

    const repo = this.dataSource.getRepository(OtProcedure);
    const procedure = await repo.save(repo.create({
      id: await this.ids.generateId(ID_PREFIXES.ot),
      admissionId: input.admissionId,
      operationName,
      operationDate,
      durationMinutes: input.durationMinutes,
      surgeonName,
      anesthesiaType: input.anesthesiaType?.trim() || null,
      notes: input.notes?.trim() || null,
      createdBy: input.createdBy
    }));
    log.info('OT procedure recorded', { otId: procedure.id, admissionId: procedure.admissionId });
    return procedure;
  }

  async getProcedure(otId: string): Promise<OtProcedure> {
    const procedure = await this.dataSource.getRepository(OtProcedure).findOneBy({ id: otId });
    if (!procedure) {
      throw new NotFoundError('OT procedure', otId);
    }
    return procedure;
  }

  listProcedures(admissionId: string): Promise<OtProcedure[]> {
    return this.dataSource.getRepository(OtProcedure).find({
      where: { admissionId },
      order: { operationDate: 'DESC' }
    });
  }

  /**
   * Bills a procedure's fees against its admission, one OT line per non-zero
   * fee, all in one transaction.
   */
  async addOtCharges(admissionId: string, otId: string, amounts: OtChargeAmounts, createdBy: string): Promise<Charge[]> {
    const items: ChargeItem[] = [];
    const procedure = await this.getProcedure(otId);
    if (procedure.admissionId !== admissionId) {
      throw new ValidationError(`OT procedure ${otId} belongs to a different admission`);
    }

    for (const [key, label] of CHARGE_LABELS) {
      const value = amounts[key];
      if (value === undefined || value === null) {
        continue;
      }
      const rate = roundMoney(value, `${label} charge`);
      if (isNegative(rate)) {
        throw new ValidationError(`${label} charge cannot be negative`);
      }
      if (toPaise(rate) > 0) {
        items.push({ name: `OT ${label} Charge - ${procedure.operationName}`, rate, quantity: 1 });
      }
    }

    if (items.length === 0) {
      return [];
    }
    return this.billing.addCharges(ChargeType.OT, { kind: 'admission', admissionId }, items, createdBy);
  }

  listOtCharges(admissionId: string): Promise<Charge[]> {
    return this.billing.listChargesByType({ kind: 'admission', admissionId }, ChargeType.OT);
  }
}
