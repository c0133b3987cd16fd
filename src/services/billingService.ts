import { DataSource, EntityManager, FindOptionsWhere } from 'typeorm';
import { Charge, ChargeType } from '../models/Charge';
import { Visit } from '../models/Visit';
import { Admission } from '../models/Admission';
import { ConflictError, NotFoundError, ValidationError } from '../lib/errors';
import { Clock, parseTimestamp, systemClock } from '../lib/dates';
import { Money, isNegative, multiplyMoney, roundMoney, storableMoney, sumMoney } from '../lib/money';
import { createLogger } from '../lib/logger';
import { runInTransaction } from '../lib/transactions';
import { IdGenerator, ID_PREFIXES } from './idGenerator';
import { ChargeAuditListener, chargeSnapshot } from './ledgerEvents';
import { stayDays } from './admissionService';

const log = createLogger({ service: 'billing' });

const HOUR_MS = 60 * 60 * 1000;

/** A charge hangs off exactly one visit or exactly one admission. */
export type ChargeTarget =
  | { kind: 'visit'; visitId: string }
  | { kind: 'admission'; admissionId: string };

export interface ChargeItem {
  name: string;
  rate: Money | number;
  quantity?: number;
}

export interface ServiceItem extends ChargeItem {
  startTime?: Date | string;
  endTime?: Date | string;
}

export interface CreateChargeInput {
  chargeType: ChargeType;
  chargeName: string;
  rate: Money | number;
  quantity?: number;
  target: ChargeTarget;
  createdBy: string;
}

export interface ChargeChanges {
  chargeName?: string;
  rate?: Money | number;
  quantity?: number;
}

export interface BillingServiceOptions {
  clock?: Clock;
  onChargeAudit?: ChargeAuditListener;
}

export function parseChargeTarget(visitId?: string | null, admissionId?: string | null): ChargeTarget {
  const visit = visitId?.trim();
  const admission = admissionId?.trim();
  if (visit && admission) {
    throw new ValidationError('A charge cannot belong to both a visit and an admission');
  }
  if (visit) {
    return { kind: 'visit', visitId: visit };
  }
  if (admission) {
    return { kind: 'admission', admissionId: admission };
  }
  throw new ValidationError('Either visitId or admissionId must be provided');
}

export function parseChargeType(value: string): ChargeType {
  const chargeType = Object.values(ChargeType).find((candidate) => candidate === value.trim().toUpperCase());
  if (!chargeType) {
    throw new ValidationError(`Invalid charge type: ${value}`);
  }
  return chargeType;
}

/**
 * Billable hours between two instants, rounded up to the next whole hour.
 * Anything shorter than an hour bills as one.
 */
export function serviceQuantity(start: Date | string, end: Date | string): number {
  const startedAt = parseTimestamp(start, 'Start time');
  const endedAt = parseTimestamp(end, 'End time');
  const elapsed = endedAt.getTime() - startedAt.getTime();
  if (elapsed < 0) {
    throw new ValidationError('End time cannot be before start time');
  }
  return Math.max(1, Math.ceil(elapsed / HOUR_MS));
}

const targetWhere = (target: ChargeTarget): FindOptionsWhere<Charge> =>
  target.kind === 'visit' ? { visitId: target.visitId } : { admissionId: target.admissionId };

const describeTarget = (target: ChargeTarget) =>
  target.kind === 'visit' ? `visit ${target.visitId}` : `admission ${target.admissionId}`;

function checkQuantity(quantity: number) {
  if (!Number.isInteger(quantity) || quantity <= 0) {
    throw new ValidationError('Quantity must be a positive whole number');
  }
}

function checkRate(rate: Money | number): Money {
  const rounded = roundMoney(rate, 'Rate');
  if (isNegative(rounded)) {
    throw new ValidationError('Rate cannot be negative');
  }
  return rounded;
}

const lineTotal = (rate: Money, quantity: number): Money =>
  storableMoney(multiplyMoney(rate, quantity), 'Total amount');

/**
 * Ledger of priced line items. It is the only writer of charge rows; manual
 * charges are reported to the audit hook inside the same transaction.
 */
export class BillingService {
  private readonly clock: Clock;
  private readonly onChargeAudit?: ChargeAuditListener;

  constructor(
    private readonly dataSource: DataSource,
    private readonly ids: IdGenerator,
    options: BillingServiceOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.onChargeAudit = options.onChargeAudit;
  }

  createCharge(input: CreateChargeInput): Promise<Charge> {
    return runInTransaction(this.dataSource, 'Charge conflicts with an existing record', async (manager) => {
      await this.requireTarget(manager, input.target);
      return this.insertCharge(manager, input);
    });
  }

  /** Adds every item or none of them. */
  async addCharges(chargeType: ChargeType, target: ChargeTarget, items: ChargeItem[], createdBy: string): Promise<Charge[]> {
    if (items.length === 0) {
      throw new ValidationError('At least one charge is required');
    }
    return runInTransaction(this.dataSource, 'Charge conflicts with an existing record', async (manager) => {
      await this.requireTarget(manager, target);
      const charges: Charge[] = [];
      for (const item of items) {
        charges.push(await this.insertCharge(manager, {
          chargeType,
          chargeName: item.name,
          rate: item.rate,
          quantity: item.quantity,
          target,
          createdBy
        }));
      }
      log.info('Charges added', { chargeType, target: describeTarget(target), count: charges.length });
      return charges;
    });
  }

  addInvestigationCharges(target: ChargeTarget, items: ChargeItem[], createdBy: string): Promise<Charge[]> {
    return this.addCharges(ChargeType.INVESTIGATION, target, items, createdBy);
  }

  addProcedureCharges(target: ChargeTarget, items: ChargeItem[], createdBy: string): Promise<Charge[]> {
    return this.addCharges(ChargeType.PROCEDURE, target, items, createdBy);
  }

  addManualCharges(target: ChargeTarget, items: ChargeItem[], createdBy: string): Promise<Charge[]> {
    return this.addCharges(ChargeType.MANUAL, target, items, createdBy);
  }

  /**
   * Timed services: when both ends of the window are given the quantity is
   * the billable hours between them, otherwise the item's own quantity.
   */
  async addServiceCharges(target: ChargeTarget, items: ServiceItem[], createdBy: string): Promise<Charge[]> {
    const priced = items.map((item): ChargeItem => {
      if (item.startTime !== undefined && item.endTime !== undefined) {
        return { name: item.name, rate: item.rate, quantity: serviceQuantity(item.startTime, item.endTime) };
      }
      return item;
    });
    return this.addCharges(ChargeType.SERVICE, target, priced, createdBy);
  }

  /**
   * Posts an admission's bed stay as a single BED line: one unit per billable
   * day at the current bed's per-day rate.
   */
  addBedCharge(admissionId: string, createdBy: string): Promise<Charge> {
    return runInTransaction(this.dataSource, 'Charge conflicts with an existing record', async (manager) => {
      const admission = await manager.findOne(Admission, {
        where: { id: admissionId },
        relations: { bed: true }
      });
      if (!admission) {
        throw new NotFoundError('Admission', admissionId);
      }
      if (await manager.existsBy(Charge, { admissionId, chargeType: ChargeType.BED })) {
        throw new ConflictError(`Bed charges for admission ${admissionId} have already been posted`);
      }
      const days = stayDays(admission.admissionDate, admission.dischargeDate ?? this.clock());
      return this.insertCharge(manager, {
        chargeType: ChargeType.BED,
        chargeName: `Bed Charges - ${admission.bed.bedNumber}`,
        rate: admission.bed.perDayCharge,
        quantity: days,
        target: { kind: 'admission', admissionId },
        createdBy
      });
    });
  }

  /**
   * Recomputes the total from the (possibly changed) rate and quantity.
   * Edits to manual charges made by a named actor are audited.
   */
  async updateCharge(chargeId: string, changes: ChargeChanges, actorId?: string): Promise<Charge> {
    const chargeName = changes.chargeName?.trim();
    if (changes.chargeName !== undefined && !chargeName) {
      throw new ValidationError('Charge name cannot be empty');
    }
    const rate = changes.rate === undefined ? undefined : checkRate(changes.rate);
    if (changes.quantity !== undefined) {
      checkQuantity(changes.quantity);
    }

    return runInTransaction(this.dataSource, `Charge ${chargeId} could not be updated`, async (manager) => {
      const charge = await manager.findOneBy(Charge, { id: chargeId });
      if (!charge) {
        throw new NotFoundError('Charge', chargeId);
      }
      const before = chargeSnapshot(charge);

      charge.chargeName = chargeName ?? charge.chargeName;
      charge.rate = rate ?? charge.rate;
      charge.quantity = changes.quantity ?? charge.quantity;
      charge.totalAmount = lineTotal(charge.rate, charge.quantity);
      await manager.update(Charge, { id: chargeId }, {
        chargeName: charge.chargeName,
        rate: charge.rate,
        quantity: charge.quantity,
        totalAmount: charge.totalAmount
      });

      if (charge.chargeType === ChargeType.MANUAL && actorId && this.onChargeAudit) {
        await this.onChargeAudit({
          kind: 'updated',
          actorId,
          chargeId,
          before,
          after: chargeSnapshot(charge)
        }, manager);
      }
      return charge;
    });
  }

  /**
   * Removes a line entered by mistake. Manual charges stay, so their audit
   * trail always points at a live row; correct them with updateCharge.
   */
  async deleteCharge(chargeId: string): Promise<void> {
    await runInTransaction(this.dataSource, `Charge ${chargeId} could not be deleted`, async (manager) => {
      const charge = await manager.findOneBy(Charge, { id: chargeId });
      if (!charge) {
        throw new NotFoundError('Charge', chargeId);
      }
      if (charge.chargeType === ChargeType.MANUAL) {
        throw new ConflictError('Manual charges cannot be deleted; edit them instead');
      }
      await manager.delete(Charge, { id: chargeId });
    });
    log.info('Charge deleted', { chargeId });
  }

  async getCharge(chargeId: string): Promise<Charge> {
    const charge = await this.dataSource.getRepository(Charge).findOneBy({ id: chargeId });
    if (!charge) {
      throw new NotFoundError('Charge', chargeId);
    }
    return charge;
  }

  listCharges(target: ChargeTarget): Promise<Charge[]> {
    return this.dataSource.getRepository(Charge).find({
      where: targetWhere(target),
      order: { chargeDate: 'ASC', id: 'ASC' }
    });
  }

  listChargesByType(target: ChargeTarget, chargeType: ChargeType): Promise<Charge[]> {
    return this.dataSource.getRepository(Charge).find({
      where: { ...targetWhere(target), chargeType },
      order: { chargeDate: 'ASC', id: 'ASC' }
    });
  }

  async calculateTotalCharges(target: ChargeTarget): Promise<Money> {
    const charges = await this.listCharges(target);
    return sumMoney(charges.map((charge) => charge.totalAmount));
  }

  private async insertCharge(manager: EntityManager, input: CreateChargeInput): Promise<Charge> {
    const chargeName = input.chargeName?.trim();
    if (!chargeName) {
      throw new ValidationError('Charge name is required');
    }
    if (!input.createdBy?.trim()) {
      throw new ValidationError('Actor is required');
    }
    const quantity = input.quantity ?? 1;
    checkQuantity(quantity);
    const rate = checkRate(input.rate);

    const charge = manager.create(Charge, {
      id: await this.ids.generateId(ID_PREFIXES.charge),
      visitId: input.target.kind === 'visit' ? input.target.visitId : null,
      admissionId: input.target.kind === 'admission' ? input.target.admissionId : null,
      chargeType: input.chargeType,
      chargeName,
      quantity,
      rate,
      totalAmount: lineTotal(rate, quantity),
      createdBy: input.createdBy
    });
    const saved = await manager.save(charge);

    if (saved.chargeType === ChargeType.MANUAL && this.onChargeAudit) {
      await this.onChargeAudit({
        kind: 'created',
        actorId: input.createdBy,
        chargeId: saved.id,
        after: chargeSnapshot(saved)
      }, manager);
    }
    return saved;
  }

  private async requireTarget(manager: EntityManager, target: ChargeTarget) {
    if (target.kind === 'visit') {
      if (!(await manager.existsBy(Visit, { id: target.visitId }))) {
        throw new NotFoundError('Visit', target.visitId);
      }
      return;
    }
    if (!(await manager.existsBy(Admission, { id: target.admissionId }))) {
      throw new NotFoundError('Admission', target.admissionId);
    }
  }
}
