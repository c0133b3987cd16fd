import { DataSource, EntityManager } from 'typeorm';
import { AuditAction, AuditLog, AuditSnapshot } from '../models/AuditLog';
import { NotFoundError, ValidationError } from '../lib/errors';
import { IdGenerator, ID_PREFIXES } from './idGenerator';
import { ChargeAuditListener, RateChangeListener } from './ledgerEvents';

export const CHARGES_TABLE = 'billing_charges';

export interface AuditEntryInput {
  actorId: string;
  actionType: AuditAction;
  tableName: string;
  recordId: string;
  oldValue?: AuditSnapshot | null;
  newValue?: AuditSnapshot | null;
}

const DEFAULT_LIMIT = 100;

const requireField = (value: string, field: string) => {
  if (!value || !value.trim()) {
    throw new ValidationError(`${field} is required`);
  }
};

/**
 * Append-only audit trail. Entries are written, never updated or deleted,
 * and every query returns them newest first.
 */
export class AuditService {
  constructor(
    private readonly dataSource: DataSource,
    private readonly ids: IdGenerator
  ) {}

  /**
   * Appends one entry. Pass the caller's transaction manager so the entry
   * commits or rolls back together with the mutation it describes.
   */
  async append(input: AuditEntryInput, manager: EntityManager = this.dataSource.manager): Promise<AuditLog> {
    requireField(input.actorId, 'Actor');
    requireField(input.tableName, 'Table name');
    requireField(input.recordId, 'Record id');
    if (!Object.values(AuditAction).includes(input.actionType)) {
      throw new ValidationError(`Unknown audit action: ${input.actionType}`);
    }

    const repo = manager.getRepository(AuditLog);
    const entry = repo.create({
      id: await this.ids.generateId(ID_PREFIXES.log),
      actorId: input.actorId,
      actionType: input.actionType,
      tableName: input.tableName,
      recordId: input.recordId,
      oldValue: input.oldValue ?? null,
      newValue: input.newValue ?? null
    });
    return repo.save(entry);
  }

  async getById(id: string): Promise<AuditLog> {
    const entry = await this.dataSource.getRepository(AuditLog).findOneBy({ id });
    if (!entry) {
      throw new NotFoundError('Audit log', id);
    }
    return entry;
  }

  listByRecord(tableName: string, recordId: string): Promise<AuditLog[]> {
    return this.dataSource.getRepository(AuditLog).find({
      where: { tableName, recordId },
      order: { timestamp: 'DESC', id: 'DESC' }
    });
  }

  listByActor(actorId: string, limit = DEFAULT_LIMIT): Promise<AuditLog[]> {
    return this.dataSource.getRepository(AuditLog).find({
      where: { actorId },
      order: { timestamp: 'DESC', id: 'DESC' },
      take: limit
    });
  }

  listByAction(actionType: AuditAction, limit = DEFAULT_LIMIT): Promise<AuditLog[]> {
    return this.dataSource.getRepository(AuditLog).find({
      where: { actionType },
      order: { timestamp: 'DESC', id: 'DESC' },
      take: limit
    });
  }

  listRecent(limit = DEFAULT_LIMIT): Promise<AuditLog[]> {
    return this.dataSource.getRepository(AuditLog).find({
      order: { timestamp: 'DESC', id: 'DESC' },
      take: limit
    });
  }

  /** Hook for the billing ledger: manual charge additions and edits. */
  chargeListener(): ChargeAuditListener {
    return async (event, manager) => {
      switch (event.kind) {
        case 'created':
          await this.append({
            actorId: event.actorId,
            actionType: AuditAction.MANUAL_CHARGE_ADD,
            tableName: CHARGES_TABLE,
            recordId: event.chargeId,
            newValue: event.after
          }, manager);
          return;
        case 'updated':
          await this.append({
            actorId: event.actorId,
            actionType: AuditAction.MANUAL_CHARGE_EDIT,
            tableName: CHARGES_TABLE,
            recordId: event.chargeId,
            oldValue: event.before,
            newValue: event.after
          }, manager);
          return;
      }
    };
  }

  /** Hook for rate edits on beds and doctor fees. */
  rateChangeListener(): RateChangeListener {
    return async (event, manager) => {
      await this.append({
        actorId: event.actorId,
        actionType: AuditAction.RATE_CHANGE,
        tableName: event.tableName,
        recordId: event.recordId,
        oldValue: { field: event.field, rate: event.oldRate },
        newValue: { field: event.field, rate: event.newRate }
      }, manager);
    };
  }
}
