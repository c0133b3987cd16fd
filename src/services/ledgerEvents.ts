import { EntityManager } from 'typeorm';
import { Money } from '../lib/money';
import { Charge } from '../models/Charge';

/**
 * Hooks through which the ledgers report privileged mutations. They run inside
 * the mutating transaction, so a failed hook rolls the mutation back.
 */

export interface ChargeSnapshot {
  [key: string]: string | number | null;
  chargeName: string;
  rate: Money;
  quantity: number;
  totalAmount: Money;
  visitId: string | null;
  admissionId: string | null;
}

export type ChargeAuditEvent =
  | { kind: 'created'; actorId: string; chargeId: string; after: ChargeSnapshot }
  | { kind: 'updated'; actorId: string; chargeId: string; before: ChargeSnapshot; after: ChargeSnapshot };

export type ChargeAuditListener = (event: ChargeAuditEvent, manager: EntityManager) => Promise<void>;

export interface RateChangeEvent {
  actorId: string;
  tableName: string;
  recordId: string;
  field: string;
  oldRate: Money;
  newRate: Money;
}

export type RateChangeListener = (event: RateChangeEvent, manager: EntityManager) => Promise<void>;

export const chargeSnapshot = (charge: Charge): ChargeSnapshot => ({
  chargeName: charge.chargeName,
  rate: charge.rate,
  quantity: charge.quantity,
  totalAmount: charge.totalAmount,
  visitId: charge.visitId,
  admissionId: charge.admissionId
});
