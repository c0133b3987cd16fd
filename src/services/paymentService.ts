import { DataSource, EntityManager, FindOptionsWhere, In } from 'typeorm';
import { Payment, PaymentMode, PaymentStatus, PaymentType } from '../models/Payment';
import { Patient } from '../models/Patient';
import { Visit } from '../models/Visit';
import { Admission } from '../models/Admission';
import { Charge } from '../models/Charge';
import { NotFoundError, ValidationError } from '../lib/errors';
import { Clock, parseTimestamp, systemClock } from '../lib/dates';
import { Money, roundMoney, subtractMoney, sumMoney, toPaise } from '../lib/money';
import { createLogger } from '../lib/logger';
import { runInTransaction } from '../lib/transactions';
import { IdGenerator, ID_PREFIXES } from './idGenerator';
import { ChargeTarget } from './billingService';

const log = createLogger({ service: 'payment' });

export type PaymentTarget = ChargeTarget | { kind: 'none' };

export interface RecordPaymentInput {
  patientId: string;
  amount: Money | number;
  paymentMode: string;
  paymentType: PaymentType;
  target?: PaymentTarget;
  createdBy: string;
  transactionReference?: string | null;
  notes?: string | null;
  paymentDate?: Date | string;
}

export interface AdvanceExtras {
  transactionReference?: string | null;
  notes?: string | null;
}

export interface BalanceScope {
  visitId?: string | null;
  admissionId?: string | null;
}

export interface PatientBalance {
  patientId: string;
  totalCharges: Money;
  totalPaid: Money;
  balanceDue: Money;
  advanceBalance: Money;
}

export function parsePaymentMode(value: string): PaymentMode {
  const mode = Object.values(PaymentMode).find((candidate) => candidate === value.trim().toUpperCase());
  if (!mode) {
    throw new ValidationError(`Payment mode must be one of: ${Object.values(PaymentMode).join(', ')}`);
  }
  return mode;
}

export function parsePaymentType(value: string): PaymentType {
  const paymentType = Object.values(PaymentType).find((candidate) => candidate === value.trim().toUpperCase());
  if (!paymentType) {
    throw new ValidationError(`Invalid payment type: ${value}`);
  }
  return paymentType;
}

/** Like a charge target, except a payment may also stand on the patient alone. */
export function parsePaymentTarget(visitId?: string | null, admissionId?: string | null): PaymentTarget {
  const visit = visitId?.trim();
  const admission = admissionId?.trim();
  if (visit && admission) {
    throw new ValidationError('A payment cannot belong to both a visit and an admission');
  }
  if (visit) {
    return { kind: 'visit', visitId: visit };
  }
  if (admission) {
    return { kind: 'admission', admissionId: admission };
  }
  return { kind: 'none' };
}

const isAdvance = (payment: Payment) => payment.paymentType === PaymentType.IPD_ADVANCE;

/**
 * Payment ledger. Balances are always recomputed from committed rows.
 */
export class PaymentService {
  private readonly clock: Clock;

  constructor(
    private readonly dataSource: DataSource,
    private readonly ids: IdGenerator,
    options: { clock?: Clock } = {}
  ) {
    this.clock = options.clock ?? systemClock;
  }

  async recordPayment(input: RecordPaymentInput): Promise<Payment> {
    const amount = roundMoney(input.amount, 'Amount');
    if (toPaise(amount) <= 0) {
      throw new ValidationError('Amount must be positive');
    }
    const paymentMode = parsePaymentMode(input.paymentMode);
    if (!Object.values(PaymentType).includes(input.paymentType)) {
      throw new ValidationError(`Invalid payment type: ${input.paymentType}`);
    }
    if (!input.createdBy?.trim()) {
      throw new ValidationError('Actor is required');
    }
    const target: PaymentTarget = input.target ?? { kind: 'none' };
    const paymentDate = input.paymentDate === undefined
      ? this.clock()
      : parseTimestamp(input.paymentDate, 'Payment date');

    const payment = await runInTransaction(this.dataSource, 'Payment conflicts with an existing record', async (manager) => {
      if (!(await manager.existsBy(Patient, { id: input.patientId }))) {
        throw new NotFoundError('Patient', input.patientId);
      }
      await this.requireOwnedTarget(manager, input.patientId, target);

      const created = manager.create(Payment, {
        id: await this.ids.generateId(ID_PREFIXES.payment),
        patientId: input.patientId,
        visitId: target.kind === 'visit' ? target.visitId : null,
        admissionId: target.kind === 'admission' ? target.admissionId : null,
        paymentType: input.paymentType,
        amount,
        paymentMode,
        paymentStatus: PaymentStatus.COMPLETED,
        transactionReference: input.transactionReference?.trim() || null,
        notes: input.notes?.trim() || null,
        paymentDate,
        createdBy: input.createdBy
      });
      return manager.save(created);
    });

    log.info('Payment recorded', {
      paymentId: payment.id,
      patientId: payment.patientId,
      paymentType: payment.paymentType,
      amount: payment.amount
    });
    return payment;
  }

  /** An inpatient advance, held against the discharge bill. */
  async recordAdvance(
    admissionId: string,
    amount: Money | number,
    paymentMode: string,
    createdBy: string,
    extras: AdvanceExtras = {}
  ): Promise<Payment> {
    const admission = await this.dataSource.getRepository(Admission).findOneBy({ id: admissionId });
    if (!admission) {
      throw new NotFoundError('Admission', admissionId);
    }
    return this.recordPayment({
      patientId: admission.patientId,
      amount,
      paymentMode,
      paymentType: PaymentType.IPD_ADVANCE,
      target: { kind: 'admission', admissionId },
      createdBy,
      transactionReference: extras.transactionReference,
      notes: extras.notes
    });
  }

  async getPayment(paymentId: string): Promise<Payment> {
    const payment = await this.dataSource.getRepository(Payment).findOneBy({ id: paymentId });
    if (!payment) {
      throw new NotFoundError('Payment', paymentId);
    }
    return payment;
  }

  listByPatient(patientId: string): Promise<Payment[]> {
    return this.find({ patientId });
  }

  listByVisit(visitId: string): Promise<Payment[]> {
    return this.find({ visitId });
  }

  listByAdmission(admissionId: string): Promise<Payment[]> {
    return this.find({ admissionId });
  }

  listAdvances(admissionId: string): Promise<Payment[]> {
    return this.find({ admissionId, paymentType: PaymentType.IPD_ADVANCE });
  }

  async calculateTotalPaid(target: PaymentTarget | { kind: 'patient'; patientId: string }): Promise<Money> {
    const payments = await this.listForTarget(target);
    return sumMoney(payments.map((payment) => payment.amount));
  }

  /**
   * Charges less payments for one scope. With neither visit nor admission
   * given the scope is everything the patient has ever been billed and paid;
   * otherwise it is the given visit and/or admission. Consultation fees and
   * file charges count as charges even though they are not charge rows.
   */
  async calculateBalance(patientId: string, scope: BalanceScope = {}): Promise<PatientBalance> {
    const manager = this.dataSource.manager;
    if (!(await manager.existsBy(Patient, { id: patientId }))) {
      throw new NotFoundError('Patient', patientId);
    }

    const visitIds: string[] = [];
    const admissionIds: string[] = [];
    const fees: Money[] = [];

    if (!scope.visitId && !scope.admissionId) {
      const visits = await manager.findBy(Visit, { patientId });
      const admissions = await manager.findBy(Admission, { patientId });
      visitIds.push(...visits.map((visit) => visit.id));
      admissionIds.push(...admissions.map((admission) => admission.id));
      fees.push(...visits.map((visit) => visit.opdFee), ...admissions.map((admission) => admission.fileCharge));
    }
    if (scope.visitId) {
      const visit = await this.requireOwnedVisit(manager, scope.visitId, patientId);
      visitIds.push(visit.id);
      fees.push(visit.opdFee);
    }
    if (scope.admissionId) {
      const admission = await this.requireOwnedAdmission(manager, scope.admissionId, patientId);
      admissionIds.push(admission.id);
      fees.push(admission.fileCharge);
    }

    const chargeWhere: FindOptionsWhere<Charge>[] = [];
    const paymentWhere: FindOptionsWhere<Payment>[] = [];
    if (visitIds.length > 0) {
      chargeWhere.push({ visitId: In(visitIds) });
      paymentWhere.push({ visitId: In(visitIds) });
    }
    if (admissionIds.length > 0) {
      chargeWhere.push({ admissionId: In(admissionIds) });
      paymentWhere.push({ admissionId: In(admissionIds) });
    }

    const charges = chargeWhere.length > 0 ? await manager.findBy(Charge, chargeWhere) : [];
    const payments = !scope.visitId && !scope.admissionId
      ? await manager.findBy(Payment, { patientId })
      : await manager.findBy(Payment, paymentWhere);

    const totalCharges = sumMoney([...fees, ...charges.map((charge) => charge.totalAmount)]);
    const totalPaid = sumMoney(payments.map((payment) => payment.amount));
    const advanceBalance = sumMoney(payments.filter(isAdvance).map((payment) => payment.amount));

    return {
      patientId,
      totalCharges,
      totalPaid,
      balanceDue: subtractMoney(totalCharges, totalPaid),
      advanceBalance
    };
  }

  private listForTarget(target: PaymentTarget | { kind: 'patient'; patientId: string }): Promise<Payment[]> {
    switch (target.kind) {
      case 'patient':
        return this.listByPatient(target.patientId);
      case 'visit':
        return this.listByVisit(target.visitId);
      case 'admission':
        return this.listByAdmission(target.admissionId);
      case 'none':
        throw new ValidationError('A patient, visit or admission is required');
    }
  }

  private find(where: FindOptionsWhere<Payment>): Promise<Payment[]> {
    return this.dataSource.getRepository(Payment).find({
      where,
      order: { paymentDate: 'ASC', id: 'ASC' }
    });
  }

  private async requireOwnedTarget(manager: EntityManager, patientId: string, target: PaymentTarget) {
    switch (target.kind) {
      case 'visit':
        await this.requireOwnedVisit(manager, target.visitId, patientId);
        return;
      case 'admission':
        await this.requireOwnedAdmission(manager, target.admissionId, patientId);
        return;
      case 'none':
        return;
    }
  }

  private async requireOwnedVisit(manager: EntityManager, visitId: string, patientId: string): Promise<Visit> {
    const visit = await manager.findOneBy(Visit, { id: visitId });
    if (!visit) {
      throw new NotFoundError('Visit', visitId);
    }
    if (visit.patientId !== patientId) {
      throw new ValidationError(`Visit ${visitId} belongs to a different patient`);
    }
    return visit;
  }

  private async requireOwnedAdmission(manager: EntityManager, admissionId: string, patientId: string): Promise<Admission> {
    const admission = await manager.findOneBy(Admission, { id: admissionId });
    if (!admission) {
      throw new NotFoundError('Admission', admissionId);
    }
    if (admission.patientId !== patientId) {
      throw new ValidationError(`Admission ${admissionId} belongs to a different patient`);
    }
    return admission;
  }
}
