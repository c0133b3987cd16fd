import { DataSource } from 'typeorm';
import { Admission, AdmissionStatus } from '../models/Admission';
import { Charge } from '../models/Charge';
import { Payment, PaymentType } from '../models/Payment';
import { Visit } from '../models/Visit';
import { NotFoundError } from '../lib/errors';
import { Clock, systemClock } from '../lib/dates';
import { Money, subtractMoney, sumMoney } from '../lib/money';
import { AdmissionService, stayDays } from './admissionService';

export const FILE_CHARGE_GROUP = 'FILE_CHARGE';
export const OPD_FEE_GROUP = 'OPD_FEE';

export interface BillLine {
  name: string;
  quantity: number;
  rate: Money;
  total: Money;
}

export interface BillPayment {
  paymentId: string;
  date: string;
  amount: Money;
  mode: string;
  type: PaymentType;
  reference: string | null;
}

export interface DischargeBill {
  admissionId: string;
  patient: {
    id: string;
    name: string;
    age: number;
    gender: string;
    mobile: string;
    address: string;
  };
  admission: {
    status: AdmissionStatus;
    bedNumber: string;
    admissionDate: string;
    dischargeDate: string | null;
    days: number;
  };
  chargesByType: Record<string, BillLine[]>;
  payments: BillPayment[];
  summary: {
    totalCharges: Money;
    totalPaid: Money;
    advancePaid: Money;
    balanceDue: Money;
  };
  generatedAt: string;
}

const lineOf = (charge: Charge): BillLine => ({
  name: charge.chargeName,
  quantity: charge.quantity,
  rate: charge.rate,
  total: charge.totalAmount
});

const singleLine = (name: string, amount: Money): BillLine => ({
  name,
  quantity: 1,
  rate: amount,
  total: amount
});

/**
 * Composes the final statement of an admission. Reading a bill changes
 * nothing; discharging goes through the admission state machine.
 */
export class DischargeService {
  private readonly clock: Clock;

  constructor(
    private readonly dataSource: DataSource,
    private readonly admissions: AdmissionService,
    options: { clock?: Clock } = {}
  ) {
    this.clock = options.clock ?? systemClock;
  }

  async generateDischargeBill(admissionId: string): Promise<DischargeBill> {
    const manager = this.dataSource.manager;
    const admission = await manager.findOne(Admission, {
      where: { id: admissionId },
      relations: { patient: true, bed: true }
    });
    if (!admission) {
      throw new NotFoundError('Admission', admissionId);
    }
    const visit = admission.visitId
      ? await manager.findOneBy(Visit, { id: admission.visitId })
      : null;
    const charges = await manager.find(Charge, {
      where: { admissionId },
      order: { chargeDate: 'ASC', id: 'ASC' }
    });
    const payments = await manager.find(Payment, {
      where: { admissionId },
      order: { paymentDate: 'ASC', id: 'ASC' }
    });

    // The file charge and consultation fee are not charge rows, so they are
    // added as synthetic groups ahead of the ledger lines.
    const chargesByType: Record<string, BillLine[]> = {
      [FILE_CHARGE_GROUP]: [singleLine('IPD File Charge', admission.fileCharge)]
    };
    if (visit) {
      chargesByType[OPD_FEE_GROUP] = [singleLine('OPD Consultation Fee', visit.opdFee)];
    }
    for (const charge of charges) {
      if (!chargesByType[charge.chargeType]) {
        chargesByType[charge.chargeType] = [];
      }
      chargesByType[charge.chargeType].push(lineOf(charge));
    }

    const totalCharges = sumMoney(
      Object.values(chargesByType).flatMap((lines) => lines.map((line) => line.total))
    );
    const totalPaid = sumMoney(payments.map((payment) => payment.amount));
    const advancePaid = sumMoney(
      payments
        .filter((payment) => payment.paymentType === PaymentType.IPD_ADVANCE)
        .map((payment) => payment.amount)
    );
    const now = this.clock();

    return {
      admissionId,
      patient: {
        id: admission.patient.id,
        name: admission.patient.name,
        age: admission.patient.age,
        gender: admission.patient.gender,
        mobile: admission.patient.mobileNumber,
        address: admission.patient.address
      },
      admission: {
        status: admission.status,
        bedNumber: admission.bed.bedNumber,
        admissionDate: admission.admissionDate.toISOString(),
        dischargeDate: admission.dischargeDate ? admission.dischargeDate.toISOString() : null,
        days: stayDays(admission.admissionDate, admission.dischargeDate ?? now)
      },
      chargesByType,
      payments: payments.map((payment) => ({
        paymentId: payment.id,
        date: payment.paymentDate.toISOString(),
        amount: payment.amount,
        mode: payment.paymentMode,
        type: payment.paymentType,
        reference: payment.transactionReference
      })),
      summary: {
        totalCharges,
        totalPaid,
        advancePaid,
        // Negative when advances exceed the bill: a refund is due
        balanceDue: subtractMoney(totalCharges, totalPaid)
      },
      generatedAt: now.toISOString()
    };
  }

  /** Fails with a conflict when the admission is no longer active. */
  processDischarge(admissionId: string, dischargeDate?: Date | string): Promise<Admission> {
    return this.admissions.discharge(admissionId, dischargeDate);
  }

  async calculatePendingAmount(admissionId: string): Promise<Money> {
    const bill = await this.generateDischargeBill(admissionId);
    return bill.summary.balanceDue;
  }
}
