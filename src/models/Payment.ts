import { Entity, PrimaryColumn, Column, ManyToOne } from 'typeorm';
import { Money, moneyTransformer } from '../lib/money';
import { Patient } from './Patient';
import { Visit } from './Visit';
import { Admission } from './Admission';

export enum PaymentMode {
  CASH = 'CASH',
  UPI = 'UPI',
  CARD = 'CARD'
}

export enum PaymentType {
  OPD_FEE = 'OPD_FEE',
  IPD_ADVANCE = 'IPD_ADVANCE',
  INVESTIGATION = 'INVESTIGATION',
  PROCEDURE = 'PROCEDURE',
  SERVICE = 'SERVICE',
  OT = 'OT',
  DISCHARGE = 'DISCHARGE',
  MANUAL = 'MANUAL'
}

export enum PaymentStatus {
  COMPLETED = 'COMPLETED',
  PENDING = 'PENDING',
  FAILED = 'FAILED',
  REFUNDED = 'REFUNDED'
}

/**
 * Payment entity - money received from a patient, optionally against a visit or an admission
 */
@Entity('payments')
export class Payment {
  @PrimaryColumn({ type: 'varchar', length: 30 })
  id!: string;

  @ManyToOne(() => Patient)
  patient!: Patient;

  @Column({ type: 'varchar', length: 20 })
  patientId!: string;

  @ManyToOne(() => Visit, { nullable: true })
  visit!: Visit | null;

  @Column({ type: 'varchar', length: 30, nullable: true })
  visitId!: string | null;

  @ManyToOne(() => Admission, admission => admission.payments, { nullable: true })
  admission!: Admission | null;

  @Column({ type: 'varchar', length: 20, nullable: true })
  admissionId!: string | null;

  @Column({ type: 'simple-enum', enum: PaymentType })
  paymentType!: PaymentType;

  @Column({ type: 'decimal', precision: 10, scale: 2, transformer: moneyTransformer })
  amount!: Money;

  @Column({ type: 'simple-enum', enum: PaymentMode })
  paymentMode!: PaymentMode;

  @Column({ type: 'simple-enum', enum: PaymentStatus, default: PaymentStatus.COMPLETED })
  paymentStatus!: PaymentStatus;

  @Column({ type: 'varchar', length: 100, nullable: true })
  transactionReference!: string | null;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;

  @Column()
  paymentDate!: Date;

  @Column({ type: 'varchar', length: 50 })
  createdBy!: string;
}
