import { Entity, PrimaryColumn, Column, ManyToOne, Index } from 'typeorm';
import { Money } from '../lib/money';
import type { DischargeBill } from '../services/dischargeService';
import { Patient } from './Patient';
import { Visit, VisitType } from './Visit';
import { Admission } from './Admission';
import { PaymentMode } from './Payment';

export enum SlipType {
  OPD = 'OPD',
  INVESTIGATION = 'INVESTIGATION',
  PROCEDURE = 'PROCEDURE',
  SERVICE = 'SERVICE',
  OT = 'OT',
  DISCHARGE = 'DISCHARGE'
}

export enum PrinterFormat {
  A4 = 'A4',
  THERMAL = 'THERMAL'
}

export interface SlipPatient {
  id: string;
  name: string;
  age: number;
  gender: string;
  mobile: string;
}

export interface SlipLine {
  name: string;
  quantity: number;
  rate: Money;
  total: Money;
}

export interface OpdSlipContent {
  slipType: SlipType.OPD;
  patient: SlipPatient;
  visit: {
    id: string;
    type: VisitType;
    date: string;
    time: string;
    serialNumber: number;
  };
  doctor: {
    name: string;
    department: string;
  };
  charges: {
    opdFee: Money;
    paymentMode: PaymentMode;
  };
  generatedAt: string;
}

export interface ChargeSlipContent {
  slipType: SlipType.INVESTIGATION | SlipType.PROCEDURE | SlipType.SERVICE | SlipType.OT;
  patient: SlipPatient;
  visitId: string | null;
  admissionId: string | null;
  lines: SlipLine[];
  totalAmount: Money;
  generatedAt: string;
}

export interface DischargeSlipContent {
  slipType: SlipType.DISCHARGE;
  bill: DischargeBill;
  generatedAt: string;
}

export type SlipContent = OpdSlipContent | ChargeSlipContent | DischargeSlipContent;

/**
 * Slip entity - a printed document, kept so it can be reprinted unchanged
 * A reprint copies the content and QR code and points back at originalSlipId
 */
@Entity('slips')
@Index(['patientId', 'generatedAt'])
export class Slip {
  // SLIP + YYYYMMDDHHMMSS + 3-digit sequence
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

  @ManyToOne(() => Admission, { nullable: true })
  admission!: Admission | null;

  @Column({ type: 'varchar', length: 20, nullable: true })
  admissionId!: string | null;

  @Column({ type: 'simple-enum', enum: SlipType })
  slipType!: SlipType;

  @Column({ type: 'varchar', length: 100 })
  qrData!: string;

  // PNG data URL
  @Column({ type: 'text' })
  qrCode!: string;

  @Column({ type: 'simple-json' })
  content!: SlipContent;

  @Column({ type: 'simple-enum', enum: PrinterFormat, default: PrinterFormat.A4 })
  printerFormat!: PrinterFormat;

  @Column({ default: false })
  isReprinted!: boolean;

  @Column({ type: 'varchar', length: 30, nullable: true })
  originalSlipId!: string | null;

  @Column()
  generatedAt!: Date;

  @Column({ type: 'varchar', length: 50 })
  generatedBy!: string;
}
