import { Entity, PrimaryColumn, Column, CreateDateColumn, ManyToOne } from 'typeorm';
import { Money, moneyTransformer } from '../lib/money';
import { Visit } from './Visit';
import { Admission } from './Admission';

export enum ChargeType {
  INVESTIGATION = 'INVESTIGATION',
  PROCEDURE = 'PROCEDURE',
  SERVICE = 'SERVICE',
  OT = 'OT',
  MANUAL = 'MANUAL',
  BED = 'BED'
}

/**
 * Charge entity - one priced line item on a visit or an admission (never both)
 * totalAmount = rate × quantity, kept in sync by the billing service
 */
@Entity('billing_charges')
export class Charge {
  @PrimaryColumn({ type: 'varchar', length: 30 })
  id!: string;

  @ManyToOne(() => Visit, visit => visit.charges, { nullable: true })
  visit!: Visit | null;

  @Column({ type: 'varchar', length: 30, nullable: true })
  visitId!: string | null;

  @ManyToOne(() => Admission, admission => admission.charges, { nullable: true })
  admission!: Admission | null;

  @Column({ type: 'varchar', length: 20, nullable: true })
  admissionId!: string | null;

  @Column({ type: 'simple-enum', enum: ChargeType })
  chargeType!: ChargeType;

  @Column({ type: 'varchar', length: 100 })
  chargeName!: string;

  @Column({ type: 'int', default: 1 })
  quantity!: number;

  @Column({ type: 'decimal', precision: 10, scale: 2, transformer: moneyTransformer })
  rate!: Money;

  @Column({ type: 'decimal', precision: 10, scale: 2, transformer: moneyTransformer })
  totalAmount!: Money;

  @CreateDateColumn()
  chargeDate!: Date;

  @Column({ type: 'varchar', length: 50 })
  createdBy!: string;
}
