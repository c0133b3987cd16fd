import { Entity, PrimaryColumn, Column, CreateDateColumn, UpdateDateColumn, ManyToOne, OneToMany, Index } from 'typeorm';
import { Money, moneyTransformer } from '../lib/money';
import { Patient } from './Patient';
import { Doctor } from './Doctor';
import { Charge } from './Charge';
import { PaymentMode } from './Payment';

export enum VisitType {
  OPD_NEW = 'OPD_NEW',
  OPD_FOLLOWUP = 'OPD_FOLLOWUP'
}

export enum VisitStatus {
  ACTIVE = 'ACTIVE',
  COMPLETED = 'COMPLETED',
  CANCELLED = 'CANCELLED'
}

/**
 * Visit entity - one outpatient (OPD) encounter
 * serialNumber ranks the visit among the doctor's visits on visitDate
 */
@Entity('visits')
@Index(['doctorId', 'visitDate', 'serialNumber'], { unique: true })
export class Visit {
  // V + YYYYMMDD + HHMMSS + 3-digit sequence
  @PrimaryColumn({ type: 'varchar', length: 30 })
  id!: string;

  @ManyToOne(() => Patient, patient => patient.visits)
  patient!: Patient;

  @Column({ type: 'varchar', length: 20 })
  patientId!: string;

  @ManyToOne(() => Doctor)
  doctor!: Doctor;

  @Column({ type: 'varchar', length: 20 })
  doctorId!: string;

  @Column({ type: 'simple-enum', enum: VisitType })
  visitType!: VisitType;

  @Column({ type: 'varchar', length: 50 })
  department!: string;

  @Column({ type: 'int' })
  serialNumber!: number;

  // Calendar day, YYYY-MM-DD
  @Column({ type: 'date' })
  visitDate!: string;

  // HH:MM:SS
  @Column({ type: 'varchar', length: 8 })
  visitTime!: string;

  // Consultation fee as charged when the visit was created
  @Column({ type: 'decimal', precision: 10, scale: 2, transformer: moneyTransformer })
  opdFee!: Money;

  @Column({ type: 'simple-enum', enum: PaymentMode })
  paymentMode!: PaymentMode;

  @Column({ type: 'simple-enum', enum: VisitStatus, default: VisitStatus.ACTIVE })
  status!: VisitStatus;

  @OneToMany(() => Charge, charge => charge.visit)
  charges!: Charge[];

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
