import { Entity, PrimaryColumn, Column, CreateDateColumn, UpdateDateColumn, ManyToOne, OneToMany, Index } from 'typeorm';
import { Money, moneyTransformer } from '../lib/money';
import { Patient } from './Patient';
import { Visit } from './Visit';
import { Bed } from './Bed';
import { Charge } from './Charge';
import { Payment } from './Payment';

export enum AdmissionStatus {
  ADMITTED = 'ADMITTED',
  DISCHARGED = 'DISCHARGED',
  TRANSFERRED = 'TRANSFERRED'
}

/**
 * Admission entity - an inpatient (IPD) stay
 * While ADMITTED the referenced bed is OCCUPIED
 */
@Entity('admissions')
// At most one ADMITTED stay per patient
@Index('UQ_admissions_active_patient', ['patientId'], { unique: true, where: `"status" = 'ADMITTED'` })
export class Admission {
  // IPD + YYYYMMDD + 4-digit daily sequence
  @PrimaryColumn({ type: 'varchar', length: 20 })
  id!: string;

  @ManyToOne(() => Patient, patient => patient.admissions)
  patient!: Patient;

  @Column({ type: 'varchar', length: 20 })
  patientId!: string;

  // Originating OPD visit, if the patient was admitted from one
  @ManyToOne(() => Visit, { nullable: true })
  visit!: Visit | null;

  @Column({ type: 'varchar', length: 30, nullable: true })
  visitId!: string | null;

  @ManyToOne(() => Bed)
  bed!: Bed;

  @Column({ type: 'varchar', length: 30 })
  bedId!: string;

  @Column()
  admissionDate!: Date;

  @Column({ type: Date, nullable: true })
  dischargeDate!: Date | null;

  @Column({ type: 'decimal', precision: 10, scale: 2, transformer: moneyTransformer })
  fileCharge!: Money;

  @Column({ type: 'simple-enum', enum: AdmissionStatus, default: AdmissionStatus.ADMITTED })
  status!: AdmissionStatus;

  @OneToMany(() => Charge, charge => charge.admission)
  charges!: Charge[];

  @OneToMany(() => Payment, payment => payment.admission)
  payments!: Payment[];

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
