import { Entity, PrimaryColumn, Column, CreateDateColumn, UpdateDateColumn } from 'typeorm';
import { Money, moneyTransformer } from '../lib/money';

export enum DoctorStatus {
  ACTIVE = 'ACTIVE',
  INACTIVE = 'INACTIVE'
}

@Entity('doctors')
export class Doctor {
  @PrimaryColumn({ type: 'varchar', length: 20 })
  id!: string;

  @Column({ type: 'varchar', length: 100 })
  name!: string;

  @Column({ type: 'varchar', length: 50 })
  department!: string;

  @Column({ type: 'decimal', precision: 10, scale: 2, transformer: moneyTransformer })
  newPatientFee!: Money;

  @Column({ type: 'decimal', precision: 10, scale: 2, transformer: moneyTransformer })
  followupFee!: Money;

  @Column({ type: 'simple-enum', enum: DoctorStatus, default: DoctorStatus.ACTIVE })
  status!: DoctorStatus;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
