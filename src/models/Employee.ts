import { Entity, PrimaryColumn, Column, CreateDateColumn, UpdateDateColumn } from 'typeorm';
import { Money, moneyTransformer } from '../lib/money';

export enum EmploymentStatus {
  PERMANENT = 'PERMANENT',
  PROBATION = 'PROBATION'
}

export enum EmployeeStatus {
  ACTIVE = 'ACTIVE',
  INACTIVE = 'INACTIVE'
}

/**
 * Employee entity - hospital staff on the payroll (not a login account)
 */
@Entity('employees')
export class Employee {
  // EMP + YYYYMMDD + 4-digit daily sequence
  @PrimaryColumn({ type: 'varchar', length: 20 })
  id!: string;

  @Column({ type: 'varchar', length: 100 })
  name!: string;

  @Column({ type: 'varchar', length: 50 })
  post!: string;

  @Column({ type: 'varchar', length: 100, nullable: true })
  qualification!: string | null;

  @Column({ type: 'simple-enum', enum: EmploymentStatus })
  employmentStatus!: EmploymentStatus;

  @Column({ type: 'int' })
  dutyHours!: number;

  @Column({ type: 'date' })
  joiningDate!: string;

  @Column({ type: 'decimal', precision: 10, scale: 2, transformer: moneyTransformer })
  monthlySalary!: Money;

  @Column({ type: 'simple-enum', enum: EmployeeStatus, default: EmployeeStatus.ACTIVE })
  status!: EmployeeStatus;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
