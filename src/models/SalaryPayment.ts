import { Entity, PrimaryColumn, Column, CreateDateColumn, UpdateDateColumn, ManyToOne, Index } from 'typeorm';
import { Money, moneyTransformer } from '../lib/money';
import { Employee } from './Employee';

export enum SalaryStatus {
  PENDING = 'PENDING',
  PAID = 'PAID'
}

/**
 * SalaryPayment entity - one employee's salary for one month
 * paymentDate is set once the salary is PAID
 */
@Entity('salary_payments')
@Index('UQ_salary_payments_period', ['employeeId', 'year', 'month'], { unique: true })
export class SalaryPayment {
  @PrimaryColumn({ type: 'varchar', length: 30 })
  id!: string;

  @ManyToOne(() => Employee)
  employee!: Employee;

  @Column({ type: 'varchar', length: 20 })
  employeeId!: string;

  // 1-12
  @Column({ type: 'int' })
  month!: number;

  @Column({ type: 'int' })
  year!: number;

  @Column({ type: 'decimal', precision: 10, scale: 2, transformer: moneyTransformer })
  amount!: Money;

  @Column({ type: 'simple-enum', enum: SalaryStatus, default: SalaryStatus.PENDING })
  status!: SalaryStatus;

  @Column({ type: 'date', nullable: true })
  paymentDate!: string | null;

  @Column({ type: 'varchar', length: 500, nullable: true })
  notes!: string | null;

  @Column({ type: 'varchar', length: 50 })
  createdBy!: string;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
