import { DataSource, DeepPartial, FindOptionsWhere } from 'typeorm';
import { SalaryPayment, SalaryStatus } from '../models/SalaryPayment';
import { Employee } from '../models/Employee';
import { ConflictError, NotFoundError, ValidationError } from '../lib/errors';
import { Clock, isDateOnly, systemClock, toDateOnly } from '../lib/dates';
import { Money, roundMoney, toPaise } from '../lib/money';
import { createLogger } from '../lib/logger';
import { runInTransaction } from '../lib/transactions';
import { IdGenerator, ID_PREFIXES } from './idGenerator';
import { checkPayrollPeriod } from './employeeService';

const log = createLogger({ service: 'salary' });

export interface SalaryPaymentInput {
  employeeId: string;
  month: number;
  year: number;
  // defaults to the employee's monthly salary
  amount?: Money | number | null;
  status?: SalaryStatus;
  paymentDate?: string | null;
  notes?: string | null;
  createdBy: string;
}

export interface SalaryPaymentFilter {
  month?: number;
  year?: number;
  status?: SalaryStatus;
}

export interface SalaryPaymentChanges {
  amount?: Money | number;
  notes?: string | null;
}

export function parseSalaryStatus(value: string): SalaryStatus {
  const status = Object.values(SalaryStatus).find((candidate) => candidate === value.trim().toUpperCase());
  if (!status) {
    throw new ValidationError(`Salary status must be one of: ${Object.values(SalaryStatus).join(', ')}`);
  }
  return status;
}

function amountOf(value: Money | number): Money {
  const amount = roundMoney(value, 'Salary amount');
  if (toPaise(amount) <= 0) {
    throw new ValidationError('Salary amount must be greater than zero');
  }
  return amount;
}

function checkPaymentDate(value: string): string {
  if (!isDateOnly(value)) {
    throw new ValidationError('Payment date must be YYYY-MM-DD');
  }
  return value;
}

const periodMessage = (employeeId: string, month: number, year: number) =>
  `Salary for ${month}/${year} is already recorded for employee ${employeeId}`;

/**
 * Monthly salary ledger: at most one entry per employee and month, PENDING
 * until paid once.
 */
export class SalaryService {
  private readonly clock: Clock;

  constructor(
    private readonly dataSource: DataSource,
    private readonly ids: IdGenerator,
    options: { clock?: Clock } = {}
  ) {
    this.clock = options.clock ?? systemClock;
  }

  async createPayment(input: SalaryPaymentInput): Promise<SalaryPayment> {
    checkPayrollPeriod(input.month, input.year);
    const status = input.status ?? SalaryStatus.PENDING;
    const given = input.paymentDate?.trim() || null;
    if (status === SalaryStatus.PENDING && given) {
      throw new ValidationError('A pending salary has no payment date');
    }
    const paymentDate = status === SalaryStatus.PAID
      ? checkPaymentDate(given ?? toDateOnly(this.clock()))
      : null;
    const requested = input.amount === undefined || input.amount === null ? undefined : amountOf(input.amount);

    const conflict = periodMessage(input.employeeId, input.month, input.year);
    const payment = await runInTransaction(this.dataSource, conflict, async (manager) => {
      const employee = await manager.findOneBy(Employee, { id: input.employeeId });
      if (!employee) {
        throw new NotFoundError('Employee', input.employeeId);
      }
      const recorded = await manager.existsBy(SalaryPayment, {
        employeeId: employee.id,
        month: input.month,
        year: input.year
      });
      if (recorded) {
        throw new ConflictError(conflict);
      }
      return manager.save(manager.create(SalaryPayment, {
        id: await this.ids.generateId(ID_PREFIXES.salary),
        employeeId: employee.id,
        month: input.month,
        year: input.year,
        amount: requested ?? amountOf(employee.monthlySalary),
        status,
        paymentDate,
        notes: input.notes?.trim() || null,
        createdBy: input.createdBy
      }));
    });

    log.info('Salary recorded', {
      paymentId: payment.id,
      employeeId: payment.employeeId,
      period: `${payment.year}-${payment.month}`,
      status: payment.status
    });
    return payment;
  }

  async getPayment(paymentId: string): Promise<SalaryPayment> {
    const payment = await this.dataSource.getRepository(SalaryPayment).findOne({
      where: { id: paymentId },
      relations: { employee: true }
    });
    if (!payment) {
      throw new NotFoundError('Salary payment', paymentId);
    }
    return payment;
  }

  /** Newest period first. */
  listEmployeePayments(employeeId: string, year?: number): Promise<SalaryPayment[]> {
    return this.dataSource.getRepository(SalaryPayment).find({
      where: year === undefined ? { employeeId } : { employeeId, year },
      order: { year: 'DESC', month: 'DESC' }
    });
  }

  listPayments(filter: SalaryPaymentFilter = {}): Promise<SalaryPayment[]> {
    const where: FindOptionsWhere<SalaryPayment> = {};
    if (filter.month !== undefined) {
      where.month = filter.month;
    }
    if (filter.year !== undefined) {
      where.year = filter.year;
    }
    if (filter.status !== undefined) {
      where.status = filter.status;
    }
    return this.dataSource.getRepository(SalaryPayment).find({
      where,
      relations: { employee: true },
      order: { year: 'DESC', month: 'DESC', employeeId: 'ASC' }
    });
  }

  listPendingPayments(month?: number, year?: number): Promise<SalaryPayment[]> {
    return this.listPayments({ month, year, status: SalaryStatus.PENDING });
  }

  /** PENDING -> PAID, once. The payment date defaults to today. */
  async markPaid(paymentId: string, paymentDate?: string | null, notes?: string | null): Promise<SalaryPayment> {
    const paidOn = checkPaymentDate(paymentDate?.trim() || toDateOnly(this.clock()));

    return runInTransaction(this.dataSource, `Salary payment ${paymentId} could not be updated`, async (manager) => {
      const payment = await manager.findOneBy(SalaryPayment, { id: paymentId });
      if (!payment) {
        throw new NotFoundError('Salary payment', paymentId);
      }
      const note = notes?.trim() || payment.notes;
      const result = await manager.update(
        SalaryPayment,
        { id: paymentId, status: SalaryStatus.PENDING },
        { status: SalaryStatus.PAID, paymentDate: paidOn, notes: note }
      );
      if (result.affected !== 1) {
        throw new ConflictError(`Salary payment ${paymentId} is already paid`);
      }
      payment.status = SalaryStatus.PAID;
      payment.paymentDate = paidOn;
      payment.notes = note;
      log.info('Salary paid', { paymentId, paymentDate: paidOn });
      return payment;
    });
  }

  async updatePayment(paymentId: string, changes: SalaryPaymentChanges): Promise<SalaryPayment> {
    const updates: DeepPartial<SalaryPayment> = {};
    if (changes.amount !== undefined) {
      updates.amount = amountOf(changes.amount);
    }
    if (changes.notes !== undefined) {
      updates.notes = changes.notes?.trim() || null;
    }

    return runInTransaction(this.dataSource, `Salary payment ${paymentId} could not be updated`, async (manager) => {
      const payment = await manager.findOneBy(SalaryPayment, { id: paymentId });
      if (!payment) {
        throw new NotFoundError('Salary payment', paymentId);
      }
      if (updates.amount !== undefined && payment.status === SalaryStatus.PAID) {
        throw new ConflictError(`Salary payment ${paymentId} is already paid`);
      }
      return manager.save(manager.merge<SalaryPayment>(SalaryPayment, payment, updates));
    });
  }
}
