import { DataSource, DeepPartial } from 'typeorm';
import { Employee, EmployeeStatus, EmploymentStatus } from '../models/Employee';
import { ConflictError, NotFoundError, ValidationError } from '../lib/errors';
import { Clock, isDateOnly, systemClock } from '../lib/dates';
import { Money, ZERO, isNegative, roundMoney, subtractMoney } from '../lib/money';
import { createLogger } from '../lib/logger';
import { runInTransaction } from '../lib/transactions';
import { IdGenerator } from './idGenerator';

const log = createLogger({ service: 'employee' });

export const MIN_PAYROLL_YEAR = 2000;
export const MAX_PAYROLL_YEAR = 2100;

export interface EmployeeInput {
  name: string;
  post: string;
  qualification?: string | null;
  employmentStatus: EmploymentStatus;
  dutyHours: number;
  joiningDate: string;
  monthlySalary: Money | number;
}

export interface EmployeeChanges {
  name?: string;
  post?: string;
  qualification?: string | null;
  employmentStatus?: EmploymentStatus;
  dutyHours?: number;
  monthlySalary?: Money | number;
  status?: EmployeeStatus;
}

export interface SalarySlip {
  employeeId: string;
  employeeName: string;
  post: string;
  month: number;
  year: number;
  joiningDate: string;
  employmentStatus: EmploymentStatus;
  dutyHours: number;
  basicSalary: Money;
  grossSalary: Money;
  deductions: Money;
  netSalary: Money;
  generatedAt: string;
}

export function parseEmploymentStatus(value: string): EmploymentStatus {
  const status = Object.values(EmploymentStatus).find((candidate) => candidate === value.trim().toUpperCase());
  if (!status) {
    throw new ValidationError(`Employment status must be one of: ${Object.values(EmploymentStatus).join(', ')}`);
  }
  return status;
}

export function parseEmployeeStatus(value: string): EmployeeStatus {
  const status = Object.values(EmployeeStatus).find((candidate) => candidate === value.trim().toUpperCase());
  if (!status) {
    throw new ValidationError(`Employee status must be one of: ${Object.values(EmployeeStatus).join(', ')}`);
  }
  return status;
}

/** Throws unless month is 1-12 and year lies in the payroll range. */
export function checkPayrollPeriod(month: number, year: number): void {
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new ValidationError('Month must be between 1 and 12');
  }
  if (!Number.isInteger(year) || year < MIN_PAYROLL_YEAR || year > MAX_PAYROLL_YEAR) {
    throw new ValidationError(`Year must be between ${MIN_PAYROLL_YEAR} and ${MAX_PAYROLL_YEAR}`);
  }
}

function requireText(value: string | undefined, message: string): string {
  const trimmed = value?.trim();
  if (!trimmed) {
    throw new ValidationError(message);
  }
  return trimmed;
}

function checkDutyHours(hours: number): number {
  if (!Number.isInteger(hours) || hours <= 0) {
    throw new ValidationError('Duty hours must be a positive whole number');
  }
  return hours;
}

function salaryOf(value: Money | number): Money {
  const salary = roundMoney(value, 'Monthly salary');
  if (isNegative(salary)) {
    throw new ValidationError('Monthly salary cannot be negative');
  }
  return salary;
}

/**
 * Payroll staff records. Employees are never deleted; leaving staff are
 * marked INACTIVE and keep their salary history.
 */
export class EmployeeService {
  private readonly clock: Clock;

  constructor(
    private readonly dataSource: DataSource,
    private readonly ids: IdGenerator,
    options: { clock?: Clock } = {}
  ) {
    this.clock = options.clock ?? systemClock;
  }

  async createEmployee(input: EmployeeInput): Promise<Employee> {
    const name = requireText(input.name, 'Employee name is required');
    const post = requireText(input.post, 'Employee post is required');
    const dutyHours = checkDutyHours(input.dutyHours);
    const monthlySalary = salaryOf(input.monthlySalary);
    if (!isDateOnly(input.joiningDate)) {
      throw new ValidationError('Joining date must be YYYY-MM-DD');
    }

    const repo = this.dataSource.getRepository(Employee);
    const employee = await repo.save(repo.create({
      id: await this.ids.generateEmployeeId(),
      name,
      post,
      qualification: input.qualification?.trim() || null,
      employmentStatus: input.employmentStatus,
      dutyHours,
      joiningDate: input.joiningDate,
      monthlySalary,
      status: EmployeeStatus.ACTIVE
    }));
    log.info('Employee added', { employeeId: employee.id, post: employee.post });
    return employee;
  }

  async getEmployee(employeeId: string): Promise<Employee> {
    const employee = await this.dataSource.getRepository(Employee).findOneBy({ id: employeeId });
    if (!employee) {
      throw new NotFoundError('Employee', employeeId);
    }
    return employee;
  }

  listEmployees(status?: EmployeeStatus): Promise<Employee[]> {
    return this.dataSource.getRepository(Employee).find({
      where: status ? { status } : {},
      order: { name: 'ASC', id: 'ASC' }
    });
  }

  async updateEmployee(employeeId: string, changes: EmployeeChanges): Promise<Employee> {
    const updates: DeepPartial<Employee> = {};
    if (changes.name !== undefined) {
      updates.name = requireText(changes.name, 'Employee name cannot be empty');
    }
    if (changes.post !== undefined) {
      updates.post = requireText(changes.post, 'Employee post cannot be empty');
    }
    if (changes.qualification !== undefined) {
      updates.qualification = changes.qualification?.trim() || null;
    }
    if (changes.employmentStatus !== undefined) {
      updates.employmentStatus = changes.employmentStatus;
    }
    if (changes.dutyHours !== undefined) {
      updates.dutyHours = checkDutyHours(changes.dutyHours);
    }
    if (changes.monthlySalary !== undefined) {
      updates.monthlySalary = salaryOf(changes.monthlySalary);
    }
    if (changes.status !== undefined) {
      updates.status = changes.status;
    }

    return runInTransaction(this.dataSource, `Employee ${employeeId} could not be updated`, async (manager) => {
      const employee = await manager.findOneBy(Employee, { id: employeeId });
      if (!employee) {
        throw new NotFoundError('Employee', employeeId);
      }
      return manager.save(manager.merge<Employee>(Employee, employee, updates));
    });
  }

  async deactivateEmployee(employeeId: string): Promise<Employee> {
    const employee = await this.getEmployee(employeeId);
    if (employee.status === EmployeeStatus.INACTIVE) {
      return employee;
    }
    await this.dataSource.getRepository(Employee).update({ id: employeeId }, { status: EmployeeStatus.INACTIVE });
    employee.status = EmployeeStatus.INACTIVE;
    log.info('Employee deactivated', { employeeId });
    return employee;
  }

  /** Salary statement for one month. Nothing is deducted yet. */
  async generateSalarySlip(employeeId: string, month: number, year: number): Promise<SalarySlip> {
    checkPayrollPeriod(month, year);
    const employee = await this.getEmployee(employeeId);
    if (employee.status !== EmployeeStatus.ACTIVE) {
      throw new ConflictError(`Employee ${employeeId} is not active`);
    }

    const grossSalary = employee.monthlySalary;
    const deductions = ZERO;
    return {
      employeeId: employee.id,
      employeeName: employee.name,
      post: employee.post,
      month,
      year,
      joiningDate: employee.joiningDate,
      employmentStatus: employee.employmentStatus,
      dutyHours: employee.dutyHours,
      basicSalary: employee.monthlySalary,
      grossSalary,
      deductions,
      netSalary: subtractMoney(grossSalary, deductions),
      generatedAt: this.clock().toISOString()
    };
  }
}
