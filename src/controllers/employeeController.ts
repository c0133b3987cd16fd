import { Request, Response } from 'express';
import { getServices } from '../services/registry';
import { EmployeeChanges, parseEmployeeStatus, parseEmploymentStatus } from '../services/employeeService';
import { ValidationError } from '../lib/errors';
import { queryNumber, queryString, rejectInvalid } from './helpers';

/**
 * Employee controller - payroll staff records and salary slips
 */

export const createEmployee = async (req: Request, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const { name, post, qualification, employmentStatus, dutyHours, joiningDate, monthlySalary } = req.body;
  const employee = await getServices().employees.createEmployee({
    name,
    post,
    qualification,
    employmentStatus: parseEmploymentStatus(employmentStatus),
    dutyHours,
    joiningDate,
    monthlySalary
  });
  res.status(201).json({ message: 'Employee added successfully', employee });
};

export const listEmployees = async (req: Request, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const status = queryString(req, 'status');
  const employees = await getServices().employees.listEmployees(status ? parseEmployeeStatus(status) : undefined);
  res.json({ employees, total: employees.length });
};

export const getEmployee = async (req: Request, res: Response) => {
  const employee = await getServices().employees.getEmployee(req.params.employeeId);
  res.json({ employee });
};

export const updateEmployee = async (req: Request, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const { name, post, qualification, employmentStatus, dutyHours, monthlySalary, status } = req.body;
  const changes: EmployeeChanges = { name, post, qualification, dutyHours, monthlySalary };
  if (employmentStatus !== undefined) {
    changes.employmentStatus = parseEmploymentStatus(employmentStatus);
  }
  if (status !== undefined) {
    changes.status = parseEmployeeStatus(status);
  }
  const employee = await getServices().employees.updateEmployee(req.params.employeeId, changes);
  res.json({ message: 'Employee updated successfully', employee });
};

/**
 * Employees are only ever deactivated; salary history stays
 */
export const deactivateEmployee = async (req: Request, res: Response) => {
  const employee = await getServices().employees.deactivateEmployee(req.params.employeeId);
  res.json({ message: 'Employee deactivated', employee });
};

/**
 * GET /api/employees/:employeeId/salary-slip?month=&year=
 */
export const getSalarySlip = async (req: Request, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const month = queryNumber(req, 'month');
  const year = queryNumber(req, 'year');
  if (month === undefined || year === undefined) {
    throw new ValidationError('Month and year are required');
  }
  const slip = await getServices().employees.generateSalarySlip(req.params.employeeId, month, year);
  res.json({ slip });
};
