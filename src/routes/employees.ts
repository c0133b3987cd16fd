import { Router } from 'express';
import { body, query } from 'express-validator';
import { authenticate, requireRole } from '../middleware/auth';
import { asyncHandler } from '../middleware/errorHandler';
import { UserRole } from '../models/User';
import { EmployeeStatus, EmploymentStatus } from '../models/Employee';
import * as employeeController from '../controllers/employeeController';

const router = Router();

// Payroll is visible to admins only
router.use(authenticate, requireRole(UserRole.ADMIN));

const salaryRule = (optional: boolean) => {
  const rule = body('monthlySalary');
  return (optional ? rule.optional() : rule)
    .isDecimal({ decimal_digits: '0,2' }).withMessage('Monthly salary must be an amount with at most 2 decimals');
};

/**
 * POST /api/employees
 */
router.post('/', [
  body('name').trim().notEmpty().withMessage('Name is required').isLength({ max: 100 }).withMessage('Name too long'),
  body('post').trim().notEmpty().withMessage('Post is required').isLength({ max: 50 }).withMessage('Post too long'),
  body('qualification').optional({ values: 'null' }).trim().isLength({ max: 100 }).withMessage('Qualification too long'),
  body('employmentStatus').trim().toUpperCase().isIn(Object.values(EmploymentStatus)).withMessage('Invalid employment status'),
  body('dutyHours').isInt({ min: 1, max: 24 }).withMessage('Duty hours must be between 1 and 24').toInt(),
  body('joiningDate').isDate({ format: 'YYYY-MM-DD', strictMode: true }).withMessage('Joining date must be YYYY-MM-DD'),
  salaryRule(false)
], asyncHandler(employeeController.createEmployee));

router.get('/', [
  query('status').optional().trim().toUpperCase().isIn(Object.values(EmployeeStatus)).withMessage('Invalid employee status')
], asyncHandler(employeeController.listEmployees));

router.get('/:employeeId', asyncHandler(employeeController.getEmployee));

/**
 * PUT /api/employees/:employeeId
 */
router.put('/:employeeId', [
  body('name').optional().trim().notEmpty().withMessage('Name cannot be empty').isLength({ max: 100 }).withMessage('Name too long'),
  body('post').optional().trim().notEmpty().withMessage('Post cannot be empty').isLength({ max: 50 }).withMessage('Post too long'),
  body('qualification').optional({ values: 'null' }).trim().isLength({ max: 100 }).withMessage('Qualification too long'),
  body('employmentStatus').optional().trim().toUpperCase().isIn(Object.values(EmploymentStatus)).withMessage('Invalid employment status'),
  body('dutyHours').optional().isInt({ min: 1, max: 24 }).withMessage('Duty hours must be between 1 and 24').toInt(),
  body('status').optional().trim().toUpperCase().isIn(Object.values(EmployeeStatus)).withMessage('Invalid employee status'),
  salaryRule(true)
], asyncHandler(employeeController.updateEmployee));

router.delete('/:employeeId', asyncHandler(employeeController.deactivateEmployee));

router.get('/:employeeId/salary-slip', [
  query('month').isInt({ min: 1, max: 12 }).withMessage('Month must be between 1 and 12'),
  query('year').isInt({ min: 2000, max: 2100 }).withMessage('Year must be between 2000 and 2100')
], asyncHandler(employeeController.getSalarySlip));

export default router;
