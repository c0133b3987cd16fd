import { Router } from 'express';
import { body, query } from 'express-validator';
import { authenticate, requireRole } from '../middleware/auth';
import { asyncHandler } from '../middleware/errorHandler';
import { UserRole } from '../models/User';
import * as adminController from '../controllers/adminController';

const router = Router();

// All admin routes require authentication and admin role
router.use(authenticate, requireRole(UserRole.ADMIN));

const passwordRule = body('password')
  .optional()
  .isLength({ min: 8, max: 128 }).withMessage('Password must be between 8 and 128 characters');

/**
 * POST /api/admin/users
 * Create a staff account; a temporary password is returned when none is given
 */
router.post('/users', [
  body('name').trim().notEmpty().withMessage('Name is required').isLength({ max: 100 }).withMessage('Name too long'),
  body('email').trim().isEmail().withMessage('Invalid email format').normalizeEmail().isLength({ max: 255 }).withMessage('Email too long'),
  body('role').trim().toUpperCase().isIn(Object.values(UserRole)).withMessage('Invalid role'),
  passwordRule
], asyncHandler(adminController.createUser));

/**
 * GET /api/admin/users
 */
router.get('/users', [
  query('role').optional().trim().toUpperCase().isIn(Object.values(UserRole)).withMessage('Invalid role')
], asyncHandler(adminController.listUsers));

/**
 * POST /api/admin/users/:userId/reset-password
 */
router.post('/users/:userId/reset-password', [passwordRule], asyncHandler(adminController.resetPassword));

/**
 * PATCH /api/admin/users/:userId/active
 */
router.patch('/users/:userId/active', [
  body('isActive').isBoolean().withMessage('isActive must be true or false').toBoolean()
], asyncHandler(adminController.setUserActive));

export default router;
