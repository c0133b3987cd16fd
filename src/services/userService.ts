import { DataSource } from 'typeorm';
import bcrypt from 'bcrypt';
import { nanoid } from 'nanoid';
import { User, UserRole } from '../models/User';
import { ConflictError, NotFoundError, UnauthorizedError, ValidationError } from '../lib/errors';
import { createLogger } from '../lib/logger';
import { runInTransaction } from '../lib/transactions';

const log = createLogger({ service: 'user' });

const BCRYPT_ROUNDS = 10;
const MIN_PASSWORD_LENGTH = 8;
const DUPLICATE_EMAIL = 'A user with this email already exists';

export interface StaffProfile {
  id: string;
  role: UserRole;
  name: string;
  email: string;
  isActive: boolean;
  createdAt: Date;
}

export interface CreateUserInput {
  name: string;
  email: string;
  role: UserRole;
  password?: string;
}

/** Profile plus the password that was set, when the caller did not choose one. */
export interface IssuedCredentials {
  user: StaffProfile;
  temporaryPassword?: string;
}

export const toStaffProfile = (user: User): StaffProfile => ({
  id: user.id,
  role: user.role,
  name: user.name,
  email: user.email,
  isActive: user.isActive,
  createdAt: user.createdAt
});

export function parseUserRole(value: string): UserRole {
  const role = Object.values(UserRole).find((candidate) => candidate === value.trim().toUpperCase());
  if (!role) {
    throw new ValidationError(`Role must be one of: ${Object.values(UserRole).join(', ')}`);
  }
  return role;
}

const normalizeEmail = (email: string) => email.trim().toLowerCase();

function choosePassword(password?: string): { password: string; generated: boolean } {
  if (password === undefined) {
    return { password: nanoid(12), generated: true };
  }
  if (password.length < MIN_PASSWORD_LENGTH) {
    throw new ValidationError(`Password must be at least ${MIN_PASSWORD_LENGTH} characters long`);
  }
  return { password, generated: false };
}

/**
 * Staff accounts. Passwords are stored as bcrypt hashes only; a generated
 * password is returned once to the caller and never logged.
 */
export class UserService {
  constructor(private readonly dataSource: DataSource) {}

  async createUser(input: CreateUserInput): Promise<IssuedCredentials> {
    const name = input.name.trim();
    if (!name) {
      throw new ValidationError('Name is required');
    }
    const email = normalizeEmail(input.email);
    if (!email) {
      throw new ValidationError('Email is required');
    }
    const { password, generated } = choosePassword(input.password);
    const passwordHash = await bcrypt.hash(password, BCRYPT_ROUNDS);

    const user = await runInTransaction(this.dataSource, DUPLICATE_EMAIL, async (manager) => {
      if (await manager.existsBy(User, { email })) {
        throw new ConflictError(DUPLICATE_EMAIL);
      }
      return manager.save(manager.create(User, { name, email, role: input.role, passwordHash, isActive: true }));
    });

    log.info('Staff user created', { userId: user.id, role: user.role });
    return generated ? { user: toStaffProfile(user), temporaryPassword: password } : { user: toStaffProfile(user) };
  }

  async getUser(userId: string): Promise<StaffProfile> {
    return toStaffProfile(await this.requireUser(userId));
  }

  async listUsers(role?: UserRole): Promise<StaffProfile[]> {
    const users = await this.dataSource.getRepository(User).find({
      where: role ? { role } : {},
      order: { name: 'ASC' }
    });
    return users.map(toStaffProfile);
  }

  /**
   * The active user with these credentials, or null. Unknown email and wrong
   * password are indistinguishable to the caller.
   */
  async verifyCredentials(email: string, password: string): Promise<StaffProfile | null> {
    const user = await this.dataSource.getRepository(User).findOneBy({ email: normalizeEmail(email), isActive: true });
    if (!user || !(await bcrypt.compare(password, user.passwordHash))) {
      return null;
    }
    return toStaffProfile(user);
  }

  async resetPassword(userId: string, password?: string): Promise<IssuedCredentials> {
    const user = await this.requireUser(userId);
    const chosen = choosePassword(password);
    await this.dataSource.getRepository(User).update(userId, {
      passwordHash: await bcrypt.hash(chosen.password, BCRYPT_ROUNDS)
    });

    log.info('Password reset', { userId });
    return chosen.generated
      ? { user: toStaffProfile(user), temporaryPassword: chosen.password }
      : { user: toStaffProfile(user) };
  }

  /** Self-service change; the current password must match. */
  async changePassword(userId: string, currentPassword: string, newPassword: string): Promise<void> {
    const user = await this.requireUser(userId);
    if (!(await bcrypt.compare(currentPassword, user.passwordHash))) {
      throw new UnauthorizedError('Current password is incorrect');
    }
    const { password } = choosePassword(newPassword);
    await this.dataSource.getRepository(User).update(userId, {
      passwordHash: await bcrypt.hash(password, BCRYPT_ROUNDS)
    });
    log.info('Password changed', { userId });
  }

  async setActive(userId: string, isActive: boolean): Promise<StaffProfile> {
    const user = await this.requireUser(userId);
    if (user.isActive !== isActive) {
      await this.dataSource.getRepository(User).update(userId, { isActive });
      log.info(isActive ? 'User activated' : 'User deactivated', { userId });
    }
    return toStaffProfile(await this.requireUser(userId));
  }

  private async requireUser(userId: string): Promise<User> {
    const user = await this.dataSource.getRepository(User).findOneBy({ id: userId });
    if (!user) {
      throw new NotFoundError('User', userId);
    }
    return user;
  }
}
