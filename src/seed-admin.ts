import 'reflect-metadata';
import { AppDataSource } from './database';
import { logger } from './lib/logger';
import { UserRole } from './models/User';
import { UserService } from './services/userService';

const ADMIN_EMAIL = (process.env.ADMIN_EMAIL || 'admin@hospital.local').trim().toLowerCase();

async function seedAdmin() {
  try {
    // Ensure tables are created
    await AppDataSource.initialize();
    await AppDataSource.synchronize();
    logger.info('Database connected and synchronized');

    const users = new UserService(AppDataSource);

    // Check if an admin already exists
    const admins = await users.listUsers(UserRole.ADMIN);
    if (admins.some((admin) => admin.email === ADMIN_EMAIL)) {
      logger.info('Admin user already exists', { email: ADMIN_EMAIL });
      process.exit(0);
    }

    const issued = await users.createUser({
      name: 'System Admin',
      email: ADMIN_EMAIL,
      role: UserRole.ADMIN,
      password: process.env.ADMIN_PASSWORD || undefined
    });

    logger.info('Admin user created', { email: issued.user.email });
    if (issued.temporaryPassword) {
      // Printed once so the operator can sign in; never written to the log stream
      process.stdout.write(`Temporary password: ${issued.temporaryPassword}\nPlease change this password after first login.\n`);
    }

    process.exit(0);
  } catch (error) {
    logger.error('Error seeding admin', { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
  }
}

void seedAdmin();
