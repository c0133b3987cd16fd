import dotenv from 'dotenv';

dotenv.config();

const nodeEnv = process.env.NODE_ENV || 'development';

export const config = {
  port: Number(process.env.PORT) || 3000,
  nodeEnv,
  isProduction: nodeEnv === 'production',
  // TypeORM does not parse query parameters on the connection URL
  databaseUrl: process.env.DATABASE_URL?.split('?')[0],
  databaseSsl: Boolean(
    process.env.DATABASE_SSL === 'true' ||
    process.env.DATABASE_URL?.includes('render.com') ||
    nodeEnv === 'production'
  ),
  // Token lifetime in seconds (default: one 12-hour shift)
  jwtExpiresIn: Number(process.env.JWT_EXPIRES_IN) || 12 * 60 * 60,
  frontendUrl: process.env.FRONTEND_URL,
  logLevel: process.env.LOG_LEVEL || 'info'
};

/**
 * JWT secret with a development fallback. Production refuses to start without one.
 */
export const getJwtSecret = (): string => {
  const secret = process.env.JWT_SECRET;
  if (!secret || secret === 'change-me') {
    if (config.isProduction) {
      throw new Error('JWT_SECRET must be configured in production');
    }
    return 'development-only-secret-key';
  }
  return secret;
};
