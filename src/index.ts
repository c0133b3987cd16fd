import 'reflect-metadata';
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { config } from './config';
import { AppDataSource } from './database';
import { logger } from './lib/logger';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { requestLogger } from './middleware/requestLogger';
import adminRoutes from './routes/admin';
import auditRoutes from './routes/audit';
import authRoutes from './routes/auth';
import backupRoutes from './routes/backup';
import billingRoutes from './routes/billing';
import dischargeRoutes from './routes/discharge';
import doctorRoutes from './routes/doctors';
import employeeRoutes from './routes/employees';
import ipdRoutes from './routes/ipd';
import otRoutes from './routes/ot';
import patientRoutes from './routes/patients';
import paymentRoutes from './routes/payments';
import salaryRoutes from './routes/salaries';
import slipRoutes from './routes/slips';
import visitRoutes from './routes/visits';

const app = express();

// One reverse proxy in front; rate limiting keys on the client address
app.set('trust proxy', 1);

app.use(helmet({
  contentSecurityPolicy: config.isProduction ? undefined : false
}));

const allowedOrigins: string[] = [
  'http://localhost:5173',
  'http://localhost:5174',
  config.frontendUrl
].filter((origin): origin is string => Boolean(origin));

app.use(cors({
  origin: (origin, callback) => {
    // Same-origin and non-browser clients send no Origin header
    if (!origin) return callback(null, true);

    if (allowedOrigins.indexOf(origin) !== -1) {
      callback(null, true);
    } else {
      logger.warn('CORS blocked origin', { origin });
      callback(new Error('Not allowed by CORS'));
    }
  },
  credentials: true,
  methods: ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With'],
  exposedHeaders: ['Content-Disposition', 'X-Request-Id'],
  maxAge: 600
}));

app.use(express.json({ limit: '1mb' }));
app.use(express.urlencoded({ extended: true, limit: '1mb' }));

app.use(requestLogger);

app.get('/health', (_req, res) => {
  res.json({
    status: 'OK',
    timestamp: new Date().toISOString(),
    environment: config.nodeEnv,
    database: AppDataSource.isInitialized ? 'connected' : 'disconnected'
  });
});

app.use('/api/auth', authRoutes);
app.use('/api/admin', adminRoutes);
app.use('/api/patients', patientRoutes);
app.use('/api/doctors', doctorRoutes);
app.use('/api/visits', visitRoutes);
app.use('/api/ipd', ipdRoutes);
app.use('/api/billing', billingRoutes);
app.use('/api/ot', otRoutes);
app.use('/api/payments', paymentRoutes);
app.use('/api/discharge', dischargeRoutes);
app.use('/api/audit', auditRoutes);
app.use('/api/backup', backupRoutes);
app.use('/api/slips', slipRoutes);
app.use('/api/employees', employeeRoutes);
app.use('/api/salary-payments', salaryRoutes);

app.use(notFoundHandler);
app.use(errorHandler);

AppDataSource.initialize()
  .then(() => {
    logger.info('Database connected successfully');

    app.listen(config.port, () => {
      logger.info('Server running', { port: config.port, environment: config.nodeEnv });
    });
  })
  .catch((error: unknown) => {
    logger.error('Database connection failed', { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
  });

export default app;
