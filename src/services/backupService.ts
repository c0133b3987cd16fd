import { DataSource } from 'typeorm';
import { Patient } from '../models/Patient';
import { Doctor } from '../models/Doctor';
import { Visit } from '../models/Visit';
import { Bed } from '../models/Bed';
import { Admission } from '../models/Admission';
import { Charge } from '../models/Charge';
import { Payment } from '../models/Payment';
import { AuditLog } from '../models/AuditLog';
import { OtProcedure } from '../models/OtProcedure';
import { User } from '../models/User';
import { Slip } from '../models/Slip';
import { Employee } from '../models/Employee';
import { SalaryPayment } from '../models/SalaryPayment';
import { Clock, formatDateStamp, formatTimeStamp, systemClock } from '../lib/dates';

export const BACKUP_VERSION = '1.0';

export type UserRecord = Omit<User, 'passwordHash'>;

export interface BackupSnapshot {
  metadata: {
    backupName: string;
    exportedAt: string;
    version: string;
    counts: Record<string, number>;
  };
  patients: Patient[];
  doctors: Doctor[];
  visits: Visit[];
  beds: Bed[];
  admissions: Admission[];
  charges: Charge[];
  payments: Payment[];
  auditLogs: AuditLog[];
  otProcedures: OtProcedure[];
  users: UserRecord[];
  slips: Slip[];
  employees: Employee[];
  salaryPayments: SalaryPayment[];
}

/**
 * Read-only dump of every table. Password hashes never leave the store.
 */
export class BackupService {
  private readonly clock: Clock;

  constructor(private readonly dataSource: DataSource, options: { clock?: Clock } = {}) {
    this.clock = options.clock ?? systemClock;
  }

  async exportSnapshot(): Promise<BackupSnapshot> {
    const manager = this.dataSource.manager;
    const now = this.clock();

    const patients = await manager.find(Patient, { order: { id: 'ASC' } });
    const doctors = await manager.find(Doctor, { order: { id: 'ASC' } });
    const visits = await manager.find(Visit, { order: { id: 'ASC' } });
    const beds = await manager.find(Bed, { order: { bedNumber: 'ASC' } });
    const admissions = await manager.find(Admission, { order: { id: 'ASC' } });
    const charges = await manager.find(Charge, { order: { id: 'ASC' } });
    const payments = await manager.find(Payment, { order: { id: 'ASC' } });
    const auditLogs = await manager.find(AuditLog, { order: { id: 'ASC' } });
    const otProcedures = await manager.find(OtProcedure, { order: { id: 'ASC' } });
    const users = (await manager.find(User, { order: { email: 'ASC' } }))
      .map(({ passwordHash: _passwordHash, ...rest }): UserRecord => rest);
    const slips = await manager.find(Slip, { order: { id: 'ASC' } });
    const employees = await manager.find(Employee, { order: { id: 'ASC' } });
    const salaryPayments = await manager.find(SalaryPayment, { order: { id: 'ASC' } });

    return {
      metadata: {
        backupName: `hospital_backup_${formatDateStamp(now)}_${formatTimeStamp(now)}`,
        exportedAt: now.toISOString(),
        version: BACKUP_VERSION,
        counts: {
          patients: patients.length,
          doctors: doctors.length,
          visits: visits.length,
          beds: beds.length,
          admissions: admissions.length,
          charges: charges.length,
          payments: payments.length,
          auditLogs: auditLogs.length,
          otProcedures: otProcedures.length,
          users: users.length,
          slips: slips.length,
          employees: employees.length,
          salaryPayments: salaryPayments.length
        }
      },
      patients,
      doctors,
      visits,
      beds,
      admissions,
      charges,
      payments,
      auditLogs,
      otProcedures,
      users,
      slips,
      employees,
      salaryPayments
    };
  }
}
