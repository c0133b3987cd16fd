import { DataSource } from 'typeorm';
import { Clock, systemClock } from '../lib/dates';
import { Patient } from '../models/Patient';
import { Visit } from '../models/Visit';
import { Admission } from '../models/Admission';
import { Charge } from '../models/Charge';
import { Payment } from '../models/Payment';
import { AuditLog } from '../models/AuditLog';
import { OtProcedure } from '../models/OtProcedure';
import { Doctor } from '../models/Doctor';
import { Bed } from '../models/Bed';
import { Slip } from '../models/Slip';
import { Employee } from '../models/Employee';
import { SalaryPayment } from '../models/SalaryPayment';
import { IdGenerator, createStoreSequenceSeed } from './idGenerator';
import { AuditService } from './auditService';
import { AdmissionService } from './admissionService';
import { BillingService } from './billingService';
import { PaymentService } from './paymentService';
import { DischargeService } from './dischargeService';
import { PatientService } from './patientService';
import { DoctorService } from './doctorService';
import { VisitService } from './visitService';
import { OtService } from './otService';
import { BackupService } from './backupService';
import { UserService } from './userService';
import { SlipService } from './slipService';
import { EmployeeService } from './employeeService';
import { SalaryService } from './salaryService';

export interface Services {
  ids: IdGenerator;
  audit: AuditService;
  admissions: AdmissionService;
  billing: BillingService;
  payments: PaymentService;
  discharge: DischargeService;
  patients: PatientService;
  doctors: DoctorService;
  visits: VisitService;
  ot: OtService;
  backup: BackupService;
  users: UserService;
  slips: SlipService;
  employees: EmployeeService;
  salaries: SalaryService;
}

export interface ServiceOptions {
  clock?: Clock;
  ids?: IdGenerator;
}

/**
 * Wires every service to one DataSource and one id generator. The audit
 * trail is handed to the ledgers as listeners, never imported by them.
 */
export function createServices(dataSource: DataSource, options: ServiceOptions = {}): Services {
  const clock = options.clock ?? systemClock;
  const ids = options.ids ?? new IdGenerator({
    clock,
    seed: createStoreSequenceSeed(dataSource, {
      P: Patient,
      V: Visit,
      IPD: Admission,
      CHG: Charge,
      PAY: Payment,
      LOG: AuditLog,
      OT: OtProcedure,
      D: Doctor,
      BED: Bed,
      SLIP: Slip,
      EMP: Employee,
      SAL: SalaryPayment
    })
  });

  const audit = new AuditService(dataSource, ids);
  const onRateChange = audit.rateChangeListener();
  const admissions = new AdmissionService(dataSource, ids, { clock, onRateChange });
  const billing = new BillingService(dataSource, ids, { clock, onChargeAudit: audit.chargeListener() });

  const payments = new PaymentService(dataSource, ids, { clock });
  const discharge = new DischargeService(dataSource, admissions, { clock });
  const visits = new VisitService(dataSource, ids, { clock });

  return {
    ids,
    audit,
    admissions,
    billing,
    payments,
    discharge,
    patients: new PatientService(dataSource, ids),
    doctors: new DoctorService(dataSource, ids, { onRateChange }),
    visits,
    ot: new OtService(dataSource, ids, billing),
    backup: new BackupService(dataSource, { clock }),
    users: new UserService(dataSource),
    slips: new SlipService(dataSource, ids, visits, billing, discharge, { clock }),
    employees: new EmployeeService(dataSource, ids, { clock }),
    salaries: new SalaryService(dataSource, ids, { clock })
  };
}
