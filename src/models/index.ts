import { Patient } from './Patient';
import { Doctor } from './Doctor';
import { Visit } from './Visit';
import { Bed } from './Bed';
import { Admission } from './Admission';
import { Charge } from './Charge';
import { Payment } from './Payment';
import { AuditLog } from './AuditLog';
import { OtProcedure } from './OtProcedure';
import { User } from './User';
import { Slip } from './Slip';
import { Employee } from './Employee';
import { SalaryPayment } from './SalaryPayment';

export const entities = [
  Patient,
  Doctor,
  Visit,
  Bed,
  Admission,
  Charge,
  Payment,
  AuditLog,
  OtProcedure,
  User,
  Slip,
  Employee,
  SalaryPayment
];
