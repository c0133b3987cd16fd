import { DataSource, EntityManager } from 'typeorm';
import type { IsolationLevel } from 'typeorm/driver/types/IsolationLevel';
import { entities } from '../../src/models';
import { Services, createServices } from '../../src/services';
import { Clock } from '../../src/lib/dates';
import { KeyedMutex } from '../../src/lib/keyedMutex';
import { Gender, Patient } from '../../src/models/Patient';
import { Doctor } from '../../src/models/Doctor';
import { Bed, WardType } from '../../src/models/Bed';
import { Visit, VisitType } from '../../src/models/Visit';
import { Admission } from '../../src/models/Admission';

type TransactionWork<T> = (manager: EntityManager) => Promise<T>;

/**
 * better-sqlite3 has a single connection, so two open transactions would
 * share it. Transactions queue here instead, the way PostgreSQL row locks
 * make a second writer wait, and each one sees the other's committed state.
 */
export class SerialDataSource extends DataSource {
  private readonly transactions = new KeyedMutex();

  transaction<T>(work: TransactionWork<T>): Promise<T>;
  transaction<T>(isolationLevel: IsolationLevel, work: TransactionWork<T>): Promise<T>;
  transaction<T>(first: IsolationLevel | TransactionWork<T>, second?: TransactionWork<T>): Promise<T> {
    return this.transactions.runExclusive('transaction', async () => {
      if (typeof first === 'function') {
        return super.transaction(first);
      }
      if (!second) {
        throw new TypeError('Transaction work is required');
      }
      return super.transaction(first, second);
    });
  }
}

/** In-memory SQLite store with the production schema. */
export async function createTestDataSource(): Promise<DataSource> {
  const dataSource = new SerialDataSource({
    type: 'better-sqlite3',
    database: ':memory:',
    synchronize: true,
    dropSchema: true,
    logging: false,
    entities
  });
  return dataSource.initialize();
}

/**
 * A clock the test moves by hand. Dates are built in local time so id stamps
 * and visit days read the same in every timezone.
 */
export class ManualClock {
  private current: Date;

  constructor(start: Date) {
    this.current = new Date(start.getTime());
  }

  readonly now: Clock = () => new Date(this.current.getTime());

  set(date: Date) {
    this.current = new Date(date.getTime());
  }

  advanceHours(hours: number) {
    this.current = new Date(this.current.getTime() + hours * 60 * 60 * 1000);
  }

  advanceDays(days: number) {
    this.advanceHours(days * 24);
  }
}

/** 15 January 2024, 10:00 local time */
export const START = new Date(2024, 0, 15, 10, 0, 0);

export interface TestContext {
  dataSource: DataSource;
  clock: ManualClock;
  services: Services;
}

export async function createTestContext(start: Date = START): Promise<TestContext> {
  const dataSource = await createTestDataSource();
  const clock = new ManualClock(start);
  return { dataSource, clock, services: createServices(dataSource, { clock: clock.now }) };
}

let mobileCounter = 0;

/** A distinct valid mobile number per call. */
export const nextMobile = (): string => {
  mobileCounter += 1;
  return `9${String(mobileCounter).padStart(9, '0')}`;
};

export const registerPatient = (services: Services, name = 'Asha Rao'): Promise<Patient> =>
  services.patients.createPatient({
    name,
    age: 42,
    gender: Gender.FEMALE,
    address: '12 MG Road, Pune',
    mobileNumber: nextMobile()
  });

export const addDoctor = (services: Services, name = 'Dr. Meera Iyer'): Promise<Doctor> =>
  services.doctors.createDoctor({
    name,
    department: 'General Medicine',
    newPatientFee: '300.00',
    followupFee: '150.00'
  });

export const addBed = (services: Services, bedNumber = 'G-101', perDayCharge = '800.00'): Promise<Bed> =>
  services.admissions.createBed({ bedNumber, wardType: WardType.GENERAL, perDayCharge });

export const openVisit = (services: Services, patient: Patient, doctor: Doctor, visitType = VisitType.OPD_NEW): Promise<Visit> =>
  services.visits.createVisit({ patientId: patient.id, doctorId: doctor.id, visitType, paymentMode: 'CASH' });

export const admitPatient = (services: Services, patient: Patient, bed: Bed, fileCharge = '100.00'): Promise<Admission> =>
  services.admissions.admit({ patientId: patient.id, bedId: bed.id, fileCharge });
