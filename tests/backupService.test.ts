import { UserRole } from '../src/models/User';
import { EmploymentStatus } from '../src/models/Employee';
import { START, TestContext, addBed, addDoctor, createTestContext, registerPatient } from './helpers/testDataSource';

describe('BackupService', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await createTestContext();
  });

  afterEach(async () => {
    await ctx.dataSource.destroy();
  });

  it('exports every table with counts and a timestamped name', async () => {
    await registerPatient(ctx.services);
    await registerPatient(ctx.services, 'Vikram Shah');
    await addDoctor(ctx.services);
    await addBed(ctx.services);
    await ctx.services.employees.createEmployee({
      name: 'Kavita Nair',
      post: 'Staff Nurse',
      employmentStatus: EmploymentStatus.PERMANENT,
      dutyHours: 8,
      joiningDate: '2023-06-01',
      monthlySalary: '25000.00'
    });

    const snapshot = await ctx.services.backup.exportSnapshot();

    expect(snapshot.metadata.backupName).toBe('hospital_backup_20240115_100000');
    expect(snapshot.metadata.exportedAt).toBe(START.toISOString());
    expect(snapshot.metadata.version).toBe('1.0');
    expect(snapshot.metadata.counts.patients).toBe(2);
    expect(snapshot.metadata.counts.doctors).toBe(1);
    expect(snapshot.metadata.counts.beds).toBe(1);
    expect(snapshot.metadata.counts.visits).toBe(0);
    expect(snapshot.metadata.counts.employees).toBe(1);
    expect(snapshot.metadata.counts.salaryPayments).toBe(0);
    expect(snapshot.employees.map((employee) => employee.id)).toEqual(['EMP202401150001']);
    expect(snapshot.patients.map((patient) => patient.id)).toEqual(['P202401150001', 'P202401150002']);
  });

  it('never exports password hashes', async () => {
    await ctx.services.users.createUser({
      name: 'Front Desk',
      email: 'desk@hospital.local',
      role: UserRole.RECEPTION,
      password: 'test-password'
    });

    const snapshot = await ctx.services.backup.exportSnapshot();

    expect(snapshot.users).toHaveLength(1);
    expect(snapshot.users[0].email).toBe('desk@hospital.local');
    expect('passwordHash' in snapshot.users[0]).toBe(false);
  });
});
