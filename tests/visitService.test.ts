import { Doctor, DoctorStatus } from '../src/models/Doctor';
import { Patient } from '../src/models/Patient';
import { PaymentMode } from '../src/models/Payment';
import { VisitStatus, VisitType } from '../src/models/Visit';
import { ConflictError, ValidationError } from '../src/lib/errors';
import { parseVisitType } from '../src/services/visitService';
import { START, TestContext, addDoctor, createTestContext, openVisit, registerPatient } from './helpers/testDataSource';

describe('VisitService', () => {
  let ctx: TestContext;
  let patient: Patient;
  let doctor: Doctor;

  beforeEach(async () => {
    ctx = await createTestContext();
    patient = await registerPatient(ctx.services);
    doctor = await addDoctor(ctx.services);
  });

  afterEach(async () => {
    await ctx.dataSource.destroy();
  });

  it('registers a visit with the fee for its type', async () => {
    const visit = await openVisit(ctx.services, patient, doctor, VisitType.OPD_NEW);

    expect(visit.id).toBe('V20240115100000001');
    expect(visit.serialNumber).toBe(1);
    expect(visit.visitDate).toBe('2024-01-15');
    expect(visit.visitTime).toBe('10:00:00');
    expect(visit.department).toBe('General Medicine');
    expect(visit.opdFee).toBe('300.00');
    expect(visit.paymentMode).toBe(PaymentMode.CASH);
    expect(visit.status).toBe(VisitStatus.ACTIVE);

    const followup = await openVisit(ctx.services, patient, doctor, VisitType.OPD_FOLLOWUP);
    expect(followup.opdFee).toBe('150.00');
    expect(followup.serialNumber).toBe(2);
  });

  it('numbers each doctor\'s visits separately and restarts every day', async () => {
    const other = await ctx.services.doctors.createDoctor({
      name: 'Dr. Kiran Patel',
      department: 'Orthopaedics',
      newPatientFee: 500,
      followupFee: 250
    });

    expect((await openVisit(ctx.services, patient, doctor)).serialNumber).toBe(1);
    expect((await openVisit(ctx.services, patient, other)).serialNumber).toBe(1);
    expect((await openVisit(ctx.services, patient, doctor)).serialNumber).toBe(2);

    ctx.clock.advanceDays(1);
    const nextDay = await openVisit(ctx.services, patient, doctor);
    expect(nextDay.visitDate).toBe('2024-01-16');
    expect(nextDay.serialNumber).toBe(1);
  });

  it('hands out distinct serials to simultaneous registrations', async () => {
    const visits = await Promise.all([1, 2, 3].map(() => openVisit(ctx.services, patient, doctor)));

    expect(visits.map((visit) => visit.serialNumber)).toEqual([1, 2, 3]);
  });

  it('refuses visits for an inactive doctor', async () => {
    await ctx.services.doctors.setStatus(doctor.id, DoctorStatus.INACTIVE);

    await expect(openVisit(ctx.services, patient, doctor))
      .rejects.toThrow(new ConflictError('Doctor Dr. Meera Iyer is not accepting visits'));
  });

  it('rejects an unknown payment mode before touching the store', async () => {
    await expect(ctx.services.visits.createVisit({
      patientId: patient.id,
      doctorId: doctor.id,
      visitType: VisitType.OPD_NEW,
      paymentMode: 'cheque'
    })).rejects.toThrow('Payment mode must be one of: CASH, UPI, CARD');
    expect(() => parseVisitType('walk-in')).toThrow('Visit type must be one of: OPD_NEW, OPD_FOLLOWUP');
  });

  it('moves a visit out of ACTIVE exactly once', async () => {
    const visit = await openVisit(ctx.services, patient, doctor);

    const completed = await ctx.services.visits.updateVisitStatus(visit.id, VisitStatus.COMPLETED);
    expect(completed.status).toBe(VisitStatus.COMPLETED);

    await expect(ctx.services.visits.updateVisitStatus(visit.id, VisitStatus.CANCELLED))
      .rejects.toThrow(`Visit ${visit.id} cannot move from COMPLETED to CANCELLED`);
  });

  it('lists the day\'s register in serial order', async () => {
    const first = await openVisit(ctx.services, patient, doctor);
    const second = await openVisit(ctx.services, await registerPatient(ctx.services, 'Vikram Shah'), doctor);

    const today = await ctx.services.visits.listDailyVisits();
    expect(today.map((visit) => visit.id)).toEqual([first.id, second.id]);
    expect(today[1].patient.name).toBe('Vikram Shah');

    expect(await ctx.services.visits.listDailyVisits('2024-01-14')).toEqual([]);
    await expect(ctx.services.visits.listDailyVisits('15/01/2024'))
      .rejects.toThrow(new ValidationError('Visit date must be YYYY-MM-DD'));
  });

  it('builds a slip with a QR code', async () => {
    const visit = await openVisit(ctx.services, patient, doctor);

    const slip = await ctx.services.visits.generateSlip(visit.id);

    expect(slip.slipType).toBe('OPD');
    expect(slip.qrData).toBe(`${patient.id}-${visit.id}-${Math.floor(START.getTime() / 1000)}`);
    expect(slip.qrCode.startsWith('data:image/png;base64,')).toBe(true);
    expect(slip.patient.name).toBe('Asha Rao');
    expect(slip.doctor).toEqual({ name: 'Dr. Meera Iyer', department: 'General Medicine' });
    expect(slip.visit.serialNumber).toBe(1);
    expect(slip.charges).toEqual({ opdFee: '300.00', paymentMode: PaymentMode.CASH });
    expect(slip.generatedAt).toBe(START.toISOString());
  });
});
