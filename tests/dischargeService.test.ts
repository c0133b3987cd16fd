import { AdmissionStatus } from '../src/models/Admission';
import { BedStatus } from '../src/models/Bed';
import { PaymentType } from '../src/models/Payment';
import { ConflictError, NotFoundError } from '../src/lib/errors';
import { FILE_CHARGE_GROUP, OPD_FEE_GROUP } from '../src/services/dischargeService';
import {
  START,
  TestContext,
  addBed,
  addDoctor,
  admitPatient,
  createTestContext,
  openVisit,
  registerPatient
} from './helpers/testDataSource';

describe('DischargeService', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await createTestContext();
  });

  afterEach(async () => {
    await ctx.dataSource.destroy();
  });

  it('shows a refund due when the advance exceeds the bill', async () => {
    const patient = await registerPatient(ctx.services);
    const admission = await admitPatient(ctx.services, patient, await addBed(ctx.services), '100.00');
    await ctx.services.payments.recordAdvance(admission.id, '5000.00', 'CASH', 'staff-1');

    const bill = await ctx.services.discharge.generateDischargeBill(admission.id);

    expect(bill.chargesByType).toEqual({
      [FILE_CHARGE_GROUP]: [{ name: 'IPD File Charge', quantity: 1, rate: '100.00', total: '100.00' }]
    });
    expect(bill.summary).toEqual({
      totalCharges: '100.00',
      totalPaid: '5000.00',
      advancePaid: '5000.00',
      balanceDue: '-4900.00'
    });
    expect(await ctx.services.discharge.calculatePendingAmount(admission.id)).toBe('-4900.00');
  });

  it('itemizes the stay by charge type', async () => {
    const patient = await registerPatient(ctx.services);
    const visit = await openVisit(ctx.services, patient, await addDoctor(ctx.services));
    const bed = await addBed(ctx.services, 'G-101', '800.00');
    const admission = await ctx.services.admissions.admit({
      patientId: patient.id,
      bedId: bed.id,
      fileCharge: '100.00',
      visitId: visit.id
    });
    const target = { kind: 'admission' as const, admissionId: admission.id };
    await ctx.services.billing.addInvestigationCharges(target, [{ name: 'CBC', rate: 350 }], 'staff-1');
    const advance = await ctx.services.payments.recordAdvance(admission.id, 1000, 'CASH', 'staff-1');

    ctx.clock.advanceHours(3 * 24 + 2);
    await ctx.services.billing.addBedCharge(admission.id, 'staff-1');

    const bill = await ctx.services.discharge.generateDischargeBill(admission.id);

    expect(Object.keys(bill.chargesByType)).toEqual([FILE_CHARGE_GROUP, OPD_FEE_GROUP, 'INVESTIGATION', 'BED']);
    expect(bill.chargesByType[OPD_FEE_GROUP]).toEqual([
      { name: 'OPD Consultation Fee', quantity: 1, rate: '300.00', total: '300.00' }
    ]);
    expect(bill.chargesByType.BED).toEqual([
      { name: 'Bed Charges - G-101', quantity: 3, rate: '800.00', total: '2400.00' }
    ]);
    expect(bill.summary).toEqual({
      totalCharges: '3150.00',
      totalPaid: '1000.00',
      advancePaid: '1000.00',
      balanceDue: '2150.00'
    });
    expect(bill.payments).toEqual([{
      paymentId: advance.id,
      date: START.toISOString(),
      amount: '1000.00',
      mode: 'CASH',
      type: PaymentType.IPD_ADVANCE,
      reference: null
    }]);
    expect(bill.patient).toEqual({
      id: patient.id,
      name: 'Asha Rao',
      age: 42,
      gender: 'FEMALE',
      mobile: patient.mobileNumber,
      address: '12 MG Road, Pune'
    });
    expect(bill.admission).toEqual({
      status: AdmissionStatus.ADMITTED,
      bedNumber: 'G-101',
      admissionDate: START.toISOString(),
      dischargeDate: null,
      days: 3
    });
  });

  it('discharges through the admission state machine', async () => {
    const bed = await addBed(ctx.services);
    const admission = await admitPatient(ctx.services, await registerPatient(ctx.services), bed);

    ctx.clock.advanceDays(2);
    const discharged = await ctx.services.discharge.processDischarge(admission.id);

    expect(discharged.status).toBe(AdmissionStatus.DISCHARGED);
    expect((await ctx.services.admissions.getBed(bed.id)).status).toBe(BedStatus.AVAILABLE);

    // Later reads keep the stay length fixed at the discharge date
    ctx.clock.advanceDays(5);
    const bill = await ctx.services.discharge.generateDischargeBill(admission.id);
    expect(bill.admission.status).toBe(AdmissionStatus.DISCHARGED);
    expect(bill.admission.days).toBe(2);

    await expect(ctx.services.discharge.processDischarge(admission.id)).rejects.toBeInstanceOf(ConflictError);
  });

  it('fails for an unknown admission', async () => {
    await expect(ctx.services.discharge.generateDischargeBill('IPD209901010001'))
      .rejects.toThrow(new NotFoundError('Admission', 'IPD209901010001'));
  });
});
