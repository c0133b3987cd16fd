import { Admission } from '../src/models/Admission';
import { ChargeType } from '../src/models/Charge';
import { ValidationError } from '../src/lib/errors';
import { OtProcedureInput } from '../src/services/otService';
import { START, TestContext, addBed, admitPatient, createTestContext, registerPatient } from './helpers/testDataSource';

describe('OtService', () => {
  let ctx: TestContext;
  let admission: Admission;

  const procedureFor = (admissionId: string): OtProcedureInput => ({
    admissionId,
    operationName: 'Appendectomy',
    operationDate: START,
    durationMinutes: 90,
    surgeonName: 'Dr. Rao',
    anesthesiaType: 'General',
    createdBy: 'admin-1'
  });

  beforeEach(async () => {
    ctx = await createTestContext();
    admission = await admitPatient(ctx.services, await registerPatient(ctx.services), await addBed(ctx.services));
  });

  afterEach(async () => {
    await ctx.dataSource.destroy();
  });

  it('records a procedure against an admission', async () => {
    const procedure = await ctx.services.ot.createProcedure({ ...procedureFor(admission.id), notes: '  ' });

    expect(procedure.id).toBe('OT20240115100000001');
    expect(procedure.operationName).toBe('Appendectomy');
    expect(procedure.notes).toBeNull();
    expect((await ctx.services.ot.listProcedures(admission.id)).map((entry) => entry.id)).toEqual([procedure.id]);
  });

  it('validates procedure input', async () => {
    await expect(ctx.services.ot.createProcedure({ ...procedureFor(admission.id), durationMinutes: 0 }))
      .rejects.toThrow(new ValidationError('Duration must be a positive number of minutes'));
    await expect(ctx.services.ot.createProcedure(procedureFor('IPD209901010001')))
      .rejects.toThrow('Admission IPD209901010001 not found');
  });

  it('bills one OT line per non-zero fee', async () => {
    const procedure = await ctx.services.ot.createProcedure(procedureFor(admission.id));

    const charges = await ctx.services.ot.addOtCharges(admission.id, procedure.id, {
      surgeonCharge: 5000,
      anesthesiaCharge: '1500',
      facilityCharge: 2000,
      assistantCharge: 0
    }, 'admin-1');

    expect(charges.map((charge) => charge.chargeName)).toEqual([
      'OT Surgeon Charge - Appendectomy',
      'OT Anesthesia Charge - Appendectomy',
      'OT Facility Charge - Appendectomy'
    ]);
    expect(charges.map((charge) => charge.totalAmount)).toEqual(['5000.00', '1500.00', '2000.00']);
    expect(charges.every((charge) => charge.chargeType === ChargeType.OT)).toBe(true);

    expect(await ctx.services.ot.listOtCharges(admission.id)).toHaveLength(3);
    expect(await ctx.services.billing.calculateTotalCharges({ kind: 'admission', admissionId: admission.id }))
      .toBe('8500.00');
  });

  it('bills nothing when every fee is zero', async () => {
    const procedure = await ctx.services.ot.createProcedure(procedureFor(admission.id));

    const charges = await ctx.services.ot.addOtCharges(admission.id, procedure.id, {
      surgeonCharge: 0,
      anesthesiaCharge: '0.00',
      facilityCharge: 0
    }, 'admin-1');

    expect(charges).toEqual([]);
  });

  it('rejects negative fees and procedures from another admission', async () => {
    const procedure = await ctx.services.ot.createProcedure(procedureFor(admission.id));

    await expect(ctx.services.ot.addOtCharges(admission.id, procedure.id, {
      surgeonCharge: -100,
      anesthesiaCharge: 0,
      facilityCharge: 0
    }, 'admin-1')).rejects.toThrow('Surgeon charge cannot be negative');

    const other = await admitPatient(
      ctx.services,
      await registerPatient(ctx.services, 'Vikram Shah'),
      await addBed(ctx.services, 'G-102')
    );
    await expect(ctx.services.ot.addOtCharges(other.id, procedure.id, {
      surgeonCharge: 100,
      anesthesiaCharge: 0,
      facilityCharge: 0
    }, 'admin-1')).rejects.toThrow(`OT procedure ${procedure.id} belongs to a different admission`);
  });
});
