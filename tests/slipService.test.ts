import { Gender, Patient } from '../src/models/Patient';
import { Visit } from '../src/models/Visit';
import { PrinterFormat, SlipType } from '../src/models/Slip';
import { NotFoundError, ValidationError } from '../src/lib/errors';
import { ChargeTarget } from '../src/services/billingService';
import { parseChargeSlipType, parsePrinterFormat } from '../src/services/slipService';
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

const START_SECONDS = Math.floor(START.getTime() / 1000);

describe('parsing slip input', () => {
  it('defaults to A4 and reads formats case-insensitively', () => {
    expect(parsePrinterFormat(undefined)).toBe(PrinterFormat.A4);
    expect(parsePrinterFormat(' thermal ')).toBe(PrinterFormat.THERMAL);
    expect(() => parsePrinterFormat('laser')).toThrow(new ValidationError('Printer format must be one of: A4, THERMAL'));
  });

  it('accepts only charge slip types', () => {
    expect(parseChargeSlipType('ot')).toBe(SlipType.OT);
    expect(() => parseChargeSlipType('DISCHARGE'))
      .toThrow(new ValidationError('Slip type must be one of: INVESTIGATION, PROCEDURE, SERVICE, OT'));
  });
});

describe('SlipService', () => {
  let ctx: TestContext;
  let patient: Patient;
  let visit: Visit;
  let visitTarget: ChargeTarget;

  beforeEach(async () => {
    ctx = await createTestContext();
    patient = await registerPatient(ctx.services);
    visit = await openVisit(ctx.services, patient, await addDoctor(ctx.services));
    visitTarget = { kind: 'visit', visitId: visit.id };
  });

  afterEach(async () => {
    await ctx.dataSource.destroy();
  });

  it('stores an OPD slip with its QR code outside the content', async () => {
    const slip = await ctx.services.slips.generateOpdSlip(visit.id, 'desk-1');

    expect(slip.id).toBe('SLIP20240115100000001');
    expect(slip.slipType).toBe(SlipType.OPD);
    expect(slip.printerFormat).toBe(PrinterFormat.A4);
    expect(slip.patientId).toBe(patient.id);
    expect(slip.visitId).toBe(visit.id);
    expect(slip.admissionId).toBeNull();
    expect(slip.isReprinted).toBe(false);
    expect(slip.qrData).toBe(`${patient.id}-${visit.id}-${START_SECONDS}`);
    expect(slip.qrCode.startsWith('data:image/png;base64,')).toBe(true);
    expect('qrCode' in slip.content).toBe(false);

    const stored = await ctx.services.slips.getSlip(slip.id);
    expect(stored.content).toEqual(slip.content);
    expect(stored.generatedBy).toBe('desk-1');
  });

  it('lists only the lines of the requested type with their total', async () => {
    await ctx.services.billing.addInvestigationCharges(visitTarget, [
      { name: 'CBC', rate: '250.00' },
      { name: 'Lipid Profile', rate: '400.50', quantity: 2 }
    ], 'desk-1');
    await ctx.services.billing.addProcedureCharges(visitTarget, [{ name: 'Dressing', rate: '150.00' }], 'desk-1');

    const slip = await ctx.services.slips.generateChargeSlip(SlipType.INVESTIGATION, visitTarget, 'desk-1', PrinterFormat.THERMAL);

    expect(slip.printerFormat).toBe(PrinterFormat.THERMAL);
    expect(slip.qrData).toBe(`${patient.id}-${visit.id}-${START_SECONDS}`);
    expect(slip.content).toEqual({
      slipType: SlipType.INVESTIGATION,
      patient: { id: patient.id, name: 'Asha Rao', age: 42, gender: Gender.FEMALE, mobile: patient.mobileNumber },
      visitId: visit.id,
      admissionId: null,
      lines: [
        { name: 'CBC', quantity: 1, rate: '250.00', total: '250.00' },
        { name: 'Lipid Profile', quantity: 2, rate: '400.50', total: '801.00' }
      ],
      totalAmount: '1051.00',
      generatedAt: START.toISOString()
    });
  });

  it('issues OT slips against an admission only', async () => {
    await expect(ctx.services.slips.generateChargeSlip(SlipType.OT, visitTarget, 'desk-1'))
      .rejects.toThrow(new ValidationError('OT slips are issued against an admission'));

    const admission = await admitPatient(ctx.services, patient, await addBed(ctx.services));
    const slip = await ctx.services.slips.generateOtSlip(admission.id, 'desk-1');

    expect(slip.visitId).toBeNull();
    expect(slip.admissionId).toBe(admission.id);
    expect(slip.qrData).toBe(`${patient.id}-${admission.id}-${START_SECONDS}`);
    expect(slip.content).toMatchObject({ slipType: SlipType.OT, lines: [], totalAmount: '0.00' });
  });

  it('refuses slips for unknown records', async () => {
    await expect(ctx.services.slips.generateOtSlip('IPD209901010001', 'desk-1'))
      .rejects.toThrow(new NotFoundError('Admission', 'IPD209901010001'));
    await expect(ctx.services.slips.generateOpdSlip('V20990101000000001', 'desk-1'))
      .rejects.toThrow('Visit V20990101000000001 not found');
    await expect(ctx.services.slips.reprintSlip('SLIP1', 'desk-1'))
      .rejects.toThrow('Slip SLIP1 not found');
  });

  it('keeps the discharge bill as it stood when printed', async () => {
    const admission = await admitPatient(ctx.services, patient, await addBed(ctx.services), '100.00');
    await ctx.services.payments.recordAdvance(admission.id, '5000.00', 'CASH', 'desk-1');

    const slip = await ctx.services.slips.generateDischargeSlip(admission.id, 'desk-1');
    await ctx.services.billing.addInvestigationCharges({ kind: 'admission', admissionId: admission.id }, [
      { name: 'X-Ray', rate: '600.00' }
    ], 'desk-1');

    expect(slip.slipType).toBe(SlipType.DISCHARGE);
    expect((await ctx.services.slips.getSlip(slip.id)).content).toMatchObject({
      slipType: SlipType.DISCHARGE,
      bill: {
        admissionId: admission.id,
        summary: { totalCharges: '100.00', totalPaid: '5000.00', advancePaid: '5000.00', balanceDue: '-4900.00' }
      },
      generatedAt: START.toISOString()
    });
  });

  it('reprints a slip with the same content and QR code', async () => {
    const original = await ctx.services.slips.generateOpdSlip(visit.id, 'desk-1');
    ctx.clock.advanceHours(1);

    const reprint = await ctx.services.slips.reprintSlip(original.id, 'desk-2');

    expect(reprint.id).toBe('SLIP20240115110000001');
    expect(reprint.isReprinted).toBe(true);
    expect(reprint.originalSlipId).toBe(original.id);
    expect(reprint.generatedBy).toBe('desk-2');
    expect(reprint.generatedAt).toEqual(new Date(START.getTime() + 60 * 60 * 1000));
    expect(reprint.qrData).toBe(original.qrData);
    expect(reprint.qrCode).toBe(original.qrCode);
    expect(reprint.content).toEqual(original.content);
  });

  it('lists slips by patient, visit and admission, newest first', async () => {
    const opd = await ctx.services.slips.generateOpdSlip(visit.id, 'desk-1');
    ctx.clock.advanceHours(1);
    const admission = await admitPatient(ctx.services, patient, await addBed(ctx.services));
    const investigation = await ctx.services.slips.generateChargeSlip(SlipType.INVESTIGATION, visitTarget, 'desk-1');
    const ot = await ctx.services.slips.generateOtSlip(admission.id, 'desk-1');

    const ids = (slips: Array<{ id: string }>) => slips.map((slip) => slip.id);
    expect(ids(await ctx.services.slips.listPatientSlips(patient.id))).toEqual([ot.id, investigation.id, opd.id]);
    expect(ids(await ctx.services.slips.listVisitSlips(visit.id))).toEqual([investigation.id, opd.id]);
    expect(ids(await ctx.services.slips.listAdmissionSlips(admission.id))).toEqual([ot.id]);
  });
});
