import { Admission } from '../src/models/Admission';
import { Patient } from '../src/models/Patient';
import { PaymentMode, PaymentStatus, PaymentType } from '../src/models/Payment';
import { Visit } from '../src/models/Visit';
import { NotFoundError, ValidationError } from '../src/lib/errors';
import { parsePaymentMode, parsePaymentTarget } from '../src/services/paymentService';
import {
  TestContext,
  addBed,
  addDoctor,
  admitPatient,
  createTestContext,
  openVisit,
  registerPatient
} from './helpers/testDataSource';

describe('parsing payment input', () => {
  it('reads payment modes case-insensitively', () => {
    expect(parsePaymentMode('upi')).toBe(PaymentMode.UPI);
    expect(parsePaymentMode(' Card ')).toBe(PaymentMode.CARD);
    expect(() => parsePaymentMode('cheque')).toThrow(new ValidationError('Payment mode must be one of: CASH, UPI, CARD'));
  });

  it('lets a payment stand on the patient alone', () => {
    expect(parsePaymentTarget(undefined, undefined)).toEqual({ kind: 'none' });
    expect(parsePaymentTarget('V1', '')).toEqual({ kind: 'visit', visitId: 'V1' });
    expect(() => parsePaymentTarget('V1', 'IPD1')).toThrow('A payment cannot belong to both a visit and an admission');
  });
});

describe('PaymentService', () => {
  let ctx: TestContext;
  let patient: Patient;
  let visit: Visit;
  let admission: Admission;

  beforeEach(async () => {
    ctx = await createTestContext();
    patient = await registerPatient(ctx.services);
    visit = await openVisit(ctx.services, patient, await addDoctor(ctx.services));
    admission = await admitPatient(ctx.services, patient, await addBed(ctx.services), '100.00');
  });

  afterEach(async () => {
    await ctx.dataSource.destroy();
  });

  it('records a completed payment with a normalized mode and amount', async () => {
    const payment = await ctx.services.payments.recordPayment({
      patientId: patient.id,
      amount: 300,
      paymentMode: 'upi',
      paymentType: PaymentType.OPD_FEE,
      target: { kind: 'visit', visitId: visit.id },
      createdBy: 'staff-1',
      transactionReference: '  UPI-REF-1  '
    });

    expect(payment.id).toBe('PAY20240115100000001');
    expect(payment.amount).toBe('300.00');
    expect(payment.paymentMode).toBe(PaymentMode.UPI);
    expect(payment.paymentStatus).toBe(PaymentStatus.COMPLETED);
    expect(payment.visitId).toBe(visit.id);
    expect(payment.admissionId).toBeNull();
    expect(payment.transactionReference).toBe('UPI-REF-1');
    expect(payment.notes).toBeNull();
  });

  it('rejects amounts that are not positive', async () => {
    for (const amount of [0, '-5.00']) {
      await expect(ctx.services.payments.recordPayment({
        patientId: patient.id,
        amount,
        paymentMode: 'CASH',
        paymentType: PaymentType.MANUAL,
        createdBy: 'staff-1'
      })).rejects.toThrow(new ValidationError('Amount must be positive'));
    }
  });

  it('refuses to file a payment against another patient\'s visit', async () => {
    const other = await registerPatient(ctx.services, 'Vikram Shah');

    await expect(ctx.services.payments.recordPayment({
      patientId: other.id,
      amount: 300,
      paymentMode: 'CASH',
      paymentType: PaymentType.OPD_FEE,
      target: { kind: 'visit', visitId: visit.id },
      createdBy: 'staff-1'
    })).rejects.toThrow(`Visit ${visit.id} belongs to a different patient`);
    expect(await ctx.services.payments.listByPatient(other.id)).toEqual([]);
  });

  it('records advances against the admission\'s patient', async () => {
    const advance = await ctx.services.payments.recordAdvance(admission.id, '5000', 'cash', 'staff-1', { notes: 'At admission' });

    expect(advance.patientId).toBe(patient.id);
    expect(advance.paymentType).toBe(PaymentType.IPD_ADVANCE);
    expect(advance.admissionId).toBe(admission.id);
    expect(advance.notes).toBe('At admission');

    const advances = await ctx.services.payments.listAdvances(admission.id);
    expect(advances.map((payment) => payment.id)).toEqual([advance.id]);
    expect(await ctx.services.payments.calculateTotalPaid({ kind: 'admission', admissionId: admission.id })).toBe('5000.00');

    await expect(ctx.services.payments.recordAdvance('IPD209901010001', 100, 'CASH', 'staff-1'))
      .rejects.toThrow(new NotFoundError('Admission', 'IPD209901010001'));
  });

  it('needs a target to total payments', async () => {
    await expect(ctx.services.payments.calculateTotalPaid({ kind: 'none' }))
      .rejects.toThrow('A patient, visit or admission is required');
  });

  describe('balances', () => {
    beforeEach(async () => {
      await ctx.services.billing.addProcedureCharges({ kind: 'visit', visitId: visit.id }, [{ name: 'Nebulization', rate: 150 }], 'staff-1');
      await ctx.services.billing.addInvestigationCharges({ kind: 'admission', admissionId: admission.id }, [{ name: 'CBC', rate: 350 }], 'staff-1');
      await ctx.services.payments.recordPayment({
        patientId: patient.id,
        amount: 300,
        paymentMode: 'CASH',
        paymentType: PaymentType.OPD_FEE,
        target: { kind: 'visit', visitId: visit.id },
        createdBy: 'staff-1'
      });
      await ctx.services.payments.recordAdvance(admission.id, 1000, 'CARD', 'staff-1');
    });

    it('covers every visit and admission of the patient by default', async () => {
      expect(await ctx.services.payments.calculateBalance(patient.id)).toEqual({
        patientId: patient.id,
        totalCharges: '900.00',
        totalPaid: '1300.00',
        balanceDue: '-400.00',
        advanceBalance: '1000.00'
      });
    });

    it('narrows to a single visit', async () => {
      expect(await ctx.services.payments.calculateBalance(patient.id, { visitId: visit.id })).toEqual({
        patientId: patient.id,
        totalCharges: '450.00',
        totalPaid: '300.00',
        balanceDue: '150.00',
        advanceBalance: '0.00'
      });
    });

    it('narrows to a single admission', async () => {
      expect(await ctx.services.payments.calculateBalance(patient.id, { admissionId: admission.id })).toEqual({
        patientId: patient.id,
        totalCharges: '450.00',
        totalPaid: '1000.00',
        balanceDue: '-550.00',
        advanceBalance: '1000.00'
      });
    });

    it('counts untargeted payments only in the whole-patient balance', async () => {
      await ctx.services.payments.recordPayment({
        patientId: patient.id,
        amount: '50.00',
        paymentMode: 'CASH',
        paymentType: PaymentType.MANUAL,
        createdBy: 'staff-1'
      });

      expect((await ctx.services.payments.calculateBalance(patient.id)).totalPaid).toBe('1350.00');
      expect((await ctx.services.payments.calculateBalance(patient.id, { visitId: visit.id })).totalPaid).toBe('300.00');
    });

    it('rejects a scope that belongs to someone else', async () => {
      const other = await registerPatient(ctx.services, 'Vikram Shah');

      await expect(ctx.services.payments.calculateBalance(other.id, { admissionId: admission.id }))
        .rejects.toThrow(`Admission ${admission.id} belongs to a different patient`);
    });
  });
});
