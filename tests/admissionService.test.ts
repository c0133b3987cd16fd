import { Admission, AdmissionStatus } from '../src/models/Admission';
import { BedStatus, WardType } from '../src/models/Bed';
import { AuditAction } from '../src/models/AuditLog';
import { ConflictError, ValidationError, isUniqueViolation } from '../src/lib/errors';
import { BEDS_TABLE, stayDays } from '../src/services/admissionService';
import { START, TestContext, addBed, admitPatient, createTestContext, registerPatient } from './helpers/testDataSource';

describe('AdmissionService', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await createTestContext();
  });

  afterEach(async () => {
    await ctx.dataSource.destroy();
  });

  describe('stayDays', () => {
    it('counts whole elapsed days with a one-day minimum', () => {
      const hours = (h: number) => new Date(START.getTime() + h * 60 * 60 * 1000);
      expect(stayDays(START, START)).toBe(1);
      expect(stayDays(START, hours(36))).toBe(1);
      expect(stayDays(START, hours(77))).toBe(3);
    });
  });

  describe('beds', () => {
    it('creates beds with a normalized rate and rejects duplicate numbers', async () => {
      const bed = await ctx.services.admissions.createBed({ bedNumber: ' G-101 ', wardType: WardType.GENERAL, perDayCharge: 800 });

      expect(bed.id).toBe('BED20240115100000001');
      expect(bed.bedNumber).toBe('G-101');
      expect(bed.perDayCharge).toBe('800.00');
      expect(bed.status).toBe(BedStatus.AVAILABLE);

      await expect(
        ctx.services.admissions.createBed({ bedNumber: 'G-101', wardType: WardType.PRIVATE, perDayCharge: '1500' })
      ).rejects.toThrow(new ConflictError('Bed number G-101 already exists'));
      await expect(
        ctx.services.admissions.createBed({ bedNumber: 'GEN-WARD-11', wardType: WardType.GENERAL, perDayCharge: 800 })
      ).rejects.toThrow(new ValidationError('Bed number cannot exceed 10 characters'));
    });

    it('only moves beds between AVAILABLE and MAINTENANCE by hand', async () => {
      const bed = await addBed(ctx.services);

      const parked = await ctx.services.admissions.updateBedStatus(bed.id, BedStatus.MAINTENANCE);
      expect(parked.status).toBe(BedStatus.MAINTENANCE);

      await expect(ctx.services.admissions.updateBedStatus(bed.id, BedStatus.OCCUPIED))
        .rejects.toThrow(new ValidationError('Bed status can only be set to AVAILABLE or MAINTENANCE'));

      const patient = await registerPatient(ctx.services);
      await expect(admitPatient(ctx.services, patient, bed))
        .rejects.toThrow('Bed G-101 is not available (current status: MAINTENANCE)');
    });

    it('refuses to take an occupied bed out of service', async () => {
      const bed = await addBed(ctx.services);
      await admitPatient(ctx.services, await registerPatient(ctx.services), bed);

      await expect(ctx.services.admissions.updateBedStatus(bed.id, BedStatus.MAINTENANCE))
        .rejects.toThrow('Bed G-101 is occupied; discharge or move the patient first');
    });

    it('audits per-day rate changes', async () => {
      const bed = await addBed(ctx.services);

      const updated = await ctx.services.admissions.updateBedRate(bed.id, 950, 'admin-1');
      expect(updated.perDayCharge).toBe('950.00');

      const entries = await ctx.services.audit.listByRecord(BEDS_TABLE, bed.id);
      expect(entries).toHaveLength(1);
      expect(entries[0].actionType).toBe(AuditAction.RATE_CHANGE);
      expect(entries[0].actorId).toBe('admin-1');
      expect(entries[0].oldValue).toEqual({ field: 'perDayCharge', rate: '800.00' });
      expect(entries[0].newValue).toEqual({ field: 'perDayCharge', rate: '950.00' });
    });

    it('writes no audit entry when the rate stays the same', async () => {
      const bed = await addBed(ctx.services, 'G-101', '800.00');

      const unchanged = await ctx.services.admissions.updateBedRate(bed.id, '800', 'admin-1');

      expect(unchanged.perDayCharge).toBe('800.00');
      expect(await ctx.services.audit.listByRecord(BEDS_TABLE, bed.id)).toEqual([]);
    });

    it('reports occupancy per ward', async () => {
      const general = await addBed(ctx.services, 'G-101');
      await addBed(ctx.services, 'G-102');
      const privateBed = await ctx.services.admissions.createBed({ bedNumber: 'P-1', wardType: WardType.PRIVATE, perDayCharge: '2500.00' });
      await admitPatient(ctx.services, await registerPatient(ctx.services), general);
      await ctx.services.admissions.updateBedStatus(privateBed.id, BedStatus.MAINTENANCE);

      const stats = await ctx.services.admissions.getOccupancyStats();

      expect(stats.total).toBe(3);
      expect(stats.available).toBe(1);
      expect(stats.occupied).toBe(1);
      expect(stats.maintenance).toBe(1);
      expect(stats.wards).toEqual([
        { wardType: WardType.GENERAL, total: 2, available: 1, occupied: 1, maintenance: 0 },
        { wardType: WardType.SEMI_PRIVATE, total: 0, available: 0, occupied: 0, maintenance: 0 },
        { wardType: WardType.PRIVATE, total: 1, available: 0, occupied: 0, maintenance: 1 }
      ]);

      const available = await ctx.services.admissions.listAvailableBeds();
      expect(available.map((bed) => bed.bedNumber)).toEqual(['G-102']);
    });
  });

  describe('admissions', () => {
    it('occupies the bed and lets only one admission hold it', async () => {
      const bed = await addBed(ctx.services);
      const first = await registerPatient(ctx.services, 'Asha Rao');
      const second = await registerPatient(ctx.services, 'Vikram Shah');

      const admission = await admitPatient(ctx.services, first, bed);
      expect(admission.id).toBe('IPD202401150001');
      expect(admission.status).toBe(AdmissionStatus.ADMITTED);
      expect(admission.fileCharge).toBe('100.00');
      expect((await ctx.services.admissions.getBed(bed.id)).status).toBe(BedStatus.OCCUPIED);

      await expect(admitPatient(ctx.services, second, bed))
        .rejects.toThrow(new ConflictError('Bed G-101 is not available (current status: OCCUPIED)'));
    });

    it('lets exactly one of two simultaneous admits take a bed', async () => {
      const bed = await addBed(ctx.services);
      const first = await registerPatient(ctx.services, 'Asha Rao');
      const second = await registerPatient(ctx.services, 'Vikram Shah');

      const results = await Promise.allSettled([
        admitPatient(ctx.services, first, bed),
        admitPatient(ctx.services, second, bed)
      ]);

      const admitted = results.flatMap((result) => (result.status === 'fulfilled' ? [result.value] : []));
      const refused = results.flatMap((result) => (result.status === 'rejected' ? [result.reason] : []));
      expect(admitted.map((admission) => admission.patientId)).toEqual([first.id]);
      expect(refused).toHaveLength(1);
      expect(refused[0]).toBeInstanceOf(ConflictError);
      expect(refused[0]).toMatchObject({ message: 'Bed G-101 is not available (current status: OCCUPIED)' });

      expect((await ctx.services.admissions.getBed(bed.id)).status).toBe(BedStatus.OCCUPIED);
      expect(await ctx.services.admissions.listActiveAdmissions()).toHaveLength(1);
    });

    it('admits a patient into only one of two beds requested at once', async () => {
      const patient = await registerPatient(ctx.services);
      const bedA = await addBed(ctx.services, 'G-101');
      const bedB = await addBed(ctx.services, 'G-102');

      const results = await Promise.allSettled([
        admitPatient(ctx.services, patient, bedA),
        admitPatient(ctx.services, patient, bedB)
      ]);

      expect(results.map((result) => result.status)).toEqual(['fulfilled', 'rejected']);
      const refused = results[1];
      expect(refused.status === 'rejected' ? refused.reason : undefined)
        .toEqual(new ConflictError(`Patient ${patient.id} is already admitted (admission IPD202401150001)`));
      expect((await ctx.services.admissions.getBed(bedB.id)).status).toBe(BedStatus.AVAILABLE);
    });

    it('keeps a unique index on active admissions per patient', async () => {
      const patient = await registerPatient(ctx.services);
      await admitPatient(ctx.services, patient, await addBed(ctx.services, 'G-101'));
      const spare = await addBed(ctx.services, 'G-102');

      const repo = ctx.dataSource.getRepository(Admission);
      const failure = await repo.save(repo.create({
        id: 'IPD202401159999',
        patientId: patient.id,
        visitId: null,
        bedId: spare.id,
        admissionDate: START,
        dischargeDate: null,
        fileCharge: '0.00',
        status: AdmissionStatus.ADMITTED
      })).then(() => undefined, (error: unknown) => error);

      expect(isUniqueViolation(failure)).toBe(true);
    });

    it('refuses a second active admission for the same patient', async () => {
      const patient = await registerPatient(ctx.services);
      await admitPatient(ctx.services, patient, await addBed(ctx.services, 'G-101'));

      await expect(admitPatient(ctx.services, patient, await addBed(ctx.services, 'G-102')))
        .rejects.toThrow(`Patient ${patient.id} is already admitted (admission IPD202401150001)`);
    });

    it('discharges once and frees the bed', async () => {
      const bed = await addBed(ctx.services);
      const admission = await admitPatient(ctx.services, await registerPatient(ctx.services), bed);

      ctx.clock.advanceDays(2);
      const discharged = await ctx.services.admissions.discharge(admission.id);

      expect(discharged.status).toBe(AdmissionStatus.DISCHARGED);
      expect(discharged.dischargeDate?.getTime()).toBe(START.getTime() + 2 * 24 * 60 * 60 * 1000);
      expect((await ctx.services.admissions.getBed(bed.id)).status).toBe(BedStatus.AVAILABLE);

      await expect(ctx.services.admissions.discharge(admission.id))
        .rejects.toThrow(new ConflictError('Admission IPD202401150001 is not active (current status: DISCHARGED)'));
    });

    it('rejects a discharge dated before the admission', async () => {
      const bed = await addBed(ctx.services);
      const admission = await admitPatient(ctx.services, await registerPatient(ctx.services), bed);

      await expect(ctx.services.admissions.discharge(admission.id, new Date(START.getTime() - 60 * 1000)))
        .rejects.toThrow(new ValidationError('Discharge date cannot be before the admission date'));
      expect((await ctx.services.admissions.getBed(bed.id)).status).toBe(BedStatus.OCCUPIED);
    });

    it('moves a patient between beds', async () => {
      const from = await addBed(ctx.services, 'G-101');
      const to = await addBed(ctx.services, 'G-102');
      const admission = await admitPatient(ctx.services, await registerPatient(ctx.services), from);

      const moved = await ctx.services.admissions.changeBed(admission.id, to.id);

      expect(moved.bedId).toBe(to.id);
      expect((await ctx.services.admissions.getBed(from.id)).status).toBe(BedStatus.AVAILABLE);
      expect((await ctx.services.admissions.getBed(to.id)).status).toBe(BedStatus.OCCUPIED);
    });

    it('leaves everything in place when the target bed is taken', async () => {
      const bedA = await addBed(ctx.services, 'G-101');
      const bedB = await addBed(ctx.services, 'G-102');
      const first = await admitPatient(ctx.services, await registerPatient(ctx.services, 'Asha Rao'), bedA);
      await admitPatient(ctx.services, await registerPatient(ctx.services, 'Vikram Shah'), bedB);

      await expect(ctx.services.admissions.changeBed(first.id, bedB.id))
        .rejects.toThrow('Bed G-102 is not available (current status: OCCUPIED)');

      expect((await ctx.services.admissions.getAdmission(first.id)).bedId).toBe(bedA.id);
      expect((await ctx.services.admissions.getBed(bedA.id)).status).toBe(BedStatus.OCCUPIED);
    });

    it('transfers a patient out and frees the bed', async () => {
      const bed = await addBed(ctx.services);
      const admission = await admitPatient(ctx.services, await registerPatient(ctx.services), bed);

      const transferred = await ctx.services.admissions.transferOut(admission.id);

      expect(transferred.status).toBe(AdmissionStatus.TRANSFERRED);
      expect((await ctx.services.admissions.getBed(bed.id)).status).toBe(BedStatus.AVAILABLE);
      expect(await ctx.services.admissions.listActiveAdmissions()).toEqual([]);
    });

    it('prices the stay from whole days at the bed rate', async () => {
      const bed = await addBed(ctx.services, 'G-101', '800.00');
      const admission = await admitPatient(ctx.services, await registerPatient(ctx.services), bed);

      ctx.clock.advanceHours(5);
      expect(await ctx.services.admissions.computeBedCharges(admission.id)).toEqual({
        admissionId: admission.id,
        bedId: bed.id,
        days: 1,
        perDayCharge: '800.00',
        total: '800.00'
      });

      ctx.clock.advanceHours(3 * 24);
      const summary = await ctx.services.admissions.computeBedCharges(admission.id);
      expect(summary.days).toBe(3);
      expect(summary.total).toBe('2400.00');
    });
  });
});
