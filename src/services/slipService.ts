import { DataSource } from 'typeorm';
import {
  ChargeSlipContent,
  PrinterFormat,
  Slip,
  SlipContent,
  SlipPatient,
  SlipType
} from '../models/Slip';
import { Patient } from '../models/Patient';
import { Visit } from '../models/Visit';
import { Admission } from '../models/Admission';
import { ChargeType } from '../models/Charge';
import { NotFoundError, ValidationError } from '../lib/errors';
import { Clock, systemClock } from '../lib/dates';
import { sumMoney } from '../lib/money';
import { createLogger } from '../lib/logger';
import { IdGenerator, ID_PREFIXES } from './idGenerator';
import { BillingService, ChargeTarget } from './billingService';
import { DischargeService } from './dischargeService';
import { VisitService, renderQrCode, slipQrData } from './visitService';

const log = createLogger({ service: 'slip' });

export type ChargeSlipType = ChargeSlipContent['slipType'];

const CHARGE_TYPE_OF: Record<ChargeSlipType, ChargeType> = {
  [SlipType.INVESTIGATION]: ChargeType.INVESTIGATION,
  [SlipType.PROCEDURE]: ChargeType.PROCEDURE,
  [SlipType.SERVICE]: ChargeType.SERVICE,
  [SlipType.OT]: ChargeType.OT
};

const CHARGE_SLIP_TYPES: readonly ChargeSlipType[] = [
  SlipType.INVESTIGATION,
  SlipType.PROCEDURE,
  SlipType.SERVICE,
  SlipType.OT
];

export function parsePrinterFormat(value?: string | null): PrinterFormat {
  if (value === undefined || value === null || !value.trim()) {
    return PrinterFormat.A4;
  }
  const format = Object.values(PrinterFormat).find((candidate) => candidate === value.trim().toUpperCase());
  if (!format) {
    throw new ValidationError(`Printer format must be one of: ${Object.values(PrinterFormat).join(', ')}`);
  }
  return format;
}

export function parseChargeSlipType(value: string): ChargeSlipType {
  const slipType = CHARGE_SLIP_TYPES.find((candidate) => candidate === value.trim().toUpperCase());
  if (!slipType) {
    throw new ValidationError(`Slip type must be one of: ${CHARGE_SLIP_TYPES.join(', ')}`);
  }
  return slipType;
}

const slipPatient = (patient: Patient): SlipPatient => ({
  id: patient.id,
  name: patient.name,
  age: patient.age,
  gender: patient.gender,
  mobile: patient.mobileNumber
});

interface NewSlip {
  patientId: string;
  visitId: string | null;
  admissionId: string | null;
  content: SlipContent;
  printerFormat: PrinterFormat;
  generatedBy: string;
}

/**
 * Printed slips. Each one is stored with the content it showed, so a
 * reprint reproduces it even after the underlying records have moved on.
 */
export class SlipService {
  private readonly clock: Clock;

  constructor(
    private readonly dataSource: DataSource,
    private readonly ids: IdGenerator,
    private readonly visits: VisitService,
    private readonly billing: BillingService,
    private readonly discharge: DischargeService,
    options: { clock?: Clock } = {}
  ) {
    this.clock = options.clock ?? systemClock;
  }

  async generateOpdSlip(visitId: string, generatedBy: string, printerFormat = PrinterFormat.A4): Promise<Slip> {
    const { qrData, qrCode, ...content } = await this.visits.generateSlip(visitId);
    return this.persist({
      patientId: content.patient.id,
      visitId,
      admissionId: null,
      content,
      printerFormat,
      generatedBy
    }, qrData, qrCode);
  }

  /** Investigation, procedure, service or OT lines of one visit or admission. */
  async generateChargeSlip(
    slipType: ChargeSlipType,
    target: ChargeTarget,
    generatedBy: string,
    printerFormat = PrinterFormat.A4
  ): Promise<Slip> {
    if (slipType === SlipType.OT && target.kind !== 'admission') {
      throw new ValidationError('OT slips are issued against an admission');
    }
    const patient = await this.patientOf(target);
    const charges = await this.billing.listChargesByType(target, CHARGE_TYPE_OF[slipType]);
    const lines = charges.map((charge) => ({
      name: charge.chargeName,
      quantity: charge.quantity,
      rate: charge.rate,
      total: charge.totalAmount
    }));

    return this.persist({
      patientId: patient.id,
      visitId: target.kind === 'visit' ? target.visitId : null,
      admissionId: target.kind === 'admission' ? target.admissionId : null,
      content: {
        slipType,
        patient: slipPatient(patient),
        visitId: target.kind === 'visit' ? target.visitId : null,
        admissionId: target.kind === 'admission' ? target.admissionId : null,
        lines,
        totalAmount: sumMoney(lines.map((line) => line.total)),
        generatedAt: this.clock().toISOString()
      },
      printerFormat,
      generatedBy
    });
  }

  generateOtSlip(admissionId: string, generatedBy: string, printerFormat = PrinterFormat.A4): Promise<Slip> {
    return this.generateChargeSlip(SlipType.OT, { kind: 'admission', admissionId }, generatedBy, printerFormat);
  }

  async generateDischargeSlip(admissionId: string, generatedBy: string, printerFormat = PrinterFormat.A4): Promise<Slip> {
    const bill = await this.discharge.generateDischargeBill(admissionId);
    return this.persist({
      patientId: bill.patient.id,
      visitId: null,
      admissionId,
      content: { slipType: SlipType.DISCHARGE, bill, generatedAt: bill.generatedAt },
      printerFormat,
      generatedBy
    });
  }

  /** A new slip carrying the original's content and QR code unchanged. */
  async reprintSlip(slipId: string, generatedBy: string): Promise<Slip> {
    const original = await this.getSlip(slipId);
    const repo = this.dataSource.getRepository(Slip);
    const reprint = await repo.save(repo.create({
      id: await this.ids.generateId(ID_PREFIXES.slip),
      patientId: original.patientId,
      visitId: original.visitId,
      admissionId: original.admissionId,
      slipType: original.slipType,
      qrData: original.qrData,
      qrCode: original.qrCode,
      content: original.content,
      printerFormat: original.printerFormat,
      isReprinted: true,
      originalSlipId: original.id,
      generatedAt: this.clock(),
      generatedBy
    }));
    log.info('Slip reprinted', { slipId: reprint.id, originalSlipId: original.id });
    return reprint;
  }

  async getSlip(slipId: string): Promise<Slip> {
    const slip = await this.dataSource.getRepository(Slip).findOneBy({ id: slipId });
    if (!slip) {
      throw new NotFoundError('Slip', slipId);
    }
    return slip;
  }

  listPatientSlips(patientId: string): Promise<Slip[]> {
    return this.dataSource.getRepository(Slip).find({
      where: { patientId },
      order: { generatedAt: 'DESC', id: 'DESC' }
    });
  }

  listVisitSlips(visitId: string): Promise<Slip[]> {
    return this.dataSource.getRepository(Slip).find({
      where: { visitId },
      order: { generatedAt: 'DESC', id: 'DESC' }
    });
  }

  listAdmissionSlips(admissionId: string): Promise<Slip[]> {
    return this.dataSource.getRepository(Slip).find({
      where: { admissionId },
      order: { generatedAt: 'DESC', id: 'DESC' }
    });
  }

  private async patientOf(target: ChargeTarget): Promise<Patient> {
    const manager = this.dataSource.manager;
    if (target.kind === 'visit') {
      const visit = await manager.findOne(Visit, { where: { id: target.visitId }, relations: { patient: true } });
      if (!visit) {
        throw new NotFoundError('Visit', target.visitId);
      }
      return visit.patient;
    }
    const admission = await manager.findOne(Admission, { where: { id: target.admissionId }, relations: { patient: true } });
    if (!admission) {
      throw new NotFoundError('Admission', target.admissionId);
    }
    return admission.patient;
  }

  private async persist(slip: NewSlip, qrData?: string, qrCode?: string): Promise<Slip> {
    const recordId = slip.visitId ?? slip.admissionId ?? slip.patientId;
    const data = qrData ?? slipQrData(slip.patientId, recordId, this.clock());
    const repo = this.dataSource.getRepository(Slip);
    const saved = await repo.save(repo.create({
      id: await this.ids.generateId(ID_PREFIXES.slip),
      ...slip,
      slipType: slip.content.slipType,
      qrData: data,
      qrCode: qrCode ?? await renderQrCode(data),
      isReprinted: false,
      originalSlipId: null,
      generatedAt: this.clock()
    }));
    log.info('Slip generated', { slipId: saved.id, slipType: saved.slipType, patientId: saved.patientId });
    return saved;
  }
}
