import { Request, Response } from 'express';
import { AuthRequest, actorOf } from '../middleware/auth';
import { getServices } from '../services/registry';
import { ChargeItem, ChargeTarget, ServiceItem, parseChargeTarget, parseChargeType } from '../services/billingService';
import { ChargeType } from '../models/Charge';
import { queryString, rejectInvalid } from './helpers';

/**
 * Billing controller - charge ledger of visits and admissions
 */

const bodyTarget = (req: Request): ChargeTarget => parseChargeTarget(req.body.visitId, req.body.admissionId);

const queryTarget = (req: Request): ChargeTarget =>
  parseChargeTarget(queryString(req, 'visitId'), queryString(req, 'admissionId'));

const chargeItems = (req: Request): ChargeItem[] =>
  req.body.items.map((item: ChargeItem) => ({ name: item.name, rate: item.rate, quantity: item.quantity }));

export const createCharge = async (req: AuthRequest, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const { chargeType, chargeName, rate, quantity } = req.body;
  const charge = await getServices().billing.createCharge({
    chargeType: parseChargeType(chargeType),
    chargeName,
    rate,
    quantity,
    target: bodyTarget(req),
    createdBy: actorOf(req)
  });
  res.status(201).json({ message: 'Charge added successfully', charge });
};

/**
 * Bulk entry for one charge type; the whole batch commits or none of it does
 */
const bulk = (chargeType: ChargeType) => async (req: AuthRequest, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const charges = await getServices().billing.addCharges(chargeType, bodyTarget(req), chargeItems(req), actorOf(req));
  res.status(201).json({ message: `${charges.length} charge(s) added`, charges });
};

export const addInvestigationCharges = bulk(ChargeType.INVESTIGATION);
export const addProcedureCharges = bulk(ChargeType.PROCEDURE);
export const addManualCharges = bulk(ChargeType.MANUAL);

export const addServiceCharges = async (req: AuthRequest, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const items: ServiceItem[] = req.body.items.map((item: ServiceItem) => ({
    name: item.name,
    rate: item.rate,
    quantity: item.quantity,
    startTime: item.startTime,
    endTime: item.endTime
  }));
  const charges = await getServices().billing.addServiceCharges(bodyTarget(req), items, actorOf(req));
  res.status(201).json({ message: `${charges.length} charge(s) added`, charges });
};

export const listCharges = async (req: Request, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const target = queryTarget(req);
  const type = queryString(req, 'chargeType');
  const charges = type
    ? await getServices().billing.listChargesByType(target, parseChargeType(type))
    : await getServices().billing.listCharges(target);
  res.json({ charges });
};

export const getChargeTotal = async (req: Request, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const total = await getServices().billing.calculateTotalCharges(queryTarget(req));
  res.json({ total });
};

export const getCharge = async (req: Request, res: Response) => {
  const charge = await getServices().billing.getCharge(req.params.chargeId);
  res.json({ charge });
};

export const updateCharge = async (req: AuthRequest, res: Response) => {
  if (rejectInvalid(req, res)) return;

  const { chargeName, rate, quantity } = req.body;
  const charge = await getServices().billing.updateCharge(
    req.params.chargeId,
    { chargeName, rate, quantity },
    actorOf(req)
  );
  res.json({ message: 'Charge updated successfully', charge });
};

export const deleteCharge = async (req: Request, res: Response) => {
  await getServices().billing.deleteCharge(req.params.chargeId);
  res.json({ message: 'Charge deleted successfully' });
};
