import { Request, Response, NextFunction } from 'express';
import { Services } from '../services';
import { ProfilePatch } from '../services/staffService';
import { BadRequestError, NotFoundError, failureToHttpError } from '../utils/errors';
import { parseChatId } from '../utils/validation';

const chatIdParam = (req: Request, name: string) => {
  const id = parseChatId(req.params[name]);
  if (id === null) throw new BadRequestError(`Invalid ${name}`);
  return id;
};

// string, or null to clear; anything else is rejected
const optionalText = (value: unknown, field: string): string | null | undefined => {
  if (value === undefined || value === null || typeof value === 'string') return value;
  throw new BadRequestError(`${field} must be a string`);
};

export const createAdminController = (services: Pick<Services, 'staff' | 'ledger' | 'settings' | 'reviews' | 'clock'>) => {
  const { staff, ledger, settings, reviews, clock } = services;

  // GET /api/admin/staff
  const listStaff = async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await staff.listStaff());
    } catch (err) {
      next(err);
    }
  };

  // GET /api/admin/admins
  const listAdmins = async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await staff.listAdmins());
    } catch (err) {
      next(err);
    }
  };

  // POST /api/admin/staff  { staffId, name, phone? }
  const addStaff = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const staffId = parseChatId(req.body?.staffId);
      if (staffId === null) throw new BadRequestError('staffId must be a positive integer chat id');
      const name = optionalText(req.body?.name, 'name');
      const phone = optionalText(req.body?.phone, 'phone');
      const result = await staff.grantStaff(staffId, name || '', phone || undefined);
      if (!result.ok) return next(failureToHttpError(result));
      res.status(201).json(result.staff);
    } catch (err) {
      next(err);
    }
  };

  // DELETE /api/admin/staff/:staffId
  const removeStaff = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await staff.revokeStaff(chatIdParam(req, 'staffId'));
      if (!result.ok) return next(failureToHttpError(result));
      res.json(result.staff);
    } catch (err) {
      next(err);
    }
  };

  // PATCH /api/admin/staff/:staffId  { name?, phone?, timeZone? }
  const updateStaff = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const patch: ProfilePatch = {};
      const name = optionalText(req.body?.name, 'name');
      if (name === null) throw new BadRequestError('name must not be empty');
      if (name !== undefined) patch.name = name;
      const phone = optionalText(req.body?.phone, 'phone');
      if (phone !== undefined) patch.phone = phone;
      const timeZone = optionalText(req.body?.timeZone, 'timeZone');
      if (timeZone !== undefined) patch.timeZone = timeZone;

      const result = await staff.updateProfile(chatIdParam(req, 'staffId'), patch);
      if (!result.ok) return next(failureToHttpError(result));
      res.json(result.staff);
    } catch (err) {
      next(err);
    }
  };

  // POST /api/admin/admins/:chatId  { name? }
  const addAdmin = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const name = optionalText(req.body?.name, 'name');
      const result = await staff.grantAdmin(chatIdParam(req, 'chatId'), name || undefined);
      if (!result.ok) return next(failureToHttpError(result));
      res.json(result.staff);
    } catch (err) {
      next(err);
    }
  };

  // DELETE /api/admin/admins/:chatId
  const removeAdmin = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await staff.revokeAdmin(chatIdParam(req, 'chatId'));
      if (!result.ok) return next(failureToHttpError(result));
      res.json(result.staff);
    } catch (err) {
      next(err);
    }
  };

  // GET /api/admin/appointments
  const listAppointments = async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await ledger.listActive(clock()));
    } catch (err) {
      next(err);
    }
  };

  // PUT /api/admin/settings  { welcomeText?, aboutText?, groupUrl? }
  const updateSettings = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await settings.update(req.body || {});
      if (!result.ok) return next(failureToHttpError(result));
      res.json(result.settings);
    } catch (err) {
      next(err);
    }
  };

  // DELETE /api/admin/reviews/:id
  const deleteReview = async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (!(await reviews.remove(req.params.id))) throw new NotFoundError('Review not found');
      res.json({ message: 'Review deleted' });
    } catch (err) {
      next(err);
    }
  };

  return { listStaff, addStaff, removeStaff, updateStaff, listAdmins, addAdmin, removeAdmin, listAppointments, updateSettings, deleteReview };
};
