import { Request, Response, NextFunction } from 'express';
import { Services } from '../services';
import { BadRequestError, NotFoundError, failureToHttpError } from '../utils/errors';
import { parseChatId } from '../utils/validation';

// Self-service schedule management for a staff member; admins may act on anyone's schedule
export const createStaffController = ({ store, calendar, ledger, clock }: Pick<Services, 'store' | 'calendar' | 'ledger' | 'clock'>) => {
  const staffIdOf = async (req: Request) => {
    const staffId = parseChatId(req.params.staffId);
    if (staffId === null) throw new BadRequestError('Invalid staff id');
    const staff = await store.findStaff(staffId);
    if (!staff || !staff.isStaff) throw new NotFoundError('Staff member not found');
    return staffId;
  };

  // GET /api/staff/:staffId/appointments
  const getAppointments = async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await ledger.listForStaff(await staffIdOf(req), clock()));
    } catch (err) {
      next(err);
    }
  };

  // GET /api/staff/:staffId/weekdays
  const getWeekdays = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const staffId = await staffIdOf(req);
      res.json({ staffId, weekdays: await calendar.getWeekdays(staffId) });
    } catch (err) {
      next(err);
    }
  };

  // PUT /api/staff/:staffId/weekdays/:weekday  { enabled }
  const putWeekday = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const staffId = await staffIdOf(req);
      const enabled: unknown = req.body?.enabled;
      if (typeof enabled !== 'boolean') throw new BadRequestError('enabled must be a boolean');
      const weekday = /^\d+$/.test(req.params.weekday) ? Number(req.params.weekday) : NaN;
      const result = await calendar.setWeekdayEnabled(staffId, weekday, enabled);
      if (!result.ok) return next(failureToHttpError(result));
      res.json(result.value);
    } catch (err) {
      next(err);
    }
  };

  // PUT /api/staff/:staffId/slots  { date, time, available }
  const putSlot = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const staffId = await staffIdOf(req);
      const { date, time, available }: { date?: unknown; time?: unknown; available?: unknown } = req.body || {};
      if (typeof date !== 'string' || typeof time !== 'string') throw new BadRequestError('date and time are required');
      if (typeof available !== 'boolean') throw new BadRequestError('available must be a boolean');
      const result = await calendar.setSlotAvailability(staffId, date, time, available);
      if (!result.ok) return next(failureToHttpError(result));
      res.json(result.value);
    } catch (err) {
      next(err);
    }
  };

  // GET /api/staff/:staffId/slots?date=YYYY-MM-DD
  const getSlots = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const staffId = await staffIdOf(req);
      const date = req.query.date;
      if (typeof date !== 'string' || !date) throw new BadRequestError('date query param required (YYYY-MM-DD)');
      res.json({ staffId, date, times: await calendar.listOfferableTimes(staffId, date, clock()) });
    } catch (err) {
      next(err);
    }
  };

  return { getAppointments, getWeekdays, putWeekday, putSlot, getSlots };
};
