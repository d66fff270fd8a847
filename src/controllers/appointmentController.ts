import { Request, Response, NextFunction } from 'express';
import { actorOf } from '../middleware/auth';
import { Services } from '../services';
import { TransitionTarget } from '../services/appointmentLedger';
import { failureToHttpError } from '../utils/errors';

export const createAppointmentController = ({ ledger, clock }: Pick<Services, 'ledger' | 'clock'>) => {
  // GET /api/appointments/mine
  const getMine = async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await ledger.listForClient(actorOf(req).chatId, clock()));
    } catch (err) {
      next(err);
    }
  };

  const transitionTo = (status: TransitionTarget) => async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await ledger.transition(req.params.id, status, actorOf(req));
      if (!result.ok) return next(failureToHttpError(result));
      res.json(result.appointment);
    } catch (err) {
      next(err);
    }
  };

  return {
    getMine,
    // POST /api/appointments/:id/confirm
    confirm: transitionTo('confirmed'),
    // POST /api/appointments/:id/cancel
    cancel: transitionTo('cancelled'),
  };
};
