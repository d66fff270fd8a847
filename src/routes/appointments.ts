import express from 'express';
import { createAppointmentController } from '../controllers/appointmentController';
import { RouteDeps } from './deps';

export const appointmentRoutes = ({ services, auth }: RouteDeps) => {
  const router = express.Router();
  const appointments = createAppointmentController(services);

  router.get('/mine', auth, appointments.getMine);
  // Role checks happen in the ledger, against the appointment itself
  router.post('/:id/confirm', auth, appointments.confirm);
  router.post('/:id/cancel', auth, appointments.cancel);

  return router;
};

export default appointmentRoutes;
