import express from 'express';
import { createStaffController } from '../controllers/staffController';
import { RouteDeps } from './deps';

export const staffRoutes = ({ services, auth, guards }: RouteDeps) => {
  const router = express.Router();
  const staff = createStaffController(services);
  const selfOrAdmin = guards.requireSelfOrAdmin('staffId');

  router.get('/:staffId/appointments', auth, selfOrAdmin, staff.getAppointments);
  router.get('/:staffId/weekdays', auth, selfOrAdmin, staff.getWeekdays);
  router.put('/:staffId/weekdays/:weekday', auth, selfOrAdmin, staff.putWeekday);
  router.get('/:staffId/slots', auth, selfOrAdmin, staff.getSlots);
  router.put('/:staffId/slots', auth, selfOrAdmin, staff.putSlot);

  return router;
};

export default staffRoutes;
