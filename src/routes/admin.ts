import express from 'express';
import { createAdminController } from '../controllers/adminController';
import { RouteDeps } from './deps';

export const adminRoutes = ({ services, auth, guards }: RouteDeps) => {
  const router = express.Router();
  const admin = createAdminController(services);

  router.use(auth, guards.requireAdmin);

  router.get('/staff', admin.listStaff);
  router.post('/staff', admin.addStaff);
  router.patch('/staff/:staffId', admin.updateStaff);
  router.delete('/staff/:staffId', admin.removeStaff);
  router.get('/admins', admin.listAdmins);
  router.post('/admins/:chatId', admin.addAdmin);
  router.delete('/admins/:chatId', admin.removeAdmin);
  router.get('/appointments', admin.listAppointments);
  router.put('/settings', admin.updateSettings);
  router.delete('/reviews/:id', admin.deleteReview);

  return router;
};

export default adminRoutes;
