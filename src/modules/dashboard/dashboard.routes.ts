import express from 'express';
import { USER_ROLE } from '../../constants';
import { authenticate, requireRole } from '../../middlewares/auth.middleware';
import { UsersRepository } from '../users/users.repository';
import { DashboardService } from './dashboard.service';
import { createDashboardController } from './dashboard.controller';

export const createDashboardRouter = ({ dashboard, users }: { dashboard: DashboardService; users: UsersRepository }) => {
  const router = express.Router();
  const dashboardController = createDashboardController(dashboard);

  router.use(authenticate(users));

  // Each role opens its own dashboard; admins open all of them
  router.get('/customer', requireRole(USER_ROLE.CUSTOMER, USER_ROLE.ADMIN), dashboardController.customer);
  router.get('/press', requireRole(USER_ROLE.PRESS, USER_ROLE.ADMIN), dashboardController.press);
  router.get('/delivery', requireRole(USER_ROLE.DELIVERY, USER_ROLE.ADMIN), dashboardController.delivery);
  router.get('/admin', requireRole(USER_ROLE.ADMIN), dashboardController.admin);

  return router;
};
