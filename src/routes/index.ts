import express from 'express';
import { AppServices } from '../container';
import { createOrdersRouter } from '../modules/orders/orders.routes';
import { createDashboardRouter } from '../modules/dashboard/dashboard.routes';
import { createAdminRouter } from '../modules/admin/admin.routes';

export const createApiRouter = (services: AppServices) => {
  const router = express.Router();

  // API Routes
  router.use('/orders', createOrdersRouter(services));
  router.use('/dashboard', createDashboardRouter(services));
  router.use('/admin', createAdminRouter(services));

  return router;
};
