import { Response } from 'express';
import { AuthRequest } from '../../types/request.types';
import { ResponseHandler } from '../../utils/response';
import { currentActor } from '../../middlewares/auth.middleware';
import { DashboardService } from './dashboard.service';
import { customerDashboardQuerySchema, queueQuerySchema } from './dashboard.validation';

export const createDashboardController = (dashboard: DashboardService) => ({
  customer: async (req: AuthRequest, res: Response) => {
    try {
      const { bucket, customer_id, page, limit } = customerDashboardQuerySchema.parse(req.query);
      const result = await dashboard.customerQueue(currentActor(req), { bucket, customerId: customer_id, page, limit });
      return ResponseHandler.paginated(res, result.rows, { page, limit, total: result.total }, 'Customer dashboard', {
        bucket: bucket ?? null,
      });
    } catch (error) {
      return ResponseHandler.fromError(res, error, 'Failed to load customer dashboard');
    }
  },

  press: async (req: AuthRequest, res: Response) => {
    try {
      const { page, limit } = queueQuerySchema.parse(req.query);
      const result = await dashboard.pressQueue(currentActor(req), { page, limit });
      return ResponseHandler.paginated(res, result.rows, { page, limit, total: result.total }, 'Press dashboard');
    } catch (error) {
      return ResponseHandler.fromError(res, error, 'Failed to load press dashboard');
    }
  },

  delivery: async (req: AuthRequest, res: Response) => {
    try {
      const { page, limit } = queueQuerySchema.parse(req.query);
      const result = await dashboard.deliveryQueue(currentActor(req), { page, limit });
      return ResponseHandler.paginated(res, result.rows, { page, limit, total: result.total }, 'Delivery dashboard');
    } catch (error) {
      return ResponseHandler.fromError(res, error, 'Failed to load delivery dashboard');
    }
  },

  admin: async (req: AuthRequest, res: Response) => {
    try {
      const { page, limit } = queueQuerySchema.parse(req.query);
      const overview = await dashboard.adminOverview(currentActor(req), { page, limit });
      return ResponseHandler.paginated(
        res,
        overview.orders.rows,
        { page, limit, total: overview.orders.total },
        'Admin dashboard',
        { counts: overview.counts, staff_performance: overview.staff_performance }
      );
    } catch (error) {
      return ResponseHandler.fromError(res, error, 'Failed to load admin dashboard');
    }
  },
});
