import { Response } from 'express';
import { AuthRequest } from '../../types/request.types';
import { ResponseHandler } from '../../utils/response';
import { idParamSchema } from '../../utils/validation';
import { currentActor } from '../../middlewares/auth.middleware';
import { DashboardService } from '../dashboard/dashboard.service';
import { OrderWorkflowService } from './order-workflow.service';
import { OrdersService } from './orders.service';
import {
  createOrderSchema,
  listOrdersQuerySchema,
  orderItemSchema,
  transitionSchema,
  updateOrderSchema,
} from './orders.validation';

export interface OrdersControllerDeps {
  orders: OrdersService;
  workflow: OrderWorkflowService;
  dashboard: DashboardService;
}

export const createOrdersController = ({ orders, workflow, dashboard }: OrdersControllerDeps) => ({
  createOrder: async (req: AuthRequest, res: Response) => {
    try {
      const validated = createOrderSchema.parse(req.body);
      const detail = await orders.createOrder(currentActor(req), validated);
      return ResponseHandler.created(res, detail, 'Order created');
    } catch (error) {
      return ResponseHandler.fromError(res, error, 'Failed to create order');
    }
  },

  // Customers get their own orders, staff their work queue, admins everything
  listOrders: async (req: AuthRequest, res: Response) => {
    try {
      const query = listOrdersQuerySchema.parse(req.query);
      const page = await dashboard.queueFor(currentActor(req), query);
      return ResponseHandler.paginated(
        res,
        page.rows,
        { page: page.page, limit: page.limit, total: page.total },
        'Orders retrieved'
      );
    } catch (error) {
      return ResponseHandler.fromError(res, error, 'Failed to list orders');
    }
  },

  getOrder: async (req: AuthRequest, res: Response) => {
    try {
      const orderId = idParamSchema.parse(req.params.id);
      const detail = await orders.getOrderDetail(currentActor(req), orderId);
      return ResponseHandler.success(res, detail, 'Order retrieved');
    } catch (error) {
      return ResponseHandler.fromError(res, error, 'Failed to fetch order');
    }
  },

  updateOrder: async (req: AuthRequest, res: Response) => {
    try {
      const orderId = idParamSchema.parse(req.params.id);
      const validated = updateOrderSchema.parse(req.body);
      const order = await orders.updateDeliveryDetails(currentActor(req), orderId, validated);
      return ResponseHandler.success(res, { order }, 'Order updated');
    } catch (error) {
      return ResponseHandler.fromError(res, error, 'Failed to update order');
    }
  },

  deleteOrder: async (req: AuthRequest, res: Response) => {
    try {
      const orderId = idParamSchema.parse(req.params.id);
      await orders.deleteDraft(currentActor(req), orderId);
      return ResponseHandler.success(res, undefined, 'Draft order deleted');
    } catch (error) {
      return ResponseHandler.fromError(res, error, 'Failed to delete order');
    }
  },

  addItem: async (req: AuthRequest, res: Response) => {
    try {
      const orderId = idParamSchema.parse(req.params.id);
      const validated = orderItemSchema.parse(req.body);
      const detail = await orders.addItem(currentActor(req), orderId, validated);
      return ResponseHandler.created(res, detail, 'Item added');
    } catch (error) {
      return ResponseHandler.fromError(res, error, 'Failed to add item');
    }
  },

  removeItem: async (req: AuthRequest, res: Response) => {
    try {
      const orderId = idParamSchema.parse(req.params.id);
      const itemId = idParamSchema.parse(req.params.itemId);
      const detail = await orders.removeItem(currentActor(req), orderId, itemId);
      return ResponseHandler.success(res, detail, 'Item removed');
    } catch (error) {
      return ResponseHandler.fromError(res, error, 'Failed to remove item');
    }
  },

  transition: async (req: AuthRequest, res: Response) => {
    try {
      const orderId = idParamSchema.parse(req.params.id);
      const { status, notes } = transitionSchema.parse(req.body);
      const result = await workflow.transitionWithRetry(orderId, status, currentActor(req), notes ?? '');
      return ResponseHandler.success(
        res,
        { order: result.order, status_update: result.statusUpdate },
        `Order moved to ${status}`
      );
    } catch (error) {
      return ResponseHandler.fromError(res, error, 'Failed to update order status');
    }
  },

  listStatusUpdates: async (req: AuthRequest, res: Response) => {
    try {
      const orderId = idParamSchema.parse(req.params.id);
      const statusUpdates = await orders.listStatusUpdates(currentActor(req), orderId);
      return ResponseHandler.success(res, { status_updates: statusUpdates }, 'Status history retrieved');
    } catch (error) {
      return ResponseHandler.fromError(res, error, 'Failed to fetch status history');
    }
  },
});
