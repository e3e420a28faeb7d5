import { Response } from 'express';
import { AuthRequest } from '../../types/request.types';
import { ResponseHandler } from '../../utils/response';
import { idParamSchema } from '../../utils/validation';
import { currentActor } from '../../middlewares/auth.middleware';
import { OrdersService } from '../orders/orders.service';
import { assignmentSchema, discountSchema, paymentStatusSchema } from './admin.validation';

export const createAdminController = (orders: OrdersService) => ({
  setPaymentStatus: async (req: AuthRequest, res: Response) => {
    try {
      const orderId = idParamSchema.parse(req.params.id);
      const { payment_status } = paymentStatusSchema.parse(req.body);
      const order = await orders.setPaymentStatus(currentActor(req), orderId, payment_status);
      return ResponseHandler.success(res, { order }, 'Payment status updated');
    } catch (error) {
      return ResponseHandler.fromError(res, error, 'Failed to update payment status');
    }
  },

  setDiscount: async (req: AuthRequest, res: Response) => {
    try {
      const orderId = idParamSchema.parse(req.params.id);
      const { discount_amount } = discountSchema.parse(req.body);
      const order = await orders.setDiscount(currentActor(req), orderId, discount_amount);
      return ResponseHandler.success(res, { order }, 'Discount updated');
    } catch (error) {
      return ResponseHandler.fromError(res, error, 'Failed to update discount');
    }
  },

  assign: async (req: AuthRequest, res: Response) => {
    try {
      const orderId = idParamSchema.parse(req.params.id);
      const validated = assignmentSchema.parse(req.body);
      const order = await orders.assign(currentActor(req), orderId, validated);
      return ResponseHandler.success(res, { order }, 'Assignment updated');
    } catch (error) {
      return ResponseHandler.fromError(res, error, 'Failed to update assignment');
    }
  },

  reprice: async (req: AuthRequest, res: Response) => {
    try {
      const orderId = idParamSchema.parse(req.params.id);
      const detail = await orders.reprice(currentActor(req), orderId);
      return ResponseHandler.success(res, detail, 'Order repriced');
    } catch (error) {
      return ResponseHandler.fromError(res, error, 'Failed to reprice order');
    }
  },
});
