import express from 'express';
import { USER_ROLE } from '../../constants';
import { authenticate, requireRole } from '../../middlewares/auth.middleware';
import { OrdersService } from '../orders/orders.service';
import { UsersRepository } from '../users/users.repository';
import { createAdminController } from './admin.controller';

export const createAdminRouter = ({ orders, users }: { orders: OrdersService; users: UsersRepository }) => {
  const router = express.Router();
  const adminController = createAdminController(orders);

  // All admin routes require admin role
  router.use(authenticate(users));
  router.use(requireRole(USER_ROLE.ADMIN));

  router.put('/orders/:id/payment-status', adminController.setPaymentStatus);
  router.put('/orders/:id/discount', adminController.setDiscount);
  router.put('/orders/:id/assignment', adminController.assign);
  router.post('/orders/:id/reprice', adminController.reprice);

  return router;
};
