import express from 'express';
import { authenticate } from '../../middlewares/auth.middleware';
import { rateLimiters } from '../../middlewares/rateLimit.middleware';
import { UsersRepository } from '../users/users.repository';
import { OrdersControllerDeps, createOrdersController } from './orders.controller';

export const createOrdersRouter = (deps: OrdersControllerDeps & { users: UsersRepository }) => {
  const router = express.Router();
  const ordersController = createOrdersController(deps);

  // All order routes require authentication
  router.use(authenticate(deps.users));

  router.post('/', ordersController.createOrder);
  router.get('/', ordersController.listOrders);
  router.get('/:id', ordersController.getOrder);
  router.patch('/:id', ordersController.updateOrder);
  router.delete('/:id', ordersController.deleteOrder);

  router.post('/:id/items', ordersController.addItem);
  router.delete('/:id/items/:itemId', ordersController.removeItem);

  router.post('/:id/transitions', rateLimiters.transitions, ordersController.transition);
  router.get('/:id/status-updates', ordersController.listStatusUpdates);

  return router;
};
