import { Pool } from 'pg';
import { OrderConfig, orderConfig } from './connections/config/app.config';
import { PgCatalogRepository } from './modules/catalog/catalog.repository';
import { CatalogService } from './modules/catalog/catalog.service';
import { DashboardService } from './modules/dashboard/dashboard.service';
import {
  LoggingNotificationDispatcher,
  NotificationDispatcher,
} from './modules/notifications/notification.dispatcher';
import { OrderAuditService } from './modules/orders/order-audit.service';
import { OrderWorkflowService } from './modules/orders/order-workflow.service';
import { OrdersRepository } from './modules/orders/orders.repository';
import { PgOrdersRepository } from './modules/orders/orders.pg-repository';
import { OrdersService } from './modules/orders/orders.service';
import { CatalogRepository } from './modules/catalog/catalog.repository';
import { PgUsersRepository, UsersRepository } from './modules/users/users.repository';

export interface AppServices {
  orders: OrdersService;
  workflow: OrderWorkflowService;
  dashboard: DashboardService;
  users: UsersRepository;
  // Resolves when the backing store answers
  healthCheck: () => Promise<void>;
}

export interface ServiceDependencies {
  ordersRepository: OrdersRepository;
  catalogRepository: CatalogRepository;
  usersRepository: UsersRepository;
  notifications?: NotificationDispatcher;
  config?: OrderConfig;
  clock?: () => Date;
  healthCheck?: () => Promise<void>;
}

/**
 * Wires services over the given repositories
 */
export const createServices = (deps: ServiceDependencies): AppServices => {
  const config = deps.config ?? orderConfig;
  const audit = new OrderAuditService(deps.ordersRepository);
  const workflow = new OrderWorkflowService(
    deps.ordersRepository,
    audit,
    deps.notifications ?? new LoggingNotificationDispatcher(),
    { config, clock: deps.clock }
  );
  const orders = new OrdersService(
    deps.ordersRepository,
    new CatalogService(deps.catalogRepository),
    deps.usersRepository,
    workflow,
    audit,
    { config, clock: deps.clock }
  );

  return {
    orders,
    workflow,
    dashboard: new DashboardService(deps.ordersRepository),
    users: deps.usersRepository,
    healthCheck: deps.healthCheck ?? (async () => undefined),
  };
};

/**
 * PostgreSQL-backed services
 */
export const createPgServices = (pool: Pool): AppServices =>
  createServices({
    ordersRepository: new PgOrdersRepository(pool),
    catalogRepository: new PgCatalogRepository(pool),
    usersRepository: new PgUsersRepository(pool),
    healthCheck: async () => {
      await pool.query('SELECT 1');
    },
  });
