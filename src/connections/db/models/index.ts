export * from './order.model';
export * from './order-item.model';
export * from './order-status-update.model';
export * from './service.model';
export * from './user.model';
