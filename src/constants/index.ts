export * from './order.constants';
export * from './user.constants';
