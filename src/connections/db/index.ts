export { pool, connectDatabase } from './connection';
export { migrate, rollback } from './migrate';
