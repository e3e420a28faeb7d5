// Database
export { pool, connectDatabase, migrate, rollback } from './db';

// Config - All configurations in one place
export { appConfig, orderConfig, loggingConfig, dbConfig } from './config';
export type { OrderConfig } from './config';
