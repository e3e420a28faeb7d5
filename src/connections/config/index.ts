export { appConfig, orderConfig, loggingConfig } from './app.config';
export type { OrderConfig } from './app.config';
export { dbConfig } from './database.config';
