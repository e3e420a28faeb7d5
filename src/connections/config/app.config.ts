import dotenv from 'dotenv';

dotenv.config();

/**
 * Parse CORS origins from environment variable
 * Supports comma or space separated values
 */
const parseCorsOrigins = (): string[] => {
  const corsOrigins = process.env.CORS_ORIGINS || '';
  if (!corsOrigins) {
    return [];
  }

  return corsOrigins
    .split(/[,\s]+/)
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0);
};

const parseNumber = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const parseBoolean = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined) {
    return fallback;
  }
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
};

export const appConfig = {
  port: parseNumber(process.env.APP_PORT || process.env.PORT, 3000),
  nodeEnv: process.env.NODE_ENV || 'development',
  jwtSecret: process.env.JWT_SECRET || 'secret',
  frontendUrl: process.env.FRONTEND_URL || 'http://localhost:5173',
  corsOrigins: parseCorsOrigins(),
};

const parseNonNegative = (name: string, value: string | undefined, fallback: number): number => {
  const parsed = parseNumber(value, fallback);
  if (parsed < 0) {
    throw new Error(`${name} must be a non-negative number, got ${value}`);
  }
  return parsed;
};

export interface OrderConfig {
  // Applied to the subtotal, 0.10 = 10%
  taxRate: number;
  // Flat fee charged when delivery_type is 'delivery'
  deliveryFee: number;
  requirePaymentForConfirmation: boolean;
}

/**
 * Pricing and workflow settings; throws on a negative rate or fee
 */
export const parseOrderConfig = (env: NodeJS.ProcessEnv): OrderConfig => ({
  taxRate: parseNonNegative('TAX_RATE', env.TAX_RATE, 0.1),
  deliveryFee: parseNonNegative('DELIVERY_FEE', env.DELIVERY_FEE, 5),
  requirePaymentForConfirmation: parseBoolean(env.REQUIRE_PAYMENT_FOR_CONFIRMATION, false),
});

export const orderConfig = parseOrderConfig(process.env);

export const loggingConfig = {
  level: process.env.LOG_LEVEL,
  dir: process.env.LOG_DIR || 'logs',
  toFile: parseBoolean(process.env.LOG_TO_FILE, appConfig.nodeEnv === 'production'),
  rotation: process.env.LOG_ROTATION || '10MB',
  retention: process.env.LOG_RETENTION || '30d',
};
