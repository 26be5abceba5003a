// src/config/env.ts
import { ConfigError } from '../utils/errors';

export type NotifierKind = 'email' | 'console';

export interface DatabaseConfig {
  uri: string;
  dbName: string;
  timeoutMs: number;
}

export interface AuthConfig {
  jwtSecret: string;
  otpTtlSeconds: number;
  tokenTtlSeconds: number;
}

export interface EmailConfig {
  host: string;
  port: number;
  secure: boolean;
  user: string;
  password: string;
  from: string;
}

export interface StripeConfig {
  secretKey: string;
}

export interface AppConfig {
  env: string;
  isProduction: boolean;
  port: number;
  frontendUrl: string;
  allowedOrigins: readonly string[];
  adminEmails: readonly string[];
  notifier: NotifierKind;
  database: DatabaseConfig;
  auth: AuthConfig;
  email: EmailConfig;
  stripe: StripeConfig;
}

type Env = Record<string, string | undefined>;

const DEV_JWT_SECRET = 'dev-only-insecure-secret';

const str = (env: Env, key: string, fallback = ''): string => {
  const value = env[key];
  return value === undefined || value.trim() === '' ? fallback : value.trim();
};

const int = (env: Env, key: string, fallback: number): number => {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${key} must be a positive integer, got "${raw}"`);
  }
  return value;
};

const bool = (env: Env, key: string, fallback: boolean): boolean => {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  return raw.trim().toLowerCase() === 'true' || raw.trim() === '1';
};

const list = (env: Env, key: string, fallback: string[]): string[] => {
  const raw = str(env, key);
  if (!raw) return fallback;
  return raw
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
};

const deepFreeze = <T extends object>(value: T): Readonly<T> => {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (child !== null && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
};

/**
 * Build the process-wide configuration once, at startup. The result is frozen
 * and handed to every component that needs it.
 */
export const loadConfig = (env: Env = process.env): Readonly<AppConfig> => {
  const nodeEnv = str(env, 'NODE_ENV', 'development');
  const isProduction = nodeEnv === 'production';

  let jwtSecret = str(env, 'JWT_SECRET');
  if (!jwtSecret) {
    if (isProduction) {
      throw new ConfigError('JWT_SECRET must be set in production');
    }
    if (nodeEnv !== 'test') {
      console.warn('⚠️  JWT_SECRET is not set, using an insecure development secret');
    }
    jwtSecret = DEV_JWT_SECRET;
  }

  const notifier = str(env, 'NOTIFIER', isProduction ? 'email' : 'console');
  if (notifier !== 'email' && notifier !== 'console') {
    throw new ConfigError(`NOTIFIER must be "email" or "console", got "${notifier}"`);
  }
  if (isProduction && notifier === 'console') {
    throw new ConfigError('NOTIFIER=console would log live passcodes and is not allowed in production');
  }

  const config: AppConfig = {
    env: nodeEnv,
    isProduction,
    port: int(env, 'PORT', 8000),
    frontendUrl: str(env, 'FRONTEND_URL', 'http://localhost:3000'),
    allowedOrigins: list(env, 'ALLOWED_ORIGINS', ['*']),
    adminEmails: list(env, 'ADMIN_EMAILS', []).map((email) => email.toLowerCase()),
    notifier,
    database: {
      uri: str(env, 'MONGODB_URI'),
      dbName: str(env, 'MONGODB_DB_NAME', 'region_swap'),
      timeoutMs: int(env, 'DB_TIMEOUT_MS', 5000),
    },
    auth: {
      jwtSecret,
      otpTtlSeconds: int(env, 'OTP_TTL_SECONDS', 600),
      tokenTtlSeconds: int(env, 'TOKEN_TTL_SECONDS', 604800),
    },
    email: {
      host: str(env, 'EMAIL_HOST'),
      port: int(env, 'EMAIL_PORT', 587),
      secure: bool(env, 'EMAIL_SECURE', false),
      user: str(env, 'EMAIL_USER'),
      password: str(env, 'EMAIL_PASSWORD'),
      from: str(env, 'EMAIL_FROM', 'no-reply@localhost'),
    },
    stripe: {
      secretKey: str(env, 'STRIPE_SECRET_KEY'),
    },
  };

  return deepFreeze(config);
};
