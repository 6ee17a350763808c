// src/utils/config.ts
import dotenv from 'dotenv';
import type { AppConfig } from '../types/index.js';
import { StartupError } from './errors.js';

dotenv.config();

const toInt = (value: string | undefined, fallback: number): number => {
    const parsed = parseInt(value ?? '', 10);
    return Number.isNaN(parsed) ? fallback : parsed;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => ({
    // Server
    node_env: env.NODE_ENV || 'development',
    port: toInt(env.PORT, 3000),
    host: env.HOST || '0.0.0.0',

    // Database
    database: {
        host: env.DB_HOST || 'localhost',
        port: toInt(env.DB_PORT, 5432),
        user: env.DB_USER || '',
        password: env.DB_PASSWORD || '',
        database: env.DB_NAME || '',
        pool: {
            min: toInt(env.DB_POOL_MIN, 1),
            max: toInt(env.DB_POOL_MAX, 10)
        },
        statementTimeoutMs: toInt(env.DB_STATEMENT_TIMEOUT_MS, 5000),
        connectionTimeoutMs: toInt(env.DB_CONNECTION_TIMEOUT_MS, 5000),
        idleTimeoutMs: toInt(env.DB_IDLE_TIMEOUT_MS, 30000)
    },

    // Logging
    logging: {
        level: env.LOG_LEVEL || 'info'
    },

    // Rate Limiting
    rateLimit: {
        max: toInt(env.RATE_LIMIT_MAX, 100),
        window: toInt(env.RATE_LIMIT_WINDOW, 900000) // 15 minutes
    },

    cors: {
        origins: (env.CORS_ORIGINS || 'http://localhost:3000')
            .split(',')
            .map(origin => origin.trim())
            .filter(origin => origin.length > 0)
    }
});

export const config: AppConfig = loadConfig();

// Validation
const requiredEnvVars = [
    'DB_USER',
    'DB_PASSWORD',
    'DB_NAME',
] as const;

export const validateConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
    const missing = requiredEnvVars.filter(envVar => !env[envVar]);

    if (missing.length > 0) {
        throw new StartupError(`Missing required environment variables: ${missing.join(', ')}`);
    }

    const loaded = loadConfig(env);
    const { min, max } = loaded.database.pool;
    if (min < 0 || max < 1 || min > max) {
        throw new StartupError(`Invalid pool size: min=${min}, max=${max}`);
    }

    return loaded;
};
