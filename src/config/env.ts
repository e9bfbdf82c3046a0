// src/config/env.ts

import { z } from 'zod';
import dotenv from 'dotenv';
import path from 'path';

// Load environment variables from project root, not process.cwd()
dotenv.config({ path: path.resolve(__dirname, '../../.env') });

/**
 * Environment Variable Schema
 */
const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    // Overrides the NODE_ENV based default verbosity
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),

    // SQLite file holding the (domain, service, version) -> settings records
    CONFIG_DB_PATH: z.string().min(1).optional(),
});

export const ENV = envSchema.parse(process.env);
