import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

export interface AppConfig {
    supabaseUrl: string;
    supabaseKey: string;
    channel: string;
    port: number;
    corsOrigin: string;
    logLevel: LogLevel;
}

const envSchema = z.object({
    SUPABASE_URL: z.string().url().optional(),
    SUPABASE_KEY: z.string().min(1).optional(),
    SUPABASE_SERVICE_ROLE_KEY: z.string().min(1).optional(),
    WHATSAPP_CHANNEL: z.string().min(1).default('whatsapp'),
    PORT: z.coerce.number().int().positive().default(3000),
    CORS_ORIGIN: z.string().min(1).default('*'),
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info')
});

export function loadDotenv(): void {
    // .env лежит в корне проекта
    const envPath = path.resolve(__dirname, '../../.env');
    dotenv.config({ path: envPath });
}

export function parseLogLevel(value: string | undefined): LogLevel {
    const parsed = z.enum(LOG_LEVELS).safeParse(value);
    return parsed.success ? parsed.data : 'info';
}

// Пустая переменная (скопированный .env.example) равносильна отсутствующей
function withoutBlanks(env: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
    return Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''));
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(withoutBlanks(env));
    if (!parsed.success) {
        const details = parsed.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid environment: ${details}`);
    }

    const values = parsed.data;
    const supabaseKey = values.SUPABASE_KEY ?? values.SUPABASE_SERVICE_ROLE_KEY;

    if (!values.SUPABASE_URL || !supabaseKey) {
        throw new Error('Missing Supabase credentials');
    }

    return {
        supabaseUrl: values.SUPABASE_URL,
        supabaseKey,
        channel: values.WHATSAPP_CHANNEL,
        port: values.PORT,
        corsOrigin: values.CORS_ORIGIN,
        logLevel: values.LOG_LEVEL
    };
}
