// src/config/env.ts
import 'dotenv/config'
import { z } from 'zod'
import { LOG_LEVELS } from '../infra/logger.js'

const serviceList = z
    .string()
    .transform((raw) =>
        raw
            .split(',')
            .map((name) => name.trim())
            .filter((name) => name.length > 0),
    )
    .pipe(z.array(z.string()).min(1, 'must name at least one service'))

const envSchema = z.object({
    NODE_ENV: z.string().default('development'),
    HOST: z.string().min(1).default('0.0.0.0'),
    PORT: z.coerce.number().int().min(0).max(65_535).default(5000),
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),

    // monitoring
    DATA_DIR: z.string().min(1).default('data'),
    APP_NAME: z.string().min(1).default('rbcapp1'),
    MONITORED_SERVICES: serviceList.default('httpd,rabbitmq,postgresql'),
    PROBE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

    // report store
    REPORT_STORE: z.enum(['elasticsearch', 'memory']).default('elasticsearch'),
    ELASTICSEARCH_URL: z.string().url().default('http://localhost:9200'),
    ELASTICSEARCH_INDEX: z.string().min(1).default('service-monitoring'),
    ELASTICSEARCH_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
})

export type Env = z.infer<typeof envSchema>

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
    // blank values fall back to defaults
    const present = Object.fromEntries(
        Object.entries(source).filter(([, value]) => value !== undefined && value.trim() !== ''),
    )

    const parsed = envSchema.safeParse(present)
    if (!parsed.success) {
        const problems = parsed.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ')
        throw new Error(`Invalid environment configuration: ${problems}`)
    }
    return parsed.data
}

export const ENV = loadEnv()
