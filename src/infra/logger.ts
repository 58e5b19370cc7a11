// src/infra/logger.ts
import fs from 'node:fs'
import path from 'node:path'
import pino from 'pino'
import type { Logger } from 'pino'

export type { Logger }

/** What the monitoring components need from a logger. */
export type ComponentLogger = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const
export type LogLevel = (typeof LOG_LEVELS)[number]

export interface CreateLoggerOptions {
    name?: string
    level?: LogLevel | 'silent'
    /** append JSON lines to this file instead of stderr */
    file?: string
}

export function createLogger(opts: CreateLoggerOptions = {}): Logger {
    const { name = 'health-monitor', level = 'info', file } = opts

    if (file) {
        fs.mkdirSync(path.dirname(file), { recursive: true })
    }

    const destination = file
        ? pino.destination({ dest: file, append: true, sync: true })
        : pino.destination({ dest: 2, sync: true })

    return pino({ name, level }, destination)
}

export function isLogLevel(value: unknown): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value)
}

export const logger = createLogger({
    level: isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info',
})
