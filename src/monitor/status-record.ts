// src/monitor/status-record.ts
import { z } from 'zod'
import { InvalidArgumentError } from '../errors.js'
import { HEALTH_STATUSES } from '../types/status.js'
import type { StatusDocument, StatusRecord } from '../types/status.js'

export type RecordResult =
    | { ok: true; record: StatusRecord }
    | { ok: false; error: InvalidArgumentError }

const DATE_TIME_RE =
    /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d{1,9})?)?(?:Z|[+-](\d{2}):?(\d{2}))?$/

function daysInMonth(year: number, month: number) {
    return new Date(Date.UTC(year, month, 0)).getUTCDate()
}

/**
 * Full date-time check: date, time-of-day, optional seconds/fraction and an
 * optional `Z` / `±HH:MM` suffix. A bare date does not count.
 */
export function isDateTime(value: string): boolean {
    const m = DATE_TIME_RE.exec(value)
    if (!m) return false

    const [, y, mo, d, h, mi, s, offH, offM] = m
    const year = Number(y)
    const month = Number(mo)
    const day = Number(d)

    if (month < 1 || month > 12) return false
    if (day < 1 || day > daysInMonth(year, month)) return false
    if (Number(h) > 23 || Number(mi) > 59) return false
    if (s !== undefined && Number(s) > 59) return false
    if (offH !== undefined && (Number(offH) > 23 || Number(offM) > 59)) return false

    return true
}

const nonEmpty = (field: string) =>
    z
        .string({
            required_error: `${field} must be a non-empty string`,
            invalid_type_error: `${field} must be a non-empty string`,
        })
        .min(1, `${field} must be a non-empty string`)

const statusRecordSchema = z.object({
    name: nonEmpty('name'),
    status: z.enum(HEALTH_STATUSES, {
        errorMap: () => ({ message: `status must be one of: ${HEALTH_STATUSES.join(', ')}` }),
    }),
    host: nonEmpty('host'),
    timestamp: nonEmpty('timestamp').refine(isDateTime, {
        message: 'timestamp must be an ISO 8601 date-time',
    }),
})

export type StatusRecordInput = z.input<typeof statusRecordSchema>

export function tryCreateStatusRecord(input: unknown): RecordResult {
    const parsed = statusRecordSchema.safeParse(input)
    if (!parsed.success) {
        const message = parsed.error.issues.map((issue) => issue.message).join('; ')
        return { ok: false, error: new InvalidArgumentError(message, { cause: parsed.error }) }
    }

    const { name, status, host, timestamp } = parsed.data
    return { ok: true, record: Object.freeze({ name, status, host, timestamp }) }
}

/**
 * Throwing form of {@link tryCreateStatusRecord}. Validation runs over every
 * field before anything is built.
 */
export function createStatusRecord(input: StatusRecordInput): StatusRecord {
    const result = tryCreateStatusRecord(input)
    if (!result.ok) throw result.error
    return result.record
}

/**
 * Rewrites an accepted date-time into the `strict_date_optional_time` form:
 * `T` between date and time, `±HH:MM` offsets. Other parts pass unchanged.
 */
export function toStrictDateTime(value: string): string {
    return value.replace(/^(\d{4}-\d{2}-\d{2}) /, '$1T').replace(/([+-]\d{2})(\d{2})$/, '$1:$2')
}

export function toStatusDocument(record: StatusRecord): StatusDocument {
    return {
        service_name: record.name,
        service_status: record.status,
        host_name: record.host,
        timestamp: record.timestamp,
    }
}

const statusDocumentShape = z.object(
    {
        service_name: z.unknown(),
        service_status: z.unknown(),
        host_name: z.unknown(),
        timestamp: z.unknown(),
    },
    { invalid_type_error: 'status document must be an object' },
)

export function parseStatusDocument(value: unknown): RecordResult {
    const shape = statusDocumentShape.safeParse(value)
    if (!shape.success) {
        return { ok: false, error: new InvalidArgumentError('status document must be an object') }
    }
    const doc = shape.data

    return tryCreateStatusRecord({
        name: doc.service_name,
        status: doc.service_status,
        host: doc.host_name,
        timestamp: doc.timestamp,
    })
}
