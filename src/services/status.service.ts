// src/services/status.service.ts
import { z } from 'zod'
import { parseStatusDocument, toStatusDocument } from '../monitor/status-record.js'
import type { ReportStore } from '../store/report-store.js'
import { HEALTH_STATUSES } from '../types/status.js'
import type { StatusDocument, StatusMap } from '../types/status.js'

export const REQUIRED_FIELDS = ['service_name', 'service_status', 'host_name'] as const

export type IngestResult = { ok: true; document: StatusDocument } | { ok: false; message: string }

const payloadShape = z.record(z.unknown())

function isBlank(value: unknown) {
    return value === undefined || value === null || value === ''
}

/**
 * Checks an ingest body. `timestamp` is optional and filled from `now` when
 * absent.
 */
export function validateIngestPayload(body: unknown, now: () => string): IngestResult {
    const parsed = payloadShape.safeParse(body)
    if (!parsed.success) {
        return { ok: false, message: 'Request must be a JSON object' }
    }
    const data = parsed.data

    const missing = REQUIRED_FIELDS.filter((field) => isBlank(data[field]))
    if (missing.length > 0) {
        return { ok: false, message: `Missing required fields: ${missing.join(', ')}` }
    }

    const notStrings = REQUIRED_FIELDS.filter((field) => typeof data[field] !== 'string')
    if (notStrings.length > 0) {
        return { ok: false, message: `Fields must be strings: ${notStrings.join(', ')}` }
    }

    if (!HEALTH_STATUSES.some((status) => status === data.service_status)) {
        return { ok: false, message: `service_status must be one of: ${HEALTH_STATUSES.join(', ')}` }
    }

    const result = parseStatusDocument({
        ...data,
        timestamp: isBlank(data.timestamp) ? now() : data.timestamp,
    })
    if (!result.ok) {
        return { ok: false, message: result.error.message }
    }
    return { ok: true, document: toStatusDocument(result.record) }
}

export async function ingestStatus(store: ReportStore, document: StatusDocument) {
    await store.index(document)
}

export async function getAllStatuses(store: ReportStore): Promise<StatusMap> {
    return store.latestPerName()
}

export async function getServiceStatus(store: ReportStore, name: string) {
    return store.latestFor(name.trim())
}
