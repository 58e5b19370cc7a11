// src/types/status.ts

export const HEALTH_STATUSES = ['UP', 'DOWN'] as const

export type HealthStatus = (typeof HEALTH_STATUSES)[number]

/** name -> status, in the order the names were checked */
export type StatusMap = Record<string, HealthStatus>

export interface StatusRecord {
    readonly name: string
    readonly status: HealthStatus
    readonly host: string
    readonly timestamp: string
}

/**
 * ===== wire format: snapshot files, ingest body, store documents =====
 */
export interface StatusDocument {
    service_name: string
    service_status: HealthStatus
    host_name: string
    timestamp: string
}

export type ProbeResult = { status: 'UP' } | { status: 'DOWN'; reason: string }

export interface DependencyCheck {
    name: string
    result: ProbeResult
}

export interface MonitoringReport {
    statuses: StatusMap
    verdict: HealthStatus
    dependencyRecords: StatusRecord[]
    applicationRecord: StatusRecord
    timestamp: string
    /** set only on a degraded report */
    error?: string
}

export type WriteOutcome =
    | { ok: true; name: string; path: string }
    | { ok: false; name: string; error: Error }
