// Shared test doubles
import { vi } from 'vitest'
import type { StatusProbe } from '../monitor/process-status-probe.js'
import type { HealthStatus, ProbeResult } from '../types/status.js'

export const TEST_TIMESTAMP = '2024-01-15T10:30:00.000Z'

export function createMockLogger() {
    return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
}

/**
 * Probe answering from a table. An Error entry is thrown, a missing entry is
 * DOWN.
 */
export class FakeProbe implements StatusProbe {
    readonly calls: string[] = []
    host = 'test-host'
    timestamp = TEST_TIMESTAMP

    constructor(private readonly answers: Record<string, HealthStatus | Error>) {}

    async probe(name: string): Promise<ProbeResult> {
        this.calls.push(name)
        const answer = this.answers[name]
        if (answer instanceof Error) throw answer
        if (answer === 'UP') return { status: 'UP' }
        return { status: 'DOWN', reason: 'inactive' }
    }

    currentHost() {
        return this.host
    }

    now() {
        return this.timestamp
    }
}
