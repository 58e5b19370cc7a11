// src/monitor/process-status-probe.ts
import os from 'node:os'
import { InvalidArgumentError } from '../errors.js'
import { runCommand } from '../infra/command.js'
import type { CommandOutcome, CommandRunner } from '../infra/command.js'
import { logger as defaultLogger } from '../infra/logger.js'
import type { ComponentLogger } from '../infra/logger.js'
import type { HealthStatus, ProbeResult } from '../types/status.js'

export const UNKNOWN_HOST = 'unknown-host'
export const DEFAULT_PROBE_TIMEOUT_MS = 10_000

/** What the aggregator needs from a probe. */
export interface StatusProbe {
    probe(name: string): Promise<ProbeResult>
    currentHost(): string
    now(): string
}

export interface ProcessStatusProbeOptions {
    runner?: CommandRunner
    /** supervisor binary, `systemctl is-active <name>` */
    command?: string
    timeoutMs?: number
    resolveHostname?: () => string
    clock?: () => Date
    logger?: ComponentLogger
}

function lookupHostname(resolve: () => string): string {
    try {
        const host = resolve()
        return host.length > 0 ? host : UNKNOWN_HOST
    } catch {
        return UNKNOWN_HOST
    }
}

export function assertServiceName(name: unknown): asserts name is string {
    if (typeof name !== 'string' || name.length === 0) {
        throw new InvalidArgumentError('service name must be a non-empty string')
    }
}

/**
 * Liveness of one systemd unit.
 *
 * UP only when the supervisor exits 0 and prints `active`. Anything else,
 * including a timeout or a missing binary, is DOWN with a reason attached.
 */
export class ProcessStatusProbe implements StatusProbe {
    private readonly runner: CommandRunner
    private readonly command: string
    private readonly timeoutMs: number
    private readonly clock: () => Date
    private readonly logger: ComponentLogger
    private readonly hostname: string

    constructor(opts: ProcessStatusProbeOptions = {}) {
        this.runner = opts.runner ?? runCommand
        this.command = opts.command ?? 'systemctl'
        this.timeoutMs = opts.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS
        this.clock = opts.clock ?? (() => new Date())
        this.logger = opts.logger ?? defaultLogger
        this.hostname = lookupHostname(opts.resolveHostname ?? os.hostname)
    }

    async probe(name: string): Promise<ProbeResult> {
        assertServiceName(name)

        const outcome = await this.runner(this.command, ['is-active', name], {
            timeoutMs: this.timeoutMs,
        })
        const result = interpretOutcome(outcome)

        if (result.status === 'UP') {
            this.logger.debug({ service: name }, 'service is UP')
        } else {
            this.logger.warn({ service: name, reason: result.reason }, 'service is DOWN')
        }
        return result
    }

    async checkStatus(name: string): Promise<HealthStatus> {
        const result = await this.probe(name)
        return result.status
    }

    currentHost(): string {
        return this.hostname
    }

    now(): string {
        return this.clock().toISOString()
    }
}

export function interpretOutcome(outcome: CommandOutcome): ProbeResult {
    switch (outcome.kind) {
        case 'exited': {
            const output = outcome.stdout.trim()
            if (outcome.exitCode === 0 && output === 'active') {
                return { status: 'UP' }
            }
            if (output.length > 0) {
                return { status: 'DOWN', reason: `${output} (exit code ${outcome.exitCode})` }
            }
            return { status: 'DOWN', reason: `exit code ${outcome.exitCode}` }
        }
        case 'timeout':
            return { status: 'DOWN', reason: `timed out after ${outcome.timeoutMs}ms` }
        case 'spawn-error':
            return { status: 'DOWN', reason: outcome.message }
    }
}
