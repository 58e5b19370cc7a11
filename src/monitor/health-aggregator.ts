// src/monitor/health-aggregator.ts
import { InvalidArgumentError, errorMessage } from '../errors.js'
import { logger as defaultLogger } from '../infra/logger.js'
import type { ComponentLogger } from '../infra/logger.js'
import type {
    DependencyCheck,
    HealthStatus,
    MonitoringReport,
    ProbeResult,
    StatusMap,
    StatusRecord,
} from '../types/status.js'
import { UNKNOWN_HOST } from './process-status-probe.js'
import type { StatusProbe } from './process-status-probe.js'
import { createStatusRecord, tryCreateStatusRecord } from './status-record.js'

export const DEFAULT_DEPENDENCIES = ['httpd', 'rabbitmq', 'postgresql'] as const
export const DEFAULT_APPLICATION_NAME = 'rbcapp1'

export interface HealthAggregatorOptions {
    probe: StatusProbe
    /** every name here must be UP for the application to be UP */
    dependencies?: readonly string[]
    applicationName?: string
    logger?: ComponentLogger
}

export class HealthAggregator {
    private readonly probe: StatusProbe
    private readonly logger: ComponentLogger
    readonly dependencies: readonly string[]
    readonly applicationName: string

    constructor(opts: HealthAggregatorOptions) {
        const dependencies = opts.dependencies ?? DEFAULT_DEPENDENCIES
        if (dependencies.length === 0) {
            throw new InvalidArgumentError('dependency list cannot be empty')
        }
        const applicationName = opts.applicationName ?? DEFAULT_APPLICATION_NAME
        if (applicationName.length === 0) {
            throw new InvalidArgumentError('application name must be a non-empty string')
        }

        this.probe = opts.probe
        this.dependencies = Object.freeze([...dependencies])
        this.applicationName = applicationName
        this.logger = opts.logger ?? defaultLogger
    }

    /**
     * Probes each name in turn. A probe that throws only takes its own name
     * down with it.
     */
    async checkAllDetailed(names: readonly string[] = this.dependencies): Promise<DependencyCheck[]> {
        if (names.length === 0) {
            throw new InvalidArgumentError('services list cannot be empty')
        }

        const checks: DependencyCheck[] = []
        for (const name of names) {
            checks.push({ name, result: await this.probeOne(name) })
        }
        return checks
    }

    async checkAll(names: readonly string[] = this.dependencies): Promise<StatusMap> {
        const checks = await this.checkAllDetailed(names)
        // own keys only, so names like `__proto__` survive
        return Object.fromEntries(
            checks.map(({ name, result }): [string, HealthStatus] => [name, result.status]),
        )
    }

    deriveVerdict(statuses: StatusMap): HealthStatus {
        for (const name of this.dependencies) {
            const status = Object.hasOwn(statuses, name) ? statuses[name] : undefined
            if (status === undefined) {
                this.logger.warn({ service: name }, 'required service missing from results')
                return 'DOWN'
            }
            if (status !== 'UP') {
                this.logger.warn({ service: name, status }, 'required service is not UP')
                return 'DOWN'
            }
        }
        return 'UP'
    }

    async buildReport(): Promise<MonitoringReport> {
        try {
            const statuses = await this.checkAll()
            const verdict = this.deriveVerdict(statuses)
            const host = this.probe.currentHost()
            const timestamp = this.probe.now()

            const dependencyRecords = this.toRecords(statuses, host, timestamp)
            const applicationRecord = createStatusRecord({
                name: this.applicationName,
                status: verdict,
                host,
                timestamp,
            })

            this.logger.info({ application: this.applicationName, verdict }, 'application verdict')
            return { statuses, verdict, dependencyRecords, applicationRecord, timestamp }
        } catch (err) {
            const error = errorMessage(err)
            this.logger.error({ err }, 'failed to build monitoring report')
            return this.degradedReport(error)
        }
    }

    toRecords(statuses: StatusMap, host: string, timestamp: string): StatusRecord[] {
        const records: StatusRecord[] = []
        for (const [name, status] of Object.entries(statuses)) {
            const result = tryCreateStatusRecord({ name, status, host, timestamp })
            if (result.ok) {
                records.push(result.record)
            } else {
                this.logger.error({ service: name, err: result.error }, 'invalid status record')
            }
        }
        return records
    }

    private async probeOne(name: string): Promise<ProbeResult> {
        try {
            const result = await this.probe.probe(name)
            this.logger.info({ service: name, status: result.status }, 'service checked')
            return result
        } catch (err) {
            this.logger.error({ service: name, err }, 'error checking service')
            return { status: 'DOWN', reason: errorMessage(err) }
        }
    }

    private degradedReport(error: string): MonitoringReport {
        let host = UNKNOWN_HOST
        let timestamp = new Date().toISOString()
        try {
            host = this.probe.currentHost()
            timestamp = this.probe.now()
        } catch (err) {
            this.logger.error({ err }, 'probe host/clock unavailable, using fallbacks')
        }

        const result = tryCreateStatusRecord({ name: this.applicationName, status: 'DOWN', host, timestamp })
        const applicationRecord = result.ok
            ? result.record
            : createStatusRecord({
                  name: this.applicationName,
                  status: 'DOWN',
                  host: UNKNOWN_HOST,
                  timestamp: new Date().toISOString(),
              })

        return {
            statuses: {},
            verdict: 'DOWN',
            dependencyRecords: [],
            applicationRecord,
            timestamp: applicationRecord.timestamp,
            error,
        }
    }
}
