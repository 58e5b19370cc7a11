// src/monitor/run-monitor.ts
import type { ComponentLogger } from '../infra/logger.js'
import type { MonitoringReport, StatusMap, StatusRecord } from '../types/status.js'
import { HealthAggregator } from './health-aggregator.js'
import { ProcessStatusProbe } from './process-status-probe.js'
import type { StatusProbe } from './process-status-probe.js'
import { SnapshotWriter } from './snapshot-writer.js'

export interface MonitorContext {
    probe: StatusProbe
    aggregator: HealthAggregator
    writer: SnapshotWriter
    logger: ComponentLogger
}

export interface MonitorRunOptions {
    outputDir: string
    writeFiles: boolean
}

export interface ServicesRun {
    kind: 'services'
    services: string[]
    statuses: StatusMap
    records: StatusRecord[]
    writtenFiles: string[]
    timestamp: string
    hostname: string
}

export interface ApplicationRun {
    kind: 'application'
    report: MonitoringReport
    writtenFiles: string[]
    timestamp: string
    hostname: string
}

export type MonitorRun = ServicesRun | ApplicationRun

/**
 * Checks exactly the given services; the application verdict is not
 * computed.
 */
export async function monitorServices(
    ctx: MonitorContext,
    opts: MonitorRunOptions & { services: string[] },
): Promise<ServicesRun> {
    const { aggregator, probe, writer, logger } = ctx
    logger.info({ services: opts.services }, 'starting service monitoring')

    const statuses = await aggregator.checkAll(opts.services)
    const hostname = probe.currentHost()
    const timestamp = probe.now()
    const records = aggregator.toRecords(statuses, hostname, timestamp)

    let writtenFiles: string[] = []
    if (opts.writeFiles && records.length > 0) {
        writtenFiles = writer.writeAll(records, opts.outputDir)
        logger.info({ count: writtenFiles.length, dir: opts.outputDir }, 'status files written')
    }

    return {
        kind: 'services',
        services: opts.services,
        statuses,
        records,
        writtenFiles,
        timestamp,
        hostname,
    }
}

export async function monitorApplication(
    ctx: MonitorContext,
    opts: MonitorRunOptions,
): Promise<ApplicationRun> {
    const { aggregator, probe, writer, logger } = ctx
    logger.info({ application: aggregator.applicationName }, 'starting application monitoring')

    const report = await aggregator.buildReport()

    const writtenFiles: string[] = []
    if (opts.writeFiles) {
        writtenFiles.push(...writer.writeAll(report.dependencyRecords, opts.outputDir))
        // the application snapshot is not best-effort: a failure here fails the run
        writtenFiles.push(writer.write(report.applicationRecord, opts.outputDir))
        logger.info({ count: writtenFiles.length, dir: opts.outputDir }, 'status files written')
    }

    return {
        kind: 'application',
        report,
        writtenFiles,
        timestamp: report.timestamp,
        hostname: probe.currentHost(),
    }
}

export function exitCodeFor(run: MonitorRun): number {
    if (run.kind === 'application') {
        return run.report.verdict === 'UP' ? 0 : 1
    }
    return Object.values(run.statuses).every((status) => status === 'UP') ? 0 : 1
}

const mark = (status: string) => (status === 'UP' ? '✓' : '✗')

export function formatMonitoringSummary(run: MonitorRun): string {
    const rule = '='.repeat(50)
    const lines = ['', rule, 'MONITORING SUMMARY', rule]

    lines.push(`Timestamp: ${run.timestamp}`)
    lines.push(`Hostname: ${run.hostname}`)
    lines.push('')

    const statuses = run.kind === 'application' ? run.report.statuses : run.statuses
    lines.push('Service Statuses:')
    for (const [name, status] of Object.entries(statuses)) {
        lines.push(`  ${mark(status)} ${name}: ${status}`)
    }
    lines.push('')

    if (run.kind === 'application') {
        const name = run.report.applicationRecord.name
        lines.push('Application Status:')
        lines.push(`  ${mark(run.report.verdict)} ${name}: ${run.report.verdict}`)
        lines.push('')
    }

    if (run.writtenFiles.length > 0) {
        lines.push('Status Files Written:')
        for (const file of run.writtenFiles) lines.push(`  - ${file}`)
        lines.push('')
    }

    if (run.kind === 'application' && run.report.error) {
        lines.push(`Error: ${run.report.error}`)
        lines.push('')
    }

    lines.push(rule)
    return lines.join('\n')
}

export interface MonitorSettings {
    dependencies: readonly string[]
    applicationName: string
    probeTimeoutMs: number
    outputDir: string
}

export function createMonitorContext(settings: MonitorSettings, logger: ComponentLogger): MonitorContext {
    const probe = new ProcessStatusProbe({ timeoutMs: settings.probeTimeoutMs, logger })
    const aggregator = new HealthAggregator({
        probe,
        dependencies: settings.dependencies,
        applicationName: settings.applicationName,
        logger,
    })
    const writer = new SnapshotWriter({ directory: settings.outputDir, logger })

    return { probe, aggregator, writer, logger }
}
