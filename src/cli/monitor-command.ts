// src/cli/monitor-command.ts
import { errorMessage } from '../errors.js'
import { createLogger } from '../infra/logger.js'
import type { ComponentLogger, LogLevel } from '../infra/logger.js'
import {
    createMonitorContext,
    exitCodeFor,
    formatMonitoringSummary,
    monitorApplication,
    monitorServices,
} from '../monitor/run-monitor.js'
import type { MonitorContext, MonitorRun, MonitorSettings } from '../monitor/run-monitor.js'

export interface MonitorCommandOptions {
    /** explicit services; without them the whole application is checked */
    services?: string[]
    outputDir: string
    files: boolean
    logLevel: LogLevel
    logFile?: string
    quiet: boolean
}

export interface MonitorCommandDeps {
    settings: Omit<MonitorSettings, 'outputDir'>
    logger?: ComponentLogger
    context?: MonitorContext
    print?: (text: string) => void
}

/**
 * One monitoring pass. Resolves with the process exit code: 0 only when
 * everything that was checked is UP.
 */
export async function runMonitorCommand(
    opts: MonitorCommandOptions,
    deps: MonitorCommandDeps,
): Promise<number> {
    const print = deps.print ?? console.log
    const logger = deps.logger ?? createLogger({ level: opts.logLevel, file: opts.logFile })

    try {
        const ctx =
            deps.context ?? createMonitorContext({ ...deps.settings, outputDir: opts.outputDir }, logger)
        const runOpts = { outputDir: opts.outputDir, writeFiles: opts.files }

        let run: MonitorRun
        if (opts.services && opts.services.length > 0) {
            run = await monitorServices(ctx, { ...runOpts, services: opts.services })
        } else {
            run = await monitorApplication(ctx, runOpts)
        }

        if (!opts.quiet) print(formatMonitoringSummary(run))

        const code = exitCodeFor(run)
        if (code !== 0) {
            logger.warn({ code }, 'monitoring detected issues')
        }
        return code
    } catch (err) {
        logger.error({ err }, 'monitoring failed')
        if (!opts.quiet) print(`Error: ${errorMessage(err)}`)
        return 1
    }
}
