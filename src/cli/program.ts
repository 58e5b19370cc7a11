// src/cli/program.ts
import { Command, Option } from 'commander'
import { ENV } from '../config/env.js'
import { LOG_LEVELS } from '../infra/logger.js'
import { runMonitorCommand } from './monitor-command.js'
import type { MonitorCommandOptions } from './monitor-command.js'

export type MonitorAction = (opts: MonitorCommandOptions) => Promise<number>

const defaultAction: MonitorAction = (opts) =>
    runMonitorCommand(opts, {
        settings: {
            dependencies: ENV.MONITORED_SERVICES,
            applicationName: ENV.APP_NAME,
            probeTimeoutMs: ENV.PROBE_TIMEOUT_MS,
        },
    })

export function buildProgram(action: MonitorAction = defaultAction): Command {
    const program = new Command('health-monitor')

    program
        .description(`Check ${ENV.APP_NAME} and the services it depends on`)
        .option('--services <names...>', 'check only these services (default: all dependencies)')
        .option('--output-dir <dir>', 'directory for JSON status files', ENV.DATA_DIR)
        .option('--no-files', 'do not write JSON status files')
        .addOption(
            new Option('--log-level <level>', 'log level').choices(LOG_LEVELS).default(ENV.LOG_LEVEL),
        )
        .option('--log-file <path>', 'append logs to this file instead of stderr')
        .option('--quiet', 'do not print the summary', false)
        .action(async () => {
            process.exitCode = await action(program.opts<MonitorCommandOptions>())
        })

    return program
}
