// src/infra/command.ts
import { execFile } from 'node:child_process'

export type CommandOutcome =
    | { kind: 'exited'; exitCode: number; stdout: string; stderr: string }
    | { kind: 'timeout'; timeoutMs: number }
    | { kind: 'spawn-error'; message: string }

export interface RunCommandOptions {
    timeoutMs: number
}

/**
 * Runs `command args...` and settles with what happened to it. Spawn failures
 * and timeouts are outcomes too, so the returned promise never rejects.
 */
export type CommandRunner = (
    command: string,
    args: readonly string[],
    opts: RunCommandOptions,
) => Promise<CommandOutcome>

export const runCommand: CommandRunner = (command, args, opts) =>
    new Promise((resolve) => {
        execFile(
            command,
            [...args],
            { timeout: opts.timeoutMs, encoding: 'utf8', windowsHide: true },
            (err, stdout, stderr) => {
                if (!err) {
                    resolve({ kind: 'exited', exitCode: 0, stdout, stderr })
                    return
                }

                // killed by our own timeout
                if (err.killed && err.signal) {
                    resolve({ kind: 'timeout', timeoutMs: opts.timeoutMs })
                    return
                }

                if (typeof err.code === 'number') {
                    resolve({ kind: 'exited', exitCode: err.code, stdout, stderr })
                    return
                }

                // ENOENT / EACCES etc: the binary never ran
                resolve({ kind: 'spawn-error', message: err.message })
            },
        )
    })
