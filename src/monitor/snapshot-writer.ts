// src/monitor/snapshot-writer.ts
import fs from 'node:fs'
import path from 'node:path'
import { InvalidArgumentError, PersistenceError, errorMessage } from '../errors.js'
import { logger as defaultLogger } from '../infra/logger.js'
import type { ComponentLogger } from '../infra/logger.js'
import type { StatusRecord, WriteOutcome } from '../types/status.js'
import { assertServiceName } from './process-status-probe.js'
import { toStatusDocument, tryCreateStatusRecord } from './status-record.js'

export const DEFAULT_SNAPSHOT_DIR = 'data'

export type SnapshotFileSystem = Pick<typeof fs, 'mkdirSync' | 'writeFileSync'>

export interface SnapshotWriterOptions {
    directory?: string
    logger?: ComponentLogger
    fileSystem?: SnapshotFileSystem
}

/**
 * `<name>-status-<timestamp>.json` with `:` and `.` in the timestamp turned
 * into `-`. No other character is touched.
 */
export function snapshotFileName(name: string, timestamp: string): string {
    assertServiceName(name)
    const safeTimestamp = timestamp.replace(/[:.]/g, '-')
    return `${name}-status-${safeTimestamp}.json`
}

export class SnapshotWriter {
    private readonly directory: string
    private readonly logger: ComponentLogger
    private readonly fs: SnapshotFileSystem

    constructor(opts: SnapshotWriterOptions = {}) {
        this.directory = opts.directory ?? DEFAULT_SNAPSHOT_DIR
        this.logger = opts.logger ?? defaultLogger
        this.fs = opts.fileSystem ?? fs
    }

    /**
     * Writes one record as indented JSON and returns the file path.
     * Throws InvalidArgumentError for a bad record, PersistenceError when the
     * file cannot be written.
     */
    write(record: StatusRecord, directory: string = this.directory): string {
        const checked = tryCreateStatusRecord(record)
        if (!checked.ok) {
            throw new InvalidArgumentError(`invalid status record: ${checked.error.message}`, {
                cause: checked.error,
            })
        }
        const { name, timestamp } = checked.record
        const file = path.join(directory, snapshotFileName(name, timestamp))

        try {
            this.fs.mkdirSync(directory, { recursive: true })
            this.fs.writeFileSync(file, JSON.stringify(toStatusDocument(checked.record), null, 2), 'utf8')
        } catch (err) {
            throw new PersistenceError(`Cannot write status file for ${name}: ${errorMessage(err)}`, {
                cause: err,
            })
        }

        this.logger.info({ file }, 'wrote status file')
        return file
    }

    writeAllDetailed(records: readonly StatusRecord[], directory: string = this.directory): WriteOutcome[] {
        const outcomes: WriteOutcome[] = []

        for (const record of records) {
            try {
                outcomes.push({ ok: true, name: record.name, path: this.write(record, directory) })
            } catch (err) {
                const error = err instanceof Error ? err : new Error(String(err))
                this.logger.error({ service: record.name, err: error }, 'failed to write status file')
                outcomes.push({ ok: false, name: record.name, error })
            }
        }

        const failed = outcomes.filter((o) => !o.ok).length
        if (failed > 0) {
            this.logger.warn({ failed, total: records.length }, 'some status files were not written')
        }
        return outcomes
    }

    /** Best effort: paths of the files that made it to disk. */
    writeAll(records: readonly StatusRecord[], directory: string = this.directory): string[] {
        const paths: string[] = []
        for (const outcome of this.writeAllDetailed(records, directory)) {
            if (outcome.ok) paths.push(outcome.path)
        }
        return paths
    }
}
