// src/store/in-memory-report-store.ts
import type { HealthStatus, StatusDocument, StatusMap } from '../types/status.js'
import type { ReportStore } from './report-store.js'

function timeOf(doc: StatusDocument) {
    const t = Date.parse(doc.timestamp)
    return Number.isNaN(t) ? 0 : t
}

/**
 * Process-local store, for `REPORT_STORE=memory` and tests.
 * Latest = greatest timestamp, ties go to the later insert.
 */
export class InMemoryReportStore implements ReportStore {
    private readonly documents: StatusDocument[] = []

    async ensureReady() {}

    async index(document: StatusDocument) {
        this.documents.push({ ...document })
    }

    async latestPerName(): Promise<StatusMap> {
        const latest = new Map<string, StatusDocument>()
        for (const doc of this.documents) {
            const current = latest.get(doc.service_name)
            if (!current || timeOf(doc) >= timeOf(current)) {
                latest.set(doc.service_name, doc)
            }
        }

        return Object.fromEntries(
            Array.from(latest, ([name, doc]): [string, HealthStatus] => [name, doc.service_status]),
        )
    }

    async latestFor(name: string): Promise<StatusDocument | null> {
        let found: StatusDocument | null = null
        for (const doc of this.documents) {
            if (doc.service_name !== name) continue
            if (!found || timeOf(doc) >= timeOf(found)) found = doc
        }
        return found ? { ...found } : null
    }

    async ping() {
        return true
    }

    get size() {
        return this.documents.length
    }
}
