// src/store/report-store.ts
import type { StatusDocument, StatusMap } from '../types/status.js'

/**
 * Indexed history of status documents. Implementations raise
 * ReportStoreUnavailableError when the backing store cannot be reached.
 */
export interface ReportStore {
    /** create index / mappings if needed */
    ensureReady(): Promise<void>
    index(document: StatusDocument): Promise<void>
    /** latest status of every known name */
    latestPerName(): Promise<StatusMap>
    /** latest full document for one name, null when none was ever stored */
    latestFor(name: string): Promise<StatusDocument | null>
    ping(): Promise<boolean>
}
