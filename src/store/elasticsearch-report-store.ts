// src/store/elasticsearch-report-store.ts
import { request } from 'undici'
import type { Dispatcher } from 'undici'
import { z } from 'zod'
import { DocumentRejectedError, ReportStoreUnavailableError, errorMessage } from '../errors.js'
import { logger as defaultLogger } from '../infra/logger.js'
import type { ComponentLogger } from '../infra/logger.js'
import { parseStatusDocument, toStatusDocument, toStrictDateTime } from '../monitor/status-record.js'
import type { HealthStatus, StatusDocument, StatusMap } from '../types/status.js'
import type { ReportStore } from './report-store.js'

type Method = 'GET' | 'HEAD' | 'POST' | 'PUT'

export interface ElasticsearchReportStoreOptions {
    url: string
    index: string
    timeoutMs?: number
    /** undici dispatcher, e.g. a MockAgent or ProxyAgent */
    dispatcher?: Dispatcher
    logger?: ComponentLogger
}

export const INDEX_MAPPING = {
    mappings: {
        properties: {
            service_name: { type: 'keyword' },
            service_status: { type: 'keyword' },
            host_name: { type: 'keyword' },
            timestamp: { type: 'date', format: 'strict_date_optional_time||epoch_millis' },
        },
    },
} as const

/** terms agg size: upper bound on distinct service names returned */
const MAX_SERVICES = 1000

const hitsSchema = z.object({
    hits: z.object({
        hits: z.array(z.object({ _source: z.unknown() })),
    }),
})

const aggregationSchema = z.object({
    aggregations: z
        .object({
            services: z.object({
                buckets: z.array(z.object({ latest: hitsSchema })),
            }),
        })
        .optional(),
})

const errorBodySchema = z.object({
    error: z.object({ type: z.string() }),
})

interface EsResponse {
    statusCode: number
    payload: unknown
}

/**
 * ReportStore over the Elasticsearch REST API.
 */
export class ElasticsearchReportStore implements ReportStore {
    private readonly baseUrl: string
    private readonly indexPath: string
    private readonly timeoutMs: number
    private readonly dispatcher: Dispatcher | undefined
    private readonly logger: ComponentLogger

    constructor(opts: ElasticsearchReportStoreOptions) {
        this.baseUrl = opts.url.replace(/\/+$/, '')
        this.indexPath = `/${encodeURIComponent(opts.index)}`
        this.timeoutMs = opts.timeoutMs ?? 5_000
        this.dispatcher = opts.dispatcher
        this.logger = opts.logger ?? defaultLogger
    }

    async ensureReady(): Promise<void> {
        const head = await this.call('HEAD', this.indexPath)
        if (head.statusCode === 200) return
        if (head.statusCode !== 404) throw this.unexpected('HEAD index', head)

        const created = await this.call('PUT', this.indexPath, INDEX_MAPPING)
        if (isSuccess(created.statusCode)) {
            this.logger.info({ index: this.indexPath.slice(1) }, 'created index')
            return
        }

        const body = errorBodySchema.safeParse(created.payload)
        if (body.success && body.data.error.type === 'resource_already_exists_exception') return

        throw this.unexpected('create index', created)
    }

    async index(document: StatusDocument): Promise<void> {
        const res = await this.call('POST', `${this.indexPath}/_doc?refresh=wait_for`, {
            ...document,
            timestamp: toStrictDateTime(document.timestamp),
        })
        if (isRejection(res.statusCode)) {
            this.logger.error(
                { statusCode: res.statusCode, payload: res.payload, service: document.service_name },
                'elasticsearch rejected status document',
            )
            throw new DocumentRejectedError(
                `Elasticsearch rejected the document with status ${res.statusCode}`,
            )
        }
        if (!isSuccess(res.statusCode)) throw this.unexpected('index document', res)
        this.logger.debug({ service: document.service_name }, 'indexed status document')
    }

    async latestPerName(): Promise<StatusMap> {
        const res = await this.call('POST', `${this.indexPath}/_search`, {
            size: 0,
            query: { match_all: {} },
            aggs: {
                services: {
                    terms: { field: 'service_name', size: MAX_SERVICES },
                    aggs: {
                        latest: {
                            top_hits: { sort: [{ timestamp: { order: 'desc' } }], size: 1 },
                        },
                    },
                },
            },
        })
        if (res.statusCode === 404) return {}
        if (!isSuccess(res.statusCode)) throw this.unexpected('search latest per service', res)

        const parsed = aggregationSchema.safeParse(res.payload)
        if (!parsed.success) throw this.malformed('aggregation', parsed.error)

        const entries: [string, HealthStatus][] = []
        for (const bucket of parsed.data.aggregations?.services.buckets ?? []) {
            const doc = this.documentOf(bucket.latest.hits.hits[0]?._source)
            if (doc) entries.push([doc.service_name, doc.service_status])
        }
        return Object.fromEntries(entries)
    }

    async latestFor(name: string): Promise<StatusDocument | null> {
        const res = await this.call('POST', `${this.indexPath}/_search`, {
            size: 1,
            query: { term: { service_name: name } },
            sort: [{ timestamp: { order: 'desc' } }],
        })
        if (res.statusCode === 404) return null
        if (!isSuccess(res.statusCode)) throw this.unexpected('search service', res)

        const parsed = hitsSchema.safeParse(res.payload)
        if (!parsed.success) throw this.malformed('search', parsed.error)

        return this.documentOf(parsed.data.hits.hits[0]?._source)
    }

    async ping(): Promise<boolean> {
        try {
            const res = await this.call('HEAD', '/')
            return isSuccess(res.statusCode)
        } catch (err) {
            this.logger.warn({ err }, 'elasticsearch ping failed')
            return false
        }
    }

    private documentOf(source: unknown): StatusDocument | null {
        if (source === undefined) return null
        const result = parseStatusDocument(source)
        if (!result.ok) {
            this.logger.warn({ err: result.error }, 'skipping malformed status document')
            return null
        }
        return toStatusDocument(result.record)
    }

    private async call(method: Method, path: string, body?: unknown): Promise<EsResponse> {
        try {
            const res = await request(`${this.baseUrl}${path}`, {
                method,
                headers: body === undefined ? undefined : { 'content-type': 'application/json' },
                body: body === undefined ? undefined : JSON.stringify(body),
                dispatcher: this.dispatcher,
                headersTimeout: this.timeoutMs,
                bodyTimeout: this.timeoutMs,
            })
            const text = await res.body.text()
            return { statusCode: res.statusCode, payload: parseJson(text) }
        } catch (err) {
            this.logger.error({ err, method, path }, 'elasticsearch request failed')
            throw new ReportStoreUnavailableError(`Elasticsearch is unreachable: ${errorMessage(err)}`, {
                cause: err,
            })
        }
    }

    private unexpected(action: string, res: EsResponse) {
        this.logger.error({ statusCode: res.statusCode, payload: res.payload }, `elasticsearch ${action} failed`)
        return new ReportStoreUnavailableError(
            `Elasticsearch ${action} failed with status ${res.statusCode}`,
        )
    }

    private malformed(what: string, cause: z.ZodError) {
        return new ReportStoreUnavailableError(`Elasticsearch returned a malformed ${what} response`, {
            cause,
        })
    }
}

function isSuccess(statusCode: number) {
    return statusCode >= 200 && statusCode < 300
}

/** 4xx that blames the request body; 404, 408 and 429 still mean the store is not usable */
function isRejection(statusCode: number) {
    return statusCode >= 400 && statusCode < 500 && ![404, 408, 429].includes(statusCode)
}

function parseJson(text: string): unknown {
    if (text.length === 0) return null
    try {
        return JSON.parse(text)
    } catch {
        return text
    }
}
