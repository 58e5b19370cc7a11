import { Dispatcher, MockAgent } from 'undici'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { createMockLogger } from '../__test__/stubs.js'
import { DocumentRejectedError, ReportStoreUnavailableError } from '../errors.js'
import { ElasticsearchReportStore, INDEX_MAPPING } from './elasticsearch-report-store.js'

const ORIGIN = 'http://localhost:9200'
const INDEX = 'service-monitoring'

const DOC = {
    service_name: 'httpd',
    service_status: 'UP',
    host_name: 'web-01',
    timestamp: '2024-01-15T10:30:00Z',
} as const

/** Sends response headers, then drops the connection mid-body. */
class BrokenBodyDispatcher extends Dispatcher {
    dispatch(_opts: Dispatcher.DispatchOptions, handler: Dispatcher.DispatchHandlers): boolean {
        handler.onConnect?.(() => {})
        handler.onHeaders?.(200, [], () => {}, 'OK')
        setTimeout(() => handler.onError?.(new Error('other side closed')), 0)
        return true
    }
}

describe('ElasticsearchReportStore', () => {
    let agent: MockAgent
    let store: ElasticsearchReportStore

    beforeEach(() => {
        agent = new MockAgent()
        agent.disableNetConnect()
        store = new ElasticsearchReportStore({
            url: `${ORIGIN}/`,
            index: INDEX,
            dispatcher: agent,
            logger: createMockLogger(),
        })
    })

    afterEach(async () => {
        await agent.close()
    })

    describe('ensureReady', () => {
        it('does nothing when the index exists', async () => {
            agent.get(ORIGIN).intercept({ path: `/${INDEX}`, method: 'HEAD' }).reply(200, '')

            await expect(store.ensureReady()).resolves.toBeUndefined()
            agent.assertNoPendingInterceptors()
        })

        it('creates a missing index with the keyword and date mapping', async () => {
            let sent: unknown
            const pool = agent.get(ORIGIN)
            pool.intercept({ path: `/${INDEX}`, method: 'HEAD' }).reply(404, '')
            pool.intercept({ path: `/${INDEX}`, method: 'PUT' }).reply((opts) => {
                sent = typeof opts.body === 'string' ? JSON.parse(opts.body) : undefined
                return { statusCode: 200, data: { acknowledged: true } }
            })

            await store.ensureReady()

            expect(sent).toStrictEqual(INDEX_MAPPING)
        })

        it('accepts an index created concurrently', async () => {
            const pool = agent.get(ORIGIN)
            pool.intercept({ path: `/${INDEX}`, method: 'HEAD' }).reply(404, '')
            pool.intercept({ path: `/${INDEX}`, method: 'PUT' }).reply(400, {
                error: { type: 'resource_already_exists_exception' },
                status: 400,
            })

            await expect(store.ensureReady()).resolves.toBeUndefined()
        })

        it('fails on any other answer', async () => {
            agent.get(ORIGIN).intercept({ path: `/${INDEX}`, method: 'HEAD' }).reply(500, '')

            await expect(store.ensureReady()).rejects.toThrow(
                new ReportStoreUnavailableError('Elasticsearch HEAD index failed with status 500'),
            )
        })
    })

    describe('index', () => {
        it('posts the document and waits for refresh', async () => {
            let sent: unknown
            agent
                .get(ORIGIN)
                .intercept({ path: `/${INDEX}/_doc?refresh=wait_for`, method: 'POST' })
                .reply((opts) => {
                    sent = typeof opts.body === 'string' ? JSON.parse(opts.body) : undefined
                    return { statusCode: 201, data: { result: 'created' } }
                })

            await store.index({ ...DOC })

            expect(sent).toStrictEqual(DOC)
        })

        it('sends offsets in HH:MM form', async () => {
            let sent: unknown
            agent
                .get(ORIGIN)
                .intercept({ path: `/${INDEX}/_doc?refresh=wait_for`, method: 'POST' })
                .reply((opts) => {
                    sent = typeof opts.body === 'string' ? JSON.parse(opts.body) : undefined
                    return { statusCode: 201, data: { result: 'created' } }
                })

            await store.index({ ...DOC, timestamp: '2024-01-15T10:30:00+0530' })

            expect(sent).toStrictEqual({ ...DOC, timestamp: '2024-01-15T10:30:00+05:30' })
        })

        it('reports a document Elasticsearch refuses as rejected, not unavailable', async () => {
            agent
                .get(ORIGIN)
                .intercept({ path: `/${INDEX}/_doc?refresh=wait_for`, method: 'POST' })
                .reply(400, { error: { type: 'mapper_parsing_exception' }, status: 400 })

            const result = store.index({ ...DOC })

            await expect(result).rejects.toBeInstanceOf(DocumentRejectedError)
            await expect(result).rejects.toThrow('Elasticsearch rejected the document with status 400')
        })

        it('treats throttling as store failure', async () => {
            agent
                .get(ORIGIN)
                .intercept({ path: `/${INDEX}/_doc?refresh=wait_for`, method: 'POST' })
                .reply(429, { error: 'too many requests' })

            await expect(store.index({ ...DOC })).rejects.toBeInstanceOf(ReportStoreUnavailableError)
        })

        it('reports an overloaded cluster as store failure', async () => {
            agent
                .get(ORIGIN)
                .intercept({ path: `/${INDEX}/_doc?refresh=wait_for`, method: 'POST' })
                .reply(503, { error: 'unavailable' })

            await expect(store.index({ ...DOC })).rejects.toThrow(
                'Elasticsearch index document failed with status 503',
            )
        })
    })

    describe('latestPerName', () => {
        it('reads the newest document of every bucket', async () => {
            agent
                .get(ORIGIN)
                .intercept({ path: `/${INDEX}/_search`, method: 'POST' })
                .reply(200, {
                    aggregations: {
                        services: {
                            buckets: [
                                { key: 'httpd', latest: { hits: { hits: [{ _source: DOC }] } } },
                                {
                                    key: 'rabbitmq',
                                    latest: {
                                        hits: {
                                            hits: [{ _source: { ...DOC, service_name: 'rabbitmq', service_status: 'DOWN' } }],
                                        },
                                    },
                                },
                            ],
                        },
                    },
                })

            expect(await store.latestPerName()).toStrictEqual({ httpd: 'UP', rabbitmq: 'DOWN' })
        })

        it('skips malformed documents', async () => {
            agent
                .get(ORIGIN)
                .intercept({ path: `/${INDEX}/_search`, method: 'POST' })
                .reply(200, {
                    aggregations: {
                        services: {
                            buckets: [
                                { latest: { hits: { hits: [{ _source: { ...DOC, service_status: 'MAYBE' } }] } } },
                                { latest: { hits: { hits: [{ _source: { ...DOC, service_name: 'postgresql' } }] } } },
                            ],
                        },
                    },
                })

            expect(await store.latestPerName()).toStrictEqual({ postgresql: 'UP' })
        })

        it('answers empty when the index does not exist yet', async () => {
            agent.get(ORIGIN).intercept({ path: `/${INDEX}/_search`, method: 'POST' }).reply(404, {})

            expect(await store.latestPerName()).toStrictEqual({})
        })

        it('rejects a response without buckets', async () => {
            agent
                .get(ORIGIN)
                .intercept({ path: `/${INDEX}/_search`, method: 'POST' })
                .reply(200, { aggregations: { services: {} } })

            await expect(store.latestPerName()).rejects.toThrow(
                'Elasticsearch returned a malformed aggregation response',
            )
        })
    })

    describe('latestFor', () => {
        it('returns the newest document for the name', async () => {
            let sent: unknown
            agent
                .get(ORIGIN)
                .intercept({ path: `/${INDEX}/_search`, method: 'POST' })
                .reply((opts) => {
                    sent = typeof opts.body === 'string' ? JSON.parse(opts.body) : undefined
                    return { statusCode: 200, data: { hits: { hits: [{ _source: DOC }] } } }
                })

            expect(await store.latestFor('httpd')).toStrictEqual(DOC)
            expect(sent).toStrictEqual({
                size: 1,
                query: { term: { service_name: 'httpd' } },
                sort: [{ timestamp: { order: 'desc' } }],
            })
        })

        it('returns null when nothing matches', async () => {
            agent
                .get(ORIGIN)
                .intercept({ path: `/${INDEX}/_search`, method: 'POST' })
                .reply(200, { hits: { hits: [] } })

            expect(await store.latestFor('redis')).toBeNull()
        })
    })

    describe('connectivity', () => {
        it('wraps transport failures', async () => {
            await expect(store.latestFor('httpd')).rejects.toBeInstanceOf(ReportStoreUnavailableError)
            await expect(store.latestFor('httpd')).rejects.toThrow(/^Elasticsearch is unreachable: /)
        })

        it('wraps a connection lost while reading the body', async () => {
            const broken = new ElasticsearchReportStore({
                url: ORIGIN,
                index: INDEX,
                dispatcher: new BrokenBodyDispatcher(),
                logger: createMockLogger(),
            })

            await expect(broken.latestPerName()).rejects.toThrow(
                new ReportStoreUnavailableError('Elasticsearch is unreachable: other side closed'),
            )
        })

        it('ping answers true for a healthy cluster', async () => {
            agent.get(ORIGIN).intercept({ path: '/', method: 'HEAD' }).reply(200, '')

            expect(await store.ping()).toBe(true)
        })

        it('ping answers false when unreachable', async () => {
            expect(await store.ping()).toBe(false)
        })
    })
})
