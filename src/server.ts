// src/server.ts
import { buildApp } from './app.js'
import { ENV } from './config/env.js'
import { logger } from './infra/logger.js'
import { ElasticsearchReportStore } from './store/elasticsearch-report-store.js'
import { InMemoryReportStore } from './store/in-memory-report-store.js'
import type { ReportStore } from './store/report-store.js'

function createStore(): ReportStore {
    if (ENV.REPORT_STORE === 'memory') return new InMemoryReportStore()

    return new ElasticsearchReportStore({
        url: ENV.ELASTICSEARCH_URL,
        index: ENV.ELASTICSEARCH_INDEX,
        timeoutMs: ENV.ELASTICSEARCH_TIMEOUT_MS,
        logger,
    })
}

const store = createStore()

try {
    await store.ensureReady()
} catch (err) {
    // keep serving; requests answer 503 until the store is reachable
    logger.error({ err }, 'report store not ready')
}

const app = await buildApp({ store, logger: { level: ENV.LOG_LEVEL } })

try {
    await app.listen({ host: ENV.HOST, port: ENV.PORT })
} catch (err) {
    app.log.error(err)
    process.exit(1)
}
