// src/app.ts
import { fastify } from 'fastify'
import type { FastifyInstance, FastifyServerOptions } from 'fastify'
import { DocumentRejectedError, InvalidArgumentError, ReportStoreUnavailableError } from './errors.js'
import routes from './routes/index.js'
import { sendError } from './routes/error-response.js'
import type { ReportStore } from './store/report-store.js'

export interface BuildAppOptions {
    store: ReportStore
    /** Fastify logger config; `false` in tests */
    logger?: FastifyServerOptions['logger']
    clock?: () => Date
}

export async function buildApp(opts: BuildAppOptions): Promise<FastifyInstance> {
    const clock = opts.clock ?? (() => new Date())
    const now = () => clock().toISOString()

    const app = fastify({ logger: opts.logger ?? true })

    app.setNotFoundHandler((request, reply) => {
        return sendError(reply, 'not_found', 'Resource not found', now())
    })

    app.setErrorHandler((err, request, reply) => {
        if (err instanceof ReportStoreUnavailableError) {
            request.log.error({ err }, 'report store unavailable')
            return sendError(reply, 'service_unavailable', 'Report store is unavailable', now())
        }
        if (err instanceof DocumentRejectedError) {
            request.log.error({ err }, 'status document rejected by report store')
            return sendError(reply, 'internal_server_error', 'Failed to store status data', now())
        }
        if (err instanceof InvalidArgumentError) {
            return sendError(reply, 'bad_request', err.message, now())
        }
        // content-type / body parsing errors raised by fastify itself
        if (err.statusCode === 415) {
            return sendError(reply, 'bad_request', 'Request must be JSON', now())
        }
        if (err.statusCode !== undefined && err.statusCode >= 400 && err.statusCode < 500) {
            return sendError(reply, 'bad_request', err.message, now())
        }

        request.log.error({ err }, 'unhandled error')
        return sendError(reply, 'internal_server_error', 'An unexpected error occurred', now())
    })

    await app.register(routes, { store: opts.store, now })

    return app
}
