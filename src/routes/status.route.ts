// src/routes/status.route.ts
import type { FastifyInstance, FastifyPluginOptions } from 'fastify'
import {
    addStatusSchema,
    healthcheckSchema,
    serviceHealthcheckSchema,
} from '../schemas/status.schema.js'
import {
    getAllStatuses,
    getServiceStatus,
    ingestStatus,
    validateIngestPayload,
} from '../services/status.service.js'
import type { ReportStore } from '../store/report-store.js'
import { sendError } from './error-response.js'

export interface StatusRouteOptions extends FastifyPluginOptions {
    store: ReportStore
    now: () => string
}

export default async function statusRoutes(app: FastifyInstance, opts: StatusRouteOptions) {
    const { store, now } = opts

    app.post<{
        Body: unknown
    }>('/add', {
        schema: addStatusSchema,
        handler: async (request, reply) => {
            const result = validateIngestPayload(request.body, now)
            if (!result.ok) {
                return sendError(reply, 'bad_request', result.message, now())
            }

            await ingestStatus(store, result.document)
            request.log.info({ service: result.document.service_name }, 'status stored')

            return reply.code(201).send({
                message: 'Status data successfully stored',
                service_name: result.document.service_name,
                timestamp: now(),
            })
        },
    })

    app.get('/healthcheck', {
        schema: healthcheckSchema,
        handler: async () => {
            const services = await getAllStatuses(store)
            return { services, timestamp: now() }
        },
    })

    app.get<{
        Params: { serviceName: string }
    }>('/healthcheck/:serviceName', {
        schema: serviceHealthcheckSchema,
        handler: async (request, reply) => {
            const name = request.params.serviceName.trim()
            if (name.length === 0) {
                return sendError(reply, 'bad_request', 'Service name cannot be empty', now())
            }

            const doc = await getServiceStatus(store, name)
            if (!doc) {
                return sendError(reply, 'not_found', `Service "${name}" not found`, now())
            }

            return {
                service_name: doc.service_name,
                service_status: doc.service_status,
                host_name: doc.host_name,
                last_updated: doc.timestamp,
                timestamp: now(),
            }
        },
    })
}
