import type { FastifyInstance } from 'fastify'
import statusRoutes from './status.route.js'
import type { StatusRouteOptions } from './status.route.js'

export default async function routes(app: FastifyInstance, opts: StatusRouteOptions) {
    await app.register(statusRoutes, opts)
}
