// src/routes/error-response.ts
import type { FastifyReply } from 'fastify'

export type ErrorKind = 'bad_request' | 'not_found' | 'service_unavailable' | 'internal_server_error'

const STATUS_CODES: Record<ErrorKind, number> = {
    bad_request: 400,
    not_found: 404,
    service_unavailable: 503,
    internal_server_error: 500,
}

export interface ErrorBody {
    error: ErrorKind
    message: string
    timestamp: string
}

export function sendError(reply: FastifyReply, error: ErrorKind, message: string, timestamp: string) {
    const body: ErrorBody = { error, message, timestamp }
    return reply.code(STATUS_CODES[error]).send(body)
}
