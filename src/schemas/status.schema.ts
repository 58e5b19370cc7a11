// src/schemas/status.schema.ts
import { HEALTH_STATUSES } from '../types/status.js'

export const addStatusSchema = {
    response: {
        201: {
            type: 'object',
            required: ['message', 'service_name', 'timestamp'],
            properties: {
                message: { type: 'string' },
                service_name: { type: 'string' },
                timestamp: { type: 'string' },
            },
        },
    },
} as const

export const healthcheckSchema = {
    response: {
        200: {
            type: 'object',
            required: ['services', 'timestamp'],
            properties: {
                services: {
                    type: 'object',
                    additionalProperties: { type: 'string', enum: HEALTH_STATUSES },
                },
                timestamp: { type: 'string' },
            },
        },
    },
} as const

export const serviceHealthcheckSchema = {
    params: {
        type: 'object',
        required: ['serviceName'],
        properties: {
            serviceName: { type: 'string' },
        },
    },
    response: {
        200: {
            type: 'object',
            required: ['service_name', 'service_status', 'host_name', 'last_updated', 'timestamp'],
            properties: {
                service_name: { type: 'string' },
                service_status: { type: 'string', enum: HEALTH_STATUSES },
                host_name: { type: 'string' },
                last_updated: { type: 'string' },
                timestamp: { type: 'string' },
            },
        },
    },
} as const
