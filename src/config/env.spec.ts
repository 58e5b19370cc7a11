import { describe, expect, it } from 'vitest'
import { loadEnv } from './env.js'

describe('loadEnv', () => {
    it('applies defaults', () => {
        const env = loadEnv({})

        expect(env).toMatchObject({
            HOST: '0.0.0.0',
            PORT: 5000,
            LOG_LEVEL: 'info',
            DATA_DIR: 'data',
            APP_NAME: 'rbcapp1',
            MONITORED_SERVICES: ['httpd', 'rabbitmq', 'postgresql'],
            PROBE_TIMEOUT_MS: 10_000,
            REPORT_STORE: 'elasticsearch',
            ELASTICSEARCH_URL: 'http://localhost:9200',
            ELASTICSEARCH_INDEX: 'service-monitoring',
            ELASTICSEARCH_TIMEOUT_MS: 5_000,
        })
    })

    it('parses overrides', () => {
        const env = loadEnv({
            PORT: '8080',
            MONITORED_SERVICES: ' nginx , redis,,',
            REPORT_STORE: 'memory',
            LOG_LEVEL: 'debug',
        })

        expect(env.PORT).toBe(8080)
        expect(env.MONITORED_SERVICES).toStrictEqual(['nginx', 'redis'])
        expect(env.REPORT_STORE).toBe('memory')
        expect(env.LOG_LEVEL).toBe('debug')
    })

    it('treats blank values as unset', () => {
        expect(loadEnv({ PORT: '  ', APP_NAME: '' })).toMatchObject({ PORT: 5000, APP_NAME: 'rbcapp1' })
    })

    it('reports every invalid variable', () => {
        expect(() => loadEnv({ PORT: 'eighty', MONITORED_SERVICES: ',' })).toThrow(
            /^Invalid environment configuration: PORT: .+; MONITORED_SERVICES: must name at least one service$/,
        )
    })
})
