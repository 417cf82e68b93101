import { pino } from 'pino'

const nodeEnv = process.env.NODE_ENV
const isProduction = nodeEnv === 'production'
const defaultLevel = nodeEnv === 'test' ? 'silent' : isProduction ? 'info' : 'debug'

// Structured fields go first, the message second: logger.warn({ ticker }, 'message')
const logger = pino({
    level: process.env.LOG_LEVEL || defaultLevel,
    base: {
        service: 'equity-rebalancer',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
})

export { logger }
