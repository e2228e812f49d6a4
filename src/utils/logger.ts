// Structured logging with Pino
// Component-scoped child loggers; pretty output on an interactive dev run.
// Logs go to stderr: stdout belongs to the terminal renderer.

import pino from 'pino'
import { config } from 'dotenv'

config()

const env = process.env.NODE_ENV || 'development'
const usePretty = env !== 'production' && env !== 'test'

const options: pino.LoggerOptions = {
  level: process.env.LOG_LEVEL || (env === 'test' ? 'silent' : usePretty ? 'debug' : 'info'),

  transport: usePretty
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
          destination: 2,
        },
      }
    : undefined,

  base: {
    service: 'showclock',
    env,
  },

  timestamp: () => `,"time":"${new Date().toISOString()}"`,
}

export const logger = usePretty ? pino(options) : pino(options, pino.destination(2))

export const createComponentLogger = (component: string) => {
  return logger.child({ component })
}
