// Express Application Factory
// Local status and control surface for the overlay engine
//
// MIDDLEWARE ORDER IS CRITICAL:
// 1. Metrics (first, track everything)
// 2. Body parser
// 3. Logging
// 4. Health/Metrics routes
// 5. Timer routes
// 6. Error handler (MUST BE LAST)

import express, { type Application } from 'express'
import pinoHttp from 'pino-http'
import type { TimerRuntime } from '@/engine/TimerRuntime'
import { logger } from '@/utils/logger'
import { metricsMiddleware } from './middlewares/metrics'
import { errorHandler } from './middlewares/errorHandler'
import { createHealthRoutes } from './routes/health'
import { createMetricsRoutes } from './routes/metrics'
import { createTimerRoutes } from './routes/timer'

export interface AppConfig {
  runtime: TimerRuntime
}

export function createApp(config: AppConfig): Application {
  const app = express()

  app.use(metricsMiddleware)

  app.use(express.json({ limit: '16kb' }))

  app.use(
    pinoHttp({
      logger,
      customLogLevel: (_req, res, err) => {
        if (res.statusCode >= 500 || err) return 'error'
        if (res.statusCode >= 400) return 'warn'
        return 'info'
      },
      // Render polling and probes would drown the log
      autoLogging: {
        ignore: req => req.method === 'GET',
      },
    })
  )

  app.use(createHealthRoutes(config.runtime.connection))
  app.use(createMetricsRoutes())
  app.use(createTimerRoutes(config.runtime))

  app.use(errorHandler)

  return app
}
