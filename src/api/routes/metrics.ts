// Metrics Routes
// Prometheus metrics endpoint

import { Router } from 'express'
import { register } from '../middlewares/metrics'
import { createComponentLogger } from '@/utils/logger'

const logger = createComponentLogger('MetricsRoutes')

export function createMetricsRoutes(): Router {
  const router = Router()

  /**
   * GET /metrics - Prometheus metrics endpoint
   *
   * Response: 200 OK
   * Content-Type: text/plain; version=0.0.4; charset=utf-8
   *
   * # HELP showclock_frames_received_total Inbound frames from the timer server, by normalized kind
   * # TYPE showclock_frames_received_total counter
   * showclock_frames_received_total{kind="partial"} 42
   */
  router.get('/metrics', async (_req, res) => {
    try {
      res.set('Content-Type', register.contentType)
      res.send(await register.metrics())
    } catch (err) {
      logger.error({ err }, 'Failed to collect metrics')
      res.status(500).send('Error collecting metrics')
    }
  })

  return router
}
