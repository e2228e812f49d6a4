// Health Check Routes
// Liveness of this process and readiness of the timer server connection

import { Router } from 'express'
import type { TimerConnection } from '@/transport/TimerConnection'

export function createHealthRoutes(connection: TimerConnection): Router {
  const router = Router()

  /**
   * GET /health - Basic health check
   *
   * Response: 200 OK
   * { status: 'ok' }
   */
  router.get('/health', (_req, res) => {
    res.json({ status: 'ok' })
  })

  /**
   * GET /ready - Readiness check
   *
   * Response:
   * - 200 OK when the timer server socket is open: { status: 'ready' }
   * - 503 Service Unavailable otherwise: { status: 'not_ready', error: '...' }
   */
  router.get('/ready', (_req, res) => {
    if (connection.isConnected()) {
      res.json({ status: 'ready' })
      return
    }
    res.status(503).json({
      status: 'not_ready',
      error: `Timer server connection is ${connection.getStatus()}`,
    })
  })

  return router
}
