// Metrics
// Prometheus registry shared by the sync engine and the status HTTP surface
//
// Metrics:
// - showclock_frames_received_total - Inbound frames by normalized kind (counter)
// - showclock_controls_sent_total - Outbound control messages by tag (counter)
// - showclock_controls_rejected_total - Rejected controls by error code (counter)
// - showclock_reconnects_total - Reconnect attempts scheduled (counter)
// - showclock_server_connected - 1 while the timer server socket is open (gauge)
// - showclock_http_requests_total / showclock_http_request_duration_ms - status surface

import promClient from 'prom-client'
import type { Request, Response, NextFunction } from 'express'

export const register = new promClient.Registry()

promClient.collectDefaultMetrics({ register })

export const framesReceived = new promClient.Counter({
  name: 'showclock_frames_received_total',
  help: 'Inbound frames from the timer server, by normalized kind',
  labelNames: ['kind'],
  registers: [register],
})

export const controlsSent = new promClient.Counter({
  name: 'showclock_controls_sent_total',
  help: 'Control messages sent to the timer server, by tag',
  labelNames: ['tag'],
  registers: [register],
})

export const controlsRejected = new promClient.Counter({
  name: 'showclock_controls_rejected_total',
  help: 'User controls that did not reach the timer server, by error code',
  labelNames: ['code'],
  registers: [register],
})

export const reconnectsTotal = new promClient.Counter({
  name: 'showclock_reconnects_total',
  help: 'Reconnect attempts scheduled after the timer server connection dropped',
  registers: [register],
})

export const serverConnected = new promClient.Gauge({
  name: 'showclock_server_connected',
  help: 'Whether the timer server connection is open (1) or not (0)',
  registers: [register],
})

export const httpRequestsTotal = new promClient.Counter({
  name: 'showclock_http_requests_total',
  help: 'Total number of status surface HTTP requests',
  labelNames: ['method', 'route', 'status_code'],
  registers: [register],
})

export const httpRequestDuration = new promClient.Histogram({
  name: 'showclock_http_request_duration_ms',
  help: 'Status surface HTTP request duration in milliseconds',
  labelNames: ['method', 'route'],
  buckets: [1, 5, 10, 25, 50, 100, 250, 500, 1000],
  registers: [register],
})

/**
 * Records request count and duration for every status surface route.
 * Must be registered before the routes.
 */
export function metricsMiddleware(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now()

  res.on('finish', () => {
    const duration = Date.now() - start
    const route: string = req.route?.path || req.path

    httpRequestsTotal.inc({
      method: req.method,
      route,
      status_code: res.statusCode,
    })

    httpRequestDuration.observe({ method: req.method, route }, duration)
  })

  next()
}
