// Timer Routes
// Read the current render state and model, issue user controls
//
// Endpoints:
// - GET  /v1/render            - Current RenderState
// - GET  /v1/model             - Current TimerModel
// - POST /v1/controls/:action  - Issue a control (start, pause, next, add-minute, ...)

import { Router } from 'express'
import type { TimerRuntime } from '@/engine/TimerRuntime'
import { validateBody } from '../middlewares/validate'
import { ControlBodySchema, ControlParamsSchema, type ControlBody } from '../schemas/controls'

export function createTimerRoutes(runtime: TimerRuntime): Router {
  const router = Router()

  /**
   * GET /v1/render
   *
   * Response: 200 OK
   * { data: RenderState }
   */
  router.get('/v1/render', (_req, res) => {
    res.json({ data: runtime.store.getRenderState() })
  })

  /**
   * GET /v1/model
   *
   * Response: 200 OK
   * { data: { snapshot, hasLoadedEvent, lastUpdateInstant, connected } }
   */
  router.get('/v1/model', (_req, res) => {
    res.json({ data: runtime.store.getModel() })
  })

  /**
   * POST /v1/controls/:action
   *
   * Request body (optional):
   * { enabled?: boolean }   - blink/blackout only; omitted toggles
   *
   * Response: 202 Accepted
   * { data: { sent: OutboundMessage[] } }
   *
   * Errors: 400 unknown action, 409 control not applicable, 503 not connected
   */
  router.post('/v1/controls/:action', validateBody(ControlBodySchema), (req, res, next) => {
    const params = ControlParamsSchema.safeParse(req.params)
    if (!params.success) {
      next(params.error)
      return
    }

    const body: ControlBody = req.body
    const outcome = runtime.dispatcher.perform(params.data.action, body.enabled)
    if (outcome.status === 'rejected') {
      next(outcome.error)
      return
    }

    res.status(202).json({ data: { sent: outcome.sent } })
  })

  return router
}
