/**
 * Wire contracts - Zod schemas for the {tag, payload} JSON protocol
 *
 * Outbound messages are validated against these schemas before they reach the
 * socket, so a malformed control can never be sent. Inbound frames are not
 * schema-validated: the normalizer accepts any JSON value.
 */

import { z } from 'zod'

// ============================================================================
// Outbound (client -> server)
// ============================================================================

export const PollMessageSchema = z.object({ tag: z.literal('poll') })
export const StartMessageSchema = z.object({ tag: z.literal('start') })
export const PauseMessageSchema = z.object({ tag: z.literal('pause') })
export const ReloadMessageSchema = z.object({ tag: z.literal('reload') })

export const LoadMessageSchema = z.object({
  tag: z.literal('load'),
  payload: z.enum(['next', 'previous']),
})

export const AddTimeMessageSchema = z.object({
  tag: z.literal('addtime'),
  payload: z.union([
    z.object({ add: z.number().int().positive() }).strict(),
    z.object({ remove: z.number().int().positive() }).strict(),
  ]),
})

export const ChangeMessageSchema = z.object({
  tag: z.literal('change'),
  payload: z
    .record(z.string().min(1), z.object({ duration: z.number().int().min(0) }))
    .refine(payload => Object.keys(payload).length === 1, {
      message: 'change must target exactly one event',
    }),
})

export const TimerMessageSchema = z.object({
  tag: z.literal('message'),
  payload: z.object({
    timer: z.union([
      z.object({ blink: z.boolean() }).strict(),
      z.object({ blackout: z.boolean() }).strict(),
    ]),
  }),
})

export const OutboundMessageSchema = z.discriminatedUnion('tag', [
  PollMessageSchema,
  StartMessageSchema,
  PauseMessageSchema,
  ReloadMessageSchema,
  LoadMessageSchema,
  AddTimeMessageSchema,
  ChangeMessageSchema,
  TimerMessageSchema,
])

// ============================================================================
// Type Inference
// ============================================================================

export type OutboundMessage = z.infer<typeof OutboundMessageSchema>
