// Runtime settings
// Validated view of the environment; the rest of the app never reads process.env directly

import { z } from 'zod'
import { ConfigurationError } from '@/errors/TimerErrors'
import { formatZodErrors } from '@/api/schemas/validators'

const booleanFlag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'], { message: 'must be one of: true, false, 1, 0' })
    .optional()
    .transform(value => (value === undefined ? fallback : value === 'true' || value === '1'))

const integer = (name: string) =>
  z.coerce.number({ message: `${name} must be a number` }).int(`${name} must be an integer`)

export const SettingsSchema = z
  .object({
    SERVER_URL: z
      .string()
      .trim()
      .url('must be a valid URL')
      .refine(value => /^https?:\/\//i.test(value), { message: 'must use http or https' })
      .default('http://localhost:4001'),
    ADDTIME_AFFECTS_EVENT_DURATION: booleanFlag(false),
    DISPLAY_MODE: z.enum(['timer', 'clock']).default('timer'),
    RECONNECT_DELAY_MS: integer('RECONNECT_DELAY_MS').min(100).default(1000),
    RECONNECT_MAX_DELAY_MS: integer('RECONNECT_MAX_DELAY_MS').min(100).default(10000),
    STATUS_PORT: integer('STATUS_PORT').min(0).max(65535).optional(),
    STATUS_HOST: z.string().min(1).default('127.0.0.1'),
    KEYBOARD_CONTROLS: booleanFlag(true),
  })
  .refine(env => env.RECONNECT_MAX_DELAY_MS >= env.RECONNECT_DELAY_MS, {
    message: 'must be at least RECONNECT_DELAY_MS',
    path: ['RECONNECT_MAX_DELAY_MS'],
  })

export interface Settings {
  serverUrl: string
  addtimeAffectsEventDuration: boolean
  displayMode: 'timer' | 'clock'
  reconnectDelayMs: number
  maxReconnectDelayMs: number
  statusPort?: number
  statusHost: string
  keyboardControls: boolean
}

/**
 * Validate the environment into Settings. Empty strings count as unset.
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const input: Record<string, string> = {}
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') input[key] = value
  }

  const result = SettingsSchema.safeParse(input)
  if (!result.success) {
    throw new ConfigurationError(
      formatZodErrors(result.error).map(issue => ({ field: issue.field, message: issue.message }))
    )
  }

  const parsed = result.data
  return {
    serverUrl: parsed.SERVER_URL,
    addtimeAffectsEventDuration: parsed.ADDTIME_AFFECTS_EVENT_DURATION,
    displayMode: parsed.DISPLAY_MODE,
    reconnectDelayMs: parsed.RECONNECT_DELAY_MS,
    maxReconnectDelayMs: parsed.RECONNECT_MAX_DELAY_MS,
    statusPort: parsed.STATUS_PORT,
    statusHost: parsed.STATUS_HOST,
    keyboardControls: parsed.KEYBOARD_CONTROLS,
  }
}
