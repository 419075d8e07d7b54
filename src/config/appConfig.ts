import { z } from 'zod'
import type { FixedChoice } from '../domain/ports/groupChooser.js'

export type AppConfig = {
  telemetry: {
    sink: 'none' | 'console'
  }
  download: {
    /** Per-candidate request timeout in milliseconds. */
    timeoutMs: number
  }
  setup: {
    /** Non-interactive group selection, if configured. */
    selection: FixedChoice | null
  }
  diagram: {
    referenceFile: string
  }
}

const SelectionSchema = z
  .string()
  .trim()
  .regex(/^(latest|[1-9]\d*)$/i, 'expected a positive group number or "latest"')

const EnvSchema = z.object({
  SIMWIRE_TELEMETRY_SINK: z.enum(['none', 'console']).default('none'),
  SIMWIRE_DOWNLOAD_TIMEOUT_MS: z.coerce.number().int().min(1).default(30000), // 30 sec
  SIMWIRE_SELECT: SelectionSchema.optional(),
  SIMWIRE_REFERENCE_FILE: z.string().min(1).default('url.txt'),
})

/**
 * Parse a `--select` / SIMWIRE_SELECT value. Throws a ZodError on anything other
 * than a positive integer or "latest".
 */
export function parseSelection(raw: string): FixedChoice {
  const value = SelectionSchema.parse(raw)
  if (value.toLowerCase() === 'latest') return { kind: 'latest' }
  return { kind: 'index', index: Number(value) }
}

export function loadAppConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = EnvSchema.parse(env)

  return {
    telemetry: {
      sink: parsed.SIMWIRE_TELEMETRY_SINK,
    },
    download: {
      timeoutMs: parsed.SIMWIRE_DOWNLOAD_TIMEOUT_MS,
    },
    setup: {
      selection: parsed.SIMWIRE_SELECT ? parseSelection(parsed.SIMWIRE_SELECT) : null,
    },
    diagram: {
      referenceFile: parsed.SIMWIRE_REFERENCE_FILE,
    },
  }
}
