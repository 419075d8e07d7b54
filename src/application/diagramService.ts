/**
 * Diagram path: source string (or the default reference file) → canonical
 * reference → retrieval pipeline.
 */

import { access } from 'node:fs/promises'
import { join } from 'node:path'
import type { ProjectReference } from '../domain/diagram.js'
import { SimwireError } from '../domain/errors.js'
import type { TelemetrySink } from '../domain/ports/telemetry.js'
import { resolveReference } from './diagram/referenceResolver.js'
import { retrieveDiagram, type RetrievalResult } from './diagram/retrievalPipeline.js'

export type DiagramOptions = {
  /** URL, numeric id or path to a file holding one; falls back to `referenceFile`. */
  source?: string
  workDir: string
  referenceFile: string
  timeoutMs: number
  signal?: AbortSignal
  telemetry?: TelemetrySink
  tempDir?: string
  onResolved?(reference: ProjectReference, from: string): void
}

export async function defaultSource(workDir: string, referenceFile: string): Promise<string> {
  const path = join(workDir, referenceFile)
  try {
    await access(path)
  } catch {
    throw new SimwireError('NoInput', `No ${referenceFile} found in ${workDir}`)
  }
  return path
}

export async function runDiagram(opts: DiagramOptions): Promise<RetrievalResult> {
  const source = opts.source?.trim() || (await defaultSource(opts.workDir, opts.referenceFile))
  const reference = await resolveReference(source, { cwd: opts.workDir })
  opts.onResolved?.(reference, source)

  return retrieveDiagram(reference, {
    workDir: opts.workDir,
    timeoutMs: opts.timeoutMs,
    signal: opts.signal,
    telemetry: opts.telemetry,
    tempDir: opts.tempDir,
  })
}
