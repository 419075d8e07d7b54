/**
 * Diagram retrieval: project reference → archive download → diagram.json.
 *
 * States: resolved → downloading → extracting → done, with `failed` reachable from
 * the first three. Every transition is emitted as telemetry.
 *
 * Download policy: candidate endpoints are tried once each, in order. The first
 * response with a success status and a zip/octet-stream content type wins; no
 * further candidates are tried after that, even if extraction fails.
 *
 * The temporary archive lives only for the duration of one call and is removed on
 * every exit path (success, failure, abort).
 */

import { open, readFile, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { nanoid } from 'nanoid'
import { z } from 'zod'
import {
  DIAGRAM_FILE_NAME,
  type DiagramSummary,
  type ProjectReference,
  type RetrievalState,
} from '../../domain/diagram.js'
import { SimwireError, cancelledError, errorMessage, isSimwireError, throwIfAborted } from '../../domain/errors.js'
import { NoopTelemetrySink, type TelemetrySink } from '../../domain/ports/telemetry.js'
import { extractEntryBySuffix } from '../../infrastructure/archive/zipArchive.js'

// ============================================================================
// Endpoints
// ============================================================================

export type EndpointDescriptor = {
  style: 'api' | 'direct'
  /** `{id}` is replaced with the project id. */
  template: string
}

export const DEFAULT_ENDPOINTS: readonly EndpointDescriptor[] = [
  { style: 'api', template: 'https://wokwi.com/api/projects/{id}/zip' },
  { style: 'direct', template: 'https://wokwi.com/projects/{id}/zip' },
  { style: 'direct', template: 'https://wokwi.com/projects/{id}/download' },
  { style: 'api', template: 'https://wokwi.com/api/projects/{id}/export/zip' },
]

export function candidateUrls(projectId: string, endpoints: readonly EndpointDescriptor[] = DEFAULT_ENDPOINTS): string[] {
  const id = encodeURIComponent(projectId)
  return endpoints.map((endpoint) => endpoint.template.replace('{id}', id))
}

export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36'

/** The upstream service rejects bare clients; it expects a browser identity and a referer. */
export function requestHeaders(referer: string): Record<string, string> {
  return {
    'User-Agent': BROWSER_USER_AGENT,
    Accept: 'application/zip, application/octet-stream, */*',
    'Accept-Language': 'en-US,en;q=0.9',
    Referer: referer,
  }
}

export function isArchiveContentType(contentType: string | null): boolean {
  const value = (contentType ?? '').toLowerCase()
  return value.includes('zip') || value.includes('octet-stream')
}

// ============================================================================
// Candidate attempt
// ============================================================================

export type CandidateOutcome = { accepted: true; bytes: number } | { accepted: false; reason: string }

/**
 * GET one candidate and, if acceptable, stream its body into `destination`.
 * Rejections are returned, not thrown; only caller cancellation and failures
 * after acceptance throw.
 *
 * `timeoutMs` bounds the wait for the response and then each wait for the next
 * body chunk; a slow but steady download is not cut off.
 */
export async function tryCandidate(input: {
  url: string
  headers: Record<string, string>
  destination: string
  timeoutMs: number
  signal?: AbortSignal
}): Promise<CandidateOutcome> {
  const { url, headers, destination, timeoutMs, signal } = input
  throwIfAborted(signal)

  const controller = new AbortController()
  let timeout = setTimeout(() => controller.abort(), timeoutMs)
  const restartTimeout = () => {
    clearTimeout(timeout)
    timeout = setTimeout(() => controller.abort(), timeoutMs)
  }
  const onAbort = () => controller.abort()
  signal?.addEventListener('abort', onAbort, { once: true })

  try {
    let res: Response
    try {
      res = await fetch(url, { headers, signal: controller.signal, redirect: 'follow' })
    } catch (err) {
      if (signal?.aborted) throw cancelledError()
      if (controller.signal.aborted) return { accepted: false, reason: `timed out after ${timeoutMs}ms` }
      return { accepted: false, reason: errorMessage(err) }
    }

    if (!res.ok) {
      await discardBody(res)
      return { accepted: false, reason: `HTTP ${res.status}` }
    }
    const contentType = res.headers.get('content-type')
    if (!isArchiveContentType(contentType)) {
      await discardBody(res)
      return { accepted: false, reason: `unexpected content-type ${contentType ?? '(none)'}` }
    }

    restartTimeout()
    try {
      const bytes = await writeBody(res, destination, restartTimeout)
      return { accepted: true, bytes }
    } catch (err) {
      if (signal?.aborted) throw cancelledError()
      if (controller.signal.aborted) {
        throw new SimwireError('DownloadFailed', `Download from ${url} stalled for more than ${timeoutMs}ms`, { cause: err })
      }
      throw new SimwireError('DownloadFailed', `Download from ${url} failed: ${errorMessage(err)}`, { cause: err })
    }
  } finally {
    clearTimeout(timeout)
    signal?.removeEventListener('abort', onAbort)
  }
}

async function writeBody(res: Response, destination: string, onChunk: () => void): Promise<number> {
  const handle = await open(destination, 'w')
  let bytes = 0
  try {
    if (!res.body) return 0
    const reader = res.body.getReader()
    for (;;) {
      const { done, value } = await reader.read()
      if (done) break
      onChunk()
      await handle.write(value)
      bytes += value.byteLength
    }
    return bytes
  } finally {
    await handle.close()
  }
}

async function discardBody(res: Response): Promise<void> {
  if (res.body && !res.bodyUsed) {
    await res.body.cancel().catch(() => {})
  }
}

// ============================================================================
// Temporary archive
// ============================================================================

/** Runs `fn` with a fresh temp file path and removes the file afterwards, whatever happens. */
export async function withTempArchive<T>(dir: string, fn: (archivePath: string) => Promise<T>): Promise<T> {
  const archivePath = join(dir, `simwire-${nanoid(12)}.zip`)
  try {
    return await fn(archivePath)
  } finally {
    await rm(archivePath, { force: true })
  }
}

// ============================================================================
// Summary
// ============================================================================

const DiagramShapeSchema = z
  .object({
    version: z.union([z.number(), z.string()]).optional(),
    parts: z.array(z.unknown()).default([]),
    connections: z.array(z.unknown()).default([]),
  })
  .passthrough()

/** Informational only: null when the file is not a diagram-shaped JSON document. */
export async function summarizeDiagram(path: string): Promise<DiagramSummary | null> {
  let data: unknown
  try {
    data = JSON.parse(await readFile(path, 'utf8'))
  } catch {
    return null
  }
  const parsed = DiagramShapeSchema.safeParse(data)
  if (!parsed.success) return null
  return {
    version: parsed.data.version ?? null,
    parts: parsed.data.parts.length,
    connections: parsed.data.connections.length,
  }
}

// ============================================================================
// Pipeline
// ============================================================================

export type RetrievalOptions = {
  /** Directory that receives diagram.json. */
  workDir: string
  /** Per candidate: limit on the wait for a response and on each gap between body chunks. */
  timeoutMs: number
  signal?: AbortSignal
  telemetry?: TelemetrySink
  endpoints?: readonly EndpointDescriptor[]
  /** Where the temporary archive is created (defaults to the OS temp dir). */
  tempDir?: string
}

export type RetrievalResult = {
  reference: ProjectReference
  sourceUrl: string
  entryName: string
  outputPath: string
  bytes: number
  summary: DiagramSummary | null
}

export async function retrieveDiagram(reference: ProjectReference, opts: RetrievalOptions): Promise<RetrievalResult> {
  const telemetry = opts.telemetry ?? new NoopTelemetrySink()
  let state: RetrievalState = 'resolved'
  const transition = (to: RetrievalState) => {
    telemetry.emit({ type: 'diagram_state_changed', payload: { projectId: reference.projectId, from: state, to } })
    state = to
  }

  const outputPath = join(opts.workDir, DIAGRAM_FILE_NAME)
  const urls = candidateUrls(reference.projectId, opts.endpoints)
  const headers = requestHeaders(reference.url)

  try {
    return await withTempArchive(opts.tempDir ?? tmpdir(), async (archivePath) => {
      transition('downloading')
      const rejections: string[] = []
      let sourceUrl: string | null = null

      for (const url of urls) {
        const outcome = await tryCandidate({
          url,
          headers,
          destination: archivePath,
          timeoutMs: opts.timeoutMs,
          signal: opts.signal,
        })
        if (outcome.accepted) {
          sourceUrl = url
          break
        }
        rejections.push(`${url}: ${outcome.reason}`)
        telemetry.emit({ type: 'diagram_candidate_rejected', payload: { url, reason: outcome.reason } })
      }

      if (!sourceUrl) {
        throw new SimwireError(
          'DownloadFailed',
          `Could not download project ${reference.projectId}; every endpoint was rejected:\n  ${rejections.join('\n  ')}`,
        )
      }

      transition('extracting')
      const extracted = await extractEntryBySuffix(archivePath, DIAGRAM_FILE_NAME, outputPath, { signal: opts.signal })
      telemetry.emit({
        type: 'diagram_extracted',
        payload: { url: sourceUrl, entry: extracted.entryName, bytes: extracted.bytes },
      })

      const summary = await summarizeDiagram(outputPath)
      transition('done')
      return {
        reference,
        sourceUrl,
        entryName: extracted.entryName,
        outputPath,
        bytes: extracted.bytes,
        summary,
      }
    })
  } catch (err) {
    transition('failed')
    if (opts.signal?.aborted && !isSimwireError(err, 'Cancelled')) throw cancelledError()
    throw err
  }
}
