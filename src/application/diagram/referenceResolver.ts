/**
 * Reference resolution: turn user input into a canonical project URL.
 *
 * Accepted forms:
 * - `https://wokwi.com/projects/123` (any http/https URL) → unchanged
 * - `123`                                                 → canonical URL
 * - a path to a file holding either of the above          → file content, trimmed
 *
 * Anything else is rejected with InvalidReference. No network access happens here.
 */

import { readFile } from 'node:fs/promises'
import { resolve } from 'node:path'
import { CANONICAL_PROJECT_PREFIX, type ProjectReference } from '../../domain/diagram.js'
import { SimwireError, isNotFoundError } from '../../domain/errors.js'

const URL_PREFIX = /^https?:\/\//i
const NUMERIC_ID = /^\d+$/

export function canonicalUrlForId(id: string): string {
  return `${CANONICAL_PROJECT_PREFIX}${id}`
}

/**
 * Resolve a URL or numeric id without touching the filesystem. Returns null when
 * the value is neither.
 */
export function resolveInline(value: string): string | null {
  const trimmed = value.trim()
  if (URL_PREFIX.test(trimmed)) return trimmed
  if (NUMERIC_ID.test(trimmed)) return canonicalUrlForId(trimmed)
  return null
}

export async function resolveReference(input: string, opts: { cwd: string }): Promise<ProjectReference> {
  const inline = resolveInline(input)
  if (inline) return toProjectReference(inline)

  const filePath = resolve(opts.cwd, input.trim())
  let content: string
  try {
    content = await readFile(filePath, 'utf8')
  } catch (err) {
    if (isNotFoundError(err)) {
      throw new SimwireError('FileNotFound', `File not found: ${filePath}`, { cause: err })
    }
    throw err
  }

  const fromFile = resolveInline(content)
  if (!fromFile) {
    throw new SimwireError(
      'InvalidReference',
      `Invalid project reference in ${filePath}: expected a project URL or numeric id`,
    )
  }
  return toProjectReference(fromFile)
}

/** Project id is the last non-empty path segment; query and fragment are ignored. */
export function toProjectReference(url: string): ProjectReference {
  let parsed: URL
  try {
    parsed = new URL(url)
  } catch {
    throw new SimwireError('InvalidReference', `Invalid project URL: ${url}`)
  }

  const segments = parsed.pathname.split('/').filter((s) => s.length > 0)
  const projectId = segments[segments.length - 1]
  if (!projectId) {
    throw new SimwireError('InvalidReference', `Project URL has no project id: ${url}`)
  }
  try {
    return { url, projectId: decodeURIComponent(projectId) }
  } catch {
    throw new SimwireError('InvalidReference', `Project URL has a malformed project id: ${url}`)
  }
}
