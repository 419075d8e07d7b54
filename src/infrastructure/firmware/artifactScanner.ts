/**
 * Artifact scanner: finds firmware images under known build-output folders.
 *
 * Conventions:
 * - STM32CubeIDE / CMake: `Debug/` and `build/` anywhere below the root
 * - PlatformIO:           `.pio/build/<env>/`
 *
 * Symlinked directories are not followed below the first level (glob's default for
 * `**`), so link cycles cannot make the walk loop.
 */

import { stat } from 'node:fs/promises'
import { basename, dirname, extname } from 'node:path'
import { glob } from 'glob'
import { ARTIFACT_EXTENSIONS, type ArtifactFile } from '../../domain/firmware.js'

export const BUILD_OUTPUT_PATTERNS = [
  '**/Debug/**/*',
  '**/build/**/*',
  '**/.pio/build/**/*',
] as const

export async function scanArtifacts(root: string): Promise<ArtifactFile[]> {
  const matches = await glob([...BUILD_OUTPUT_PATTERNS], {
    cwd: root,
    absolute: true,
    nodir: true,
    dot: true,
  })

  // .pio/build hits both the PlatformIO and the generic build pattern
  const candidates = [...new Set(matches)].filter((path) => artifactKindOf(path) !== null)

  const files = await Promise.all(candidates.map(toArtifactFile))
  return files
    .filter((file): file is ArtifactFile => file !== null)
    .sort((a, b) => a.path.localeCompare(b.path))
}

export function artifactKindOf(path: string): ArtifactFile['kind'] | null {
  return ARTIFACT_EXTENSIONS[extname(path).toLowerCase()] ?? null
}

async function toArtifactFile(path: string): Promise<ArtifactFile | null> {
  const kind = artifactKindOf(path)
  if (!kind) return null

  try {
    const s = await stat(path)
    if (!s.isFile()) return null
    return {
      path,
      kind,
      directory: dirname(path),
      baseName: basename(path, extname(path)),
      mtimeMs: s.mtimeMs,
      size: s.size,
    }
  } catch {
    // Removed between glob and stat (e.g. a build running in parallel)
    return null
  }
}
