/**
 * Project root detection.
 *
 * Walks from `startDir` up to the filesystem root. In each directory an STM32CubeIDE
 * project file (*.ioc) wins over a PlatformIO manifest (platformio.ini).
 */

import { readdir } from 'node:fs/promises'
import { dirname, resolve } from 'node:path'
import type { ProjectRoot } from '../../domain/firmware.js'

export async function findProjectRoot(startDir: string): Promise<ProjectRoot | null> {
  let current = resolve(startDir)

  for (;;) {
    const entries = await listNames(current)
    if (entries.some((name) => name.toLowerCase().endsWith('.ioc'))) {
      return { path: current, type: 'STM32' }
    }
    if (entries.includes('platformio.ini')) {
      return { path: current, type: 'PlatformIO' }
    }

    const parent = dirname(current)
    if (parent === current) return null
    current = parent
  }
}

async function listNames(dir: string): Promise<string[]> {
  try {
    return await readdir(dir)
  } catch {
    // Unreadable ancestors (permissions) are skipped, not fatal
    return []
  }
}
