/**
 * Firmware artifacts discovered in build-output folders.
 *
 * primary-image: flat binary (.bin) loaded by the simulator
 * debug-image:   symbol-bearing image (.elf) used for debugging
 */

export type ArtifactKind = 'primary-image' | 'debug-image'

export const ARTIFACT_EXTENSIONS: Readonly<Record<string, ArtifactKind>> = {
  '.bin': 'primary-image',
  '.elf': 'debug-image',
}

export type ArtifactFile = {
  readonly path: string
  readonly kind: ArtifactKind
  readonly directory: string
  /** File name without its extension. */
  readonly baseName: string
  readonly mtimeMs: number
  readonly size: number
}

export type ArtifactGroup = {
  readonly key: string
  readonly directory: string
  readonly baseName: string
  readonly primary: ArtifactFile
  readonly debug: ArtifactFile
}

export type ProjectType = 'STM32' | 'PlatformIO' | 'Unknown'

export type ProjectRoot = {
  readonly path: string
  readonly type: ProjectType
}

/** The later of the two modification times in a group. */
export function groupTimestamp(group: ArtifactGroup): number {
  return Math.max(group.primary.mtimeMs, group.debug.mtimeMs)
}
