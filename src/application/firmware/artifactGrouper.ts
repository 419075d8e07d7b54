/**
 * Pairs scanned artifacts into (.bin, .elf) groups sharing a directory and base name.
 *
 * Only complete groups are offered for selection. Partial groups (a lone .bin or
 * .elf) are dropped from selection without an error; callers get them back in
 * `incomplete` for display only. A key with two files of the same kind is not
 * guessed at: it is reported in `duplicates` and excluded.
 */

import { join } from 'node:path'
import type { ArtifactFile, ArtifactGroup, ArtifactKind } from '../../domain/firmware.js'

export type DuplicateArtifact = {
  key: string
  kind: ArtifactKind
  paths: string[]
}

export type IncompleteGroup = {
  key: string
  missing: ArtifactKind
  present: ArtifactFile
}

export type GroupingResult = {
  groups: ArtifactGroup[]
  incomplete: IncompleteGroup[]
  duplicates: DuplicateArtifact[]
}

type Slot = {
  directory: string
  baseName: string
  primary: ArtifactFile[]
  debug: ArtifactFile[]
}

export function groupKey(file: Pick<ArtifactFile, 'directory' | 'baseName'>): string {
  return join(file.directory, file.baseName)
}

export function groupArtifacts(files: readonly ArtifactFile[]): GroupingResult {
  const slots = new Map<string, Slot>()

  for (const file of files) {
    const key = groupKey(file)
    let slot = slots.get(key)
    if (!slot) {
      slot = { directory: file.directory, baseName: file.baseName, primary: [], debug: [] }
      slots.set(key, slot)
    }
    if (file.kind === 'primary-image') slot.primary.push(file)
    else slot.debug.push(file)
  }

  const result: GroupingResult = { groups: [], incomplete: [], duplicates: [] }
  const keys = [...slots.keys()].sort((a, b) => a.localeCompare(b))

  for (const key of keys) {
    const slot = slots.get(key)
    if (!slot) continue

    const dupes = findDuplicates(key, slot)
    if (dupes.length > 0) {
      result.duplicates.push(...dupes)
      continue
    }

    const [primary] = slot.primary
    const [debug] = slot.debug
    if (primary && debug) {
      result.groups.push({ key, directory: slot.directory, baseName: slot.baseName, primary, debug })
    } else if (primary) {
      result.incomplete.push({ key, missing: 'debug-image', present: primary })
    } else if (debug) {
      result.incomplete.push({ key, missing: 'primary-image', present: debug })
    }
  }

  return result
}

function findDuplicates(key: string, slot: Slot): DuplicateArtifact[] {
  const dupes: DuplicateArtifact[] = []
  if (slot.primary.length > 1) {
    dupes.push({ key, kind: 'primary-image', paths: slot.primary.map((f) => f.path) })
  }
  if (slot.debug.length > 1) {
    dupes.push({ key, kind: 'debug-image', paths: slot.debug.map((f) => f.path) })
  }
  return dupes
}
