import type { ArtifactGroup } from '../firmware.js'

export type GroupChoice =
  | { kind: 'index'; index: number }
  | { kind: 'latest' }
  | { kind: 'cancel' }

/**
 * Input-gathering side of group selection. Only consulted when more than one
 * complete group exists; the decision rule itself lives in groupSelector.
 */
export interface GroupChooser {
  choose(groups: readonly ArtifactGroup[]): Promise<GroupChoice>
}

/** A choice decided ahead of time (flag or environment), never a cancellation. */
export type FixedChoice = Exclude<GroupChoice, { kind: 'cancel' }>
