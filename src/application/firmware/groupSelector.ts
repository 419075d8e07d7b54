import { groupTimestamp, type ArtifactGroup } from '../../domain/firmware.js'
import { SimwireError } from '../../domain/errors.js'
import type { FixedChoice, GroupChooser } from '../../domain/ports/groupChooser.js'

export type Selection = {
  group: ArtifactGroup
  via: 'single' | 'index' | 'latest'
}

/**
 * Resolve exactly one group.
 *
 * - no groups → NoCompleteGroupsFound
 * - one group → returned without consulting the chooser
 * - several   → chooser decides between a 1-based index, "latest" or cancel
 */
export async function selectGroup(
  groups: readonly ArtifactGroup[],
  chooser: GroupChooser,
): Promise<Selection> {
  const [first] = groups
  if (!first) {
    throw new SimwireError('NoCompleteGroupsFound', 'No complete .bin/.elf pairs found')
  }
  if (groups.length === 1) return { group: first, via: 'single' }

  const choice = await chooser.choose(groups)
  switch (choice.kind) {
    case 'cancel':
      throw new SimwireError('SelectionCancelled', 'No firmware group selected')
    case 'latest':
      return { group: pickLatest(groups), via: 'latest' }
    case 'index': {
      const group = groups[choice.index - 1]
      if (!Number.isInteger(choice.index) || !group) {
        throw new SimwireError(
          'InvalidSelection',
          `Selection ${choice.index} is out of range; choose 1 to ${groups.length}`,
        )
      }
      return { group, via: 'index' }
    }
  }
}

/**
 * Group whose newer file is the most recent. Exact ties keep the earlier group in
 * iteration order; equal timestamps carry no recency guarantee.
 */
export function pickLatest(groups: readonly ArtifactGroup[]): ArtifactGroup {
  const [first, ...rest] = groups
  if (!first) {
    throw new SimwireError('NoCompleteGroupsFound', 'No complete .bin/.elf pairs found')
  }
  let latest = first
  let latestTime = groupTimestamp(first)
  for (const group of rest) {
    const time = groupTimestamp(group)
    if (time > latestTime) {
      latest = group
      latestTime = time
    }
  }
  return latest
}

export function fixedChooser(choice: FixedChoice): GroupChooser {
  return {
    async choose() {
      return choice
    },
  }
}
