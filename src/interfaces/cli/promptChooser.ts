import { basename } from 'node:path'
import type { ArtifactGroup } from '../../domain/firmware.js'
import type { GroupChoice, GroupChooser } from '../../domain/ports/groupChooser.js'
import type { IO } from './io.js'

export function formatGroupMenu(groups: readonly ArtifactGroup[]): string {
  const lines = [`Found ${groups.length} firmware groups:`]
  groups.forEach((group, i) => {
    lines.push(`${i + 1}. ${group.baseName} (${group.directory})`)
    lines.push(`   BIN: ${basename(group.primary.path)}`)
    lines.push(`   ELF: ${basename(group.debug.path)}`)
  })
  return lines.join('\n') + '\n'
}

/**
 * Numbered menu on the terminal. Empty answer selects the latest build; anything
 * that is not a number in range is refused and asked again. Closing the input
 * (Ctrl+D / Ctrl+C) cancels.
 */
export function promptChooser(io: IO): GroupChooser {
  return {
    async choose(groups: readonly ArtifactGroup[]): Promise<GroupChoice> {
      io.stdout(`\n${formatGroupMenu(groups)}\n`)
      const question = `Select firmware group (1-${groups.length}) or Enter for latest: `

      for (;;) {
        const answer = await io.prompt(question)
        if (answer === null) return { kind: 'cancel' }

        const trimmed = answer.trim()
        if (trimmed === '') return { kind: 'latest' }
        if (/^\d+$/.test(trimmed)) {
          const index = Number(trimmed)
          if (index >= 1 && index <= groups.length) return { kind: 'index', index }
        }
        io.stderr(`Please select a number from 1 to ${groups.length}\n`)
      }
    },
  }
}
