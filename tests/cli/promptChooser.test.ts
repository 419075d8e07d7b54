import { describe, expect, test } from 'vitest'
import type { ArtifactGroup } from '../../src/domain/firmware.js'
import { formatGroupMenu, promptChooser } from '../../src/interfaces/cli/promptChooser.js'
import { createTestIO } from '../helpers/fixtures.js'

function group(name: string): ArtifactGroup {
  const directory = '/proj/Debug'
  const file = (ext: string, kind: 'primary-image' | 'debug-image') => ({
    path: `${directory}/${name}${ext}`,
    kind,
    directory,
    baseName: name,
    mtimeMs: 0,
    size: 1,
  })
  return {
    key: `${directory}/${name}`,
    directory,
    baseName: name,
    primary: file('.bin', 'primary-image'),
    debug: file('.elf', 'debug-image'),
  }
}

const groups = [group('boot'), group('app')]

describe('formatGroupMenu', () => {
  test('numbers groups from 1', () => {
    expect(formatGroupMenu(groups)).toBe(
      [
        'Found 2 firmware groups:',
        '1. boot (/proj/Debug)',
        '   BIN: boot.bin',
        '   ELF: boot.elf',
        '2. app (/proj/Debug)',
        '   BIN: app.bin',
        '   ELF: app.elf',
        '',
      ].join('\n'),
    )
  })
})

describe('promptChooser', () => {
  test('returns the chosen index', async () => {
    const { io, questions } = createTestIO({ answers: ['2'] })

    await expect(promptChooser(io).choose(groups)).resolves.toEqual({ kind: 'index', index: 2 })
    expect(questions).toEqual(['Select firmware group (1-2) or Enter for latest: '])
  })

  test('treats an empty answer as latest', async () => {
    const { io } = createTestIO({ answers: ['   '] })

    await expect(promptChooser(io).choose(groups)).resolves.toEqual({ kind: 'latest' })
  })

  test('asks again until the answer is in range', async () => {
    const { io, err, questions } = createTestIO({ answers: ['abc', '0', '3', '1'] })

    await expect(promptChooser(io).choose(groups)).resolves.toEqual({ kind: 'index', index: 1 })
    expect(questions).toHaveLength(4)
    expect(err).toEqual([
      'Please select a number from 1 to 2\n',
      'Please select a number from 1 to 2\n',
      'Please select a number from 1 to 2\n',
    ])
  })

  test('closed input cancels', async () => {
    const { io } = createTestIO({ answers: [null] })

    await expect(promptChooser(io).choose(groups)).resolves.toEqual({ kind: 'cancel' })
  })
})
