import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import {
  canonicalUrlForId,
  resolveInline,
  resolveReference,
  toProjectReference,
} from '../../src/application/diagram/referenceResolver.js'
import { makeTempDir } from '../helpers/fixtures.js'

describe('resolveInline', () => {
  it('keeps http and https URLs as given', () => {
    expect(resolveInline('https://wokwi.com/projects/123')).toBe('https://wokwi.com/projects/123')
    expect(resolveInline('  HTTP://example.test/p/9 ')).toBe('HTTP://example.test/p/9')
  })

  it('expands numeric ids to the canonical project URL', () => {
    expect(resolveInline('123456')).toBe('https://wokwi.com/projects/123456')
    expect(canonicalUrlForId('42')).toBe('https://wokwi.com/projects/42')
  })

  it('is idempotent on its own output', () => {
    const once = resolveInline('123456')
    expect(once).toBe('https://wokwi.com/projects/123456')
    expect(resolveInline(once ?? '')).toBe(once)
  })

  it('returns null for anything else', () => {
    expect(resolveInline('url.txt')).toBeNull()
    expect(resolveInline('12a')).toBeNull()
    expect(resolveInline('ftp://wokwi.com/projects/1')).toBeNull()
  })
})

describe('toProjectReference', () => {
  it('takes the last path segment as the project id', () => {
    expect(toProjectReference('https://wokwi.com/projects/987/')).toEqual({
      url: 'https://wokwi.com/projects/987/',
      projectId: '987',
    })
    expect(toProjectReference('https://wokwi.com/projects/555?tab=code#top').projectId).toBe('555')
  })

  it('rejects URLs without a path', () => {
    expect(() => toProjectReference('https://wokwi.com/')).toThrow('Project URL has no project id: https://wokwi.com/')
  })

  it('rejects a project id with a malformed escape', async () => {
    expect(() => toProjectReference('https://wokwi.com/projects/%zz')).toThrow(
      'Project URL has a malformed project id: https://wokwi.com/projects/%zz',
    )
    await expect(resolveReference('https://wokwi.com/projects/%zz', { cwd: '/' })).rejects.toMatchObject({
      kind: 'InvalidReference',
    })
  })

  it('rejects strings that do not parse as URLs', () => {
    expect(() => toProjectReference('https://')).toThrow('Invalid project URL: https://')
  })
})

describe('resolveReference', () => {
  let dir: string

  beforeEach(async () => {
    dir = await makeTempDir()
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('resolves inline values without touching the filesystem', async () => {
    await expect(resolveReference('77', { cwd: dir })).resolves.toEqual({
      url: 'https://wokwi.com/projects/77',
      projectId: '77',
    })
  })

  it('reads a file relative to cwd and trims its content', async () => {
    await writeFile(join(dir, 'url.txt'), '\n  https://wokwi.com/projects/31337 \n')

    await expect(resolveReference('url.txt', { cwd: dir })).resolves.toEqual({
      url: 'https://wokwi.com/projects/31337',
      projectId: '31337',
    })
  })

  it('accepts a numeric id stored in a file', async () => {
    await writeFile(join(dir, 'id.txt'), '2024\n')

    const reference = await resolveReference('id.txt', { cwd: dir })

    expect(reference.url).toBe('https://wokwi.com/projects/2024')
  })

  it('reports a missing file as FileNotFound', async () => {
    await expect(resolveReference('nope.txt', { cwd: dir })).rejects.toMatchObject({
      kind: 'FileNotFound',
      message: `File not found: ${join(dir, 'nope.txt')}`,
    })
  })

  it('rejects file content that is neither a URL nor an id', async () => {
    await writeFile(join(dir, 'url.txt'), 'see the project page\n')

    await expect(resolveReference('url.txt', { cwd: dir })).rejects.toMatchObject({ kind: 'InvalidReference' })
  })
})
