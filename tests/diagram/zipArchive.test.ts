import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { readFile, readdir, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { extractEntryBySuffix, findEntry, openZip } from '../../src/infrastructure/archive/zipArchive.js'
import { makeTempDir, makeZip } from '../helpers/fixtures.js'

describe('zipArchive', () => {
  let dir: string

  beforeEach(async () => {
    dir = await makeTempDir()
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  async function archive(entries: Array<[string, string]>): Promise<string> {
    const path = join(dir, 'project.zip')
    await writeFile(path, await makeZip(entries))
    return path
  }

  it('extracts a nested entry by suffix', async () => {
    const zipPath = await archive([
      ['other.txt', 'ignore me'],
      ['sub/dir/diagram.json', '{"version":1}'],
    ])
    const out = join(dir, 'diagram.json')

    const result = await extractEntryBySuffix(zipPath, 'diagram.json', out)

    expect(result).toEqual({ entryName: 'sub/dir/diagram.json', bytes: 13 })
    expect(await readFile(out, 'utf8')).toBe('{"version":1}')
    expect((await readdir(dir)).sort()).toEqual(['diagram.json', 'project.zip'])
  })

  it('takes the first match in archive order', async () => {
    const zipPath = await archive([
      ['a/diagram.json', 'first'],
      ['b/diagram.json', 'second'],
    ])
    const out = join(dir, 'diagram.json')

    const result = await extractEntryBySuffix(zipPath, 'diagram.json', out)

    expect(result.entryName).toBe('a/diagram.json')
    expect(await readFile(out, 'utf8')).toBe('first')
  })

  it('overwrites an existing destination', async () => {
    const zipPath = await archive([['diagram.json', 'new']])
    const out = join(dir, 'diagram.json')
    await writeFile(out, 'old content')

    await extractEntryBySuffix(zipPath, 'diagram.json', out)

    expect(await readFile(out, 'utf8')).toBe('new')
  })

  it('fails with TargetEntryNotFound and writes nothing', async () => {
    const zipPath = await archive([['sketch.ino', 'void setup() {}']])
    const out = join(dir, 'diagram.json')

    await expect(extractEntryBySuffix(zipPath, 'diagram.json', out)).rejects.toMatchObject({
      kind: 'TargetEntryNotFound',
      message: 'diagram.json not found in ZIP',
    })
    expect(await readdir(dir)).toEqual(['project.zip'])
  })

  it('reports a non-zip file as ArchiveCorrupt', async () => {
    const path = join(dir, 'broken.zip')
    await writeFile(path, '<html>not a zip</html>')

    await expect(extractEntryBySuffix(path, 'diagram.json', join(dir, 'diagram.json'))).rejects.toMatchObject({
      kind: 'ArchiveCorrupt',
    })
  })

  it('findEntry returns null when nothing matches', async () => {
    const zipPath = await archive([['a.txt', 'a'], ['b.txt', 'b']])
    const zip = await openZip(zipPath)
    try {
      expect(await findEntry(zip, (name) => name.endsWith('.json'))).toBeNull()
    } finally {
      zip.close()
    }
  })
})
