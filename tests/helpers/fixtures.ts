import { mkdir, mkdtemp, utimes, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { dirname, join } from 'node:path'
import { ZipFile } from 'yazl'
import type { IO } from '../../src/interfaces/cli/io.js'
import type { TelemetryEvent, TelemetrySink } from '../../src/domain/ports/telemetry.js'

export function makeTempDir(prefix = 'simwire-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix))
}

/** Write `content` at `root/relPath`, optionally with a fixed modification time (epoch seconds). */
export async function writeTree(
  root: string,
  files: Record<string, string | { content: string; mtime: number }>,
): Promise<void> {
  for (const [relPath, entry] of Object.entries(files)) {
    const path = join(root, relPath)
    await mkdir(dirname(path), { recursive: true })
    const content = typeof entry === 'string' ? entry : entry.content
    await writeFile(path, content)
    if (typeof entry !== 'string') {
      await utimes(path, entry.mtime, entry.mtime)
    }
  }
}

/** In-memory zip with entries in the given order. */
export function makeZip(entries: Array<[name: string, content: string]>): Promise<Buffer> {
  const zip = new ZipFile()
  for (const [name, content] of entries) {
    zip.addBuffer(Buffer.from(content, 'utf8'), name)
  }
  zip.end()

  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = []
    zip.outputStream.on('data', (chunk: Buffer) => chunks.push(chunk))
    zip.outputStream.on('end', () => resolve(Buffer.concat(chunks)))
    zip.outputStream.on('error', reject)
  })
}

export function createTestIO(opts: { answers?: Array<string | null>; interactive?: boolean } = {}) {
  const out: string[] = []
  const err: string[] = []
  const questions: string[] = []
  const answers = [...(opts.answers ?? [])]
  const io: IO = {
    stdout: (t) => out.push(t),
    stderr: (t) => err.push(t),
    prompt: async (q) => {
      questions.push(q)
      if (answers.length === 0) throw new Error(`unexpected prompt: ${q}`)
      return answers.shift() ?? null
    },
    isInteractive: opts.interactive ?? false,
  }
  return { io, out, err, questions }
}

export function recordingSink(): TelemetrySink & { events: TelemetryEvent[] } {
  const events: TelemetryEvent[] = []
  return {
    events,
    emit: (event) => {
      events.push(event)
    },
  }
}
