/**
 * Single-entry zip extraction.
 *
 * Entries are walked lazily from the central directory; only the first entry whose
 * name matches is decompressed, every other entry is skipped without being read.
 */

import { createWriteStream } from 'node:fs'
import { rename, rm } from 'node:fs/promises'
import { pipeline } from 'node:stream/promises'
import type { Readable } from 'node:stream'
import { open, type Entry, type ZipFile } from 'yauzl'
import { SimwireError, errorMessage } from '../../domain/errors.js'

export type ExtractedEntry = {
  entryName: string
  bytes: number
}

export function openZip(archivePath: string): Promise<ZipFile> {
  return new Promise((resolve, reject) => {
    open(archivePath, { lazyEntries: true, autoClose: false }, (err, zipfile) => {
      if (err || !zipfile) {
        reject(new SimwireError('ArchiveCorrupt', `Downloaded file is not a valid ZIP: ${errorMessage(err)}`, { cause: err }))
        return
      }
      resolve(zipfile)
    })
  })
}

/** First non-directory entry accepted by `match`, in central-directory order. */
export function findEntry(zip: ZipFile, match: (name: string) => boolean): Promise<Entry | null> {
  return new Promise((resolve, reject) => {
    const cleanup = () => {
      zip.off('entry', onEntry)
      zip.off('end', onEnd)
      zip.off('error', onError)
    }
    const onEntry = (entry: Entry) => {
      if (!entry.fileName.endsWith('/') && match(entry.fileName)) {
        cleanup()
        resolve(entry)
        return
      }
      zip.readEntry()
    }
    const onEnd = () => {
      cleanup()
      resolve(null)
    }
    const onError = (err: Error) => {
      cleanup()
      reject(new SimwireError('ArchiveCorrupt', `Corrupt ZIP archive: ${err.message}`, { cause: err }))
    }

    zip.on('entry', onEntry)
    zip.on('end', onEnd)
    zip.on('error', onError)
    zip.readEntry()
  })
}

function openEntryStream(zip: ZipFile, entry: Entry): Promise<Readable> {
  return new Promise((resolve, reject) => {
    zip.openReadStream(entry, (err, stream) => {
      if (err || !stream) {
        reject(new SimwireError('ArchiveCorrupt', `Cannot read ${entry.fileName}: ${errorMessage(err)}`, { cause: err }))
        return
      }
      resolve(stream)
    })
  })
}

/**
 * Extract the first entry whose name ends with `suffix` to `destination`.
 * The entry is written to `<destination>.tmp` and renamed into place.
 */
export async function extractEntryBySuffix(
  archivePath: string,
  suffix: string,
  destination: string,
  opts?: { signal?: AbortSignal },
): Promise<ExtractedEntry> {
  const zip = await openZip(archivePath)
  try {
    const entry = await findEntry(zip, (name) => name.endsWith(suffix))
    if (!entry) {
      throw new SimwireError('TargetEntryNotFound', `${suffix} not found in ZIP`)
    }

    const source = await openEntryStream(zip, entry)
    const tmpPath = `${destination}.tmp`
    try {
      await pipeline(source, createWriteStream(tmpPath), { signal: opts?.signal })
      await rename(tmpPath, destination)
    } catch (err) {
      await rm(tmpPath, { force: true }).catch(() => {})
      throw err
    }

    return { entryName: entry.fileName, bytes: entry.uncompressedSize }
  } finally {
    zip.close()
  }
}
