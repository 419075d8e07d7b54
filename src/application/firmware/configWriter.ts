/**
 * Simulator configuration (wokwi.toml) rendering, writing and reading.
 *
 * Paths are stored relative to the config's directory with `\` separators on every
 * host so a generated file diffs the same on Windows, Linux and macOS.
 */

import { readFile, rename, rm, writeFile } from 'node:fs/promises'
import path, { type PlatformPath } from 'node:path'
import { parse as parseToml } from 'smol-toml'
import { z } from 'zod'
import type { ArtifactGroup } from '../../domain/firmware.js'
import { SimwireError, errorMessage, isNotFoundError } from '../../domain/errors.js'

export const CONFIG_FILE_NAME = 'wokwi.toml'

const ConfigDocumentSchema = z.object({
  wokwi: z
    .object({
      version: z.number().int(),
      firmware: z.string().min(1),
      elf: z.string().min(1),
    })
    .passthrough(),
})

export type ConfigDocument = z.infer<typeof ConfigDocumentSchema>['wokwi']

// ============================================================================
// Paths
// ============================================================================

export function toConfigPath(fromDir: string, toFile: string, p: PlatformPath = path): string {
  return p.relative(fromDir, toFile).replace(/[\\/]/g, '\\')
}

export function resolveConfiguredPath(configDir: string, configured: string, p: PlatformPath = path): string {
  return p.resolve(configDir, configured.split('\\').join(p.sep))
}

// ============================================================================
// Rendering
// ============================================================================

export function renderConfig(group: ArtifactGroup, targetDir: string, p: PlatformPath = path): string {
  const { primary, debug } = group
  const firmware = toConfigPath(targetDir, primary.path, p)
  const elf = toConfigPath(targetDir, debug.path, p)

  return [
    '# Wokwi Configuration',
    '# Generated by simwire firmware scanner',
    `# Firmware: ${p.basename(primary.path)} (${formatBytes(primary.size)} bytes)`,
    `# ELF: ${p.basename(debug.path)} (${formatBytes(debug.size)} bytes)`,
    `# Build time: ${formatBuildTime(new Date(primary.mtimeMs))}`,
    '',
    '[wokwi]',
    'version = 1',
    `firmware = ${tomlString(firmware)}`,
    `elf = ${tomlString(elf)}`,
    '',
  ].join('\n')
}

export function formatBytes(size: number): string {
  return size.toLocaleString('en-US')
}

const DAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat']
const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec']

/** Local time in ctime layout, e.g. `Sat Oct  4 09:05:00 2025`. */
export function formatBuildTime(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0')
  const day = String(date.getDate()).padStart(2, ' ')
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  return `${DAYS[date.getDay()]} ${MONTHS[date.getMonth()]} ${day} ${time} ${date.getFullYear()}`
}

/** Literal string when possible (backslashes stay as typed), basic string otherwise. */
export function tomlString(value: string): string {
  // eslint-disable-next-line no-control-regex
  if (!/['\u0000-\u001f\u007f]/.test(value)) return `'${value}'`
  return JSON.stringify(value)
}

// ============================================================================
// Writing / reading
// ============================================================================

/**
 * Replace `<targetDir>/wokwi.toml` with the rendered document. The write goes to a
 * sibling temp file first and is renamed into place, so readers never see a
 * partial file.
 */
export async function writeConfig(group: ArtifactGroup, targetDir: string): Promise<string> {
  const target = path.join(targetDir, CONFIG_FILE_NAME)
  const tmpPath = `${target}.tmp`
  const content = renderConfig(group, targetDir)

  try {
    await writeFile(tmpPath, content, 'utf8')
    await rename(tmpPath, target)
  } catch (err) {
    await rm(tmpPath, { force: true }).catch(() => {})
    throw new SimwireError('ConfigWriteFailed', errorMessage(err), { cause: err })
  }
  return target
}

export async function readConfig(targetDir: string): Promise<ConfigDocument> {
  const target = path.join(targetDir, CONFIG_FILE_NAME)

  let raw: string
  try {
    raw = await readFile(target, 'utf8')
  } catch (err) {
    if (isNotFoundError(err)) {
      throw new SimwireError('FileNotFound', `File not found: ${target}`, { cause: err })
    }
    throw err
  }

  let data: unknown
  try {
    data = parseToml(raw)
  } catch (err) {
    throw new SimwireError('InvalidConfig', `${target}: ${errorMessage(err)}`, { cause: err })
  }

  const parsed = ConfigDocumentSchema.safeParse(data)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const where = issue ? issue.path.join('.') : 'wokwi'
    throw new SimwireError('InvalidConfig', `${target}: invalid [wokwi] section (${where}: ${issue?.message ?? 'invalid'})`)
  }
  return parsed.data.wokwi
}
