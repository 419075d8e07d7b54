/**
 * Setup path: project root → scan → group → select → wokwi.toml.
 */

import { resolve } from 'node:path'
import type { ArtifactFile, ArtifactGroup, ProjectRoot } from '../domain/firmware.js'
import { SimwireError, throwIfAborted } from '../domain/errors.js'
import type { GroupChooser } from '../domain/ports/groupChooser.js'
import { NoopTelemetrySink, type TelemetrySink } from '../domain/ports/telemetry.js'
import { findProjectRoot } from '../infrastructure/firmware/projectRoot.js'
import { scanArtifacts } from '../infrastructure/firmware/artifactScanner.js'
import { groupArtifacts, type GroupingResult } from './firmware/artifactGrouper.js'
import { selectGroup, type Selection } from './firmware/groupSelector.js'
import { writeConfig } from './firmware/configWriter.js'

export interface SetupReporter {
  onWarning?(warning: SimwireError): void
  onRoot?(root: ProjectRoot): void
  onScanned?(files: readonly ArtifactFile[], grouping: GroupingResult): void
  onSelected?(selection: Selection): void
}

export type SetupOptions = {
  /** Directory that receives wokwi.toml; relative paths are computed from here. */
  workDir: string
  /** Explicit scan root; skips project root detection. */
  root?: string
  chooser: GroupChooser
  telemetry?: TelemetrySink
  reporter?: SetupReporter
  /** Checked between steps; once aborted, nothing further is written. */
  signal?: AbortSignal
}

export type SetupResult = {
  root: ProjectRoot
  group: ArtifactGroup
  configPath: string
}

export async function resolveScanRoot(workDir: string, explicitRoot?: string): Promise<{ root: ProjectRoot; warning: SimwireError | null }> {
  if (explicitRoot) {
    const path = resolve(workDir, explicitRoot)
    const detected = await findProjectRoot(path)
    return { root: { path, type: detected?.path === path ? detected.type : 'Unknown' }, warning: null }
  }

  const detected = await findProjectRoot(workDir)
  if (detected) return { root: detected, warning: null }

  return {
    root: { path: resolve(workDir), type: 'Unknown' },
    warning: new SimwireError('NoProjectRootFound', 'Project root not found, scanning from current directory'),
  }
}

export async function runSetup(opts: SetupOptions): Promise<SetupResult> {
  const telemetry = opts.telemetry ?? new NoopTelemetrySink()
  const reporter = opts.reporter ?? {}

  const { signal } = opts

  const { root, warning } = await resolveScanRoot(opts.workDir, opts.root)
  throwIfAborted(signal)
  if (warning) reporter.onWarning?.(warning)
  reporter.onRoot?.(root)

  const files = await scanArtifacts(root.path)
  throwIfAborted(signal)
  const grouping = groupArtifacts(files)
  telemetry.emit({
    type: 'firmware_scan_completed',
    payload: {
      root: root.path,
      projectType: root.type,
      files: files.length,
      groups: grouping.groups.length,
      duplicates: grouping.duplicates.length,
    },
  })
  reporter.onScanned?.(files, grouping)

  if (files.length === 0) {
    throw new SimwireError('NoFirmwareFilesFound', 'No .bin or .elf files found')
  }
  for (const dup of grouping.duplicates) {
    reporter.onWarning?.(
      new SimwireError('DuplicateArtifact', `Skipping ${dup.key}: several ${dup.kind} files (${dup.paths.join(', ')})`),
    )
  }

  const selection = await selectGroup(grouping.groups, opts.chooser)
  throwIfAborted(signal)
  telemetry.emit({ type: 'firmware_group_selected', payload: { key: selection.group.key, via: selection.via } })
  reporter.onSelected?.(selection)

  throwIfAborted(signal)
  const configPath = await writeConfig(selection.group, opts.workDir)
  telemetry.emit({
    type: 'config_written',
    payload: { path: configPath, firmware: selection.group.primary.path, elf: selection.group.debug.path },
  })

  return { root, group: selection.group, configPath }
}
