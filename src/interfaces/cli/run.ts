import { readFile } from 'node:fs/promises'
import { resolve } from 'node:path'
import yargs from 'yargs'
import { ZodError } from 'zod'
import { loadAppConfig, parseSelection, type AppConfig } from '../../config/appConfig.js'
import {
  EXIT_CANCELLED,
  EXIT_FAILED,
  EXIT_NOTHING_TO_DO,
  EXIT_OK,
  SimwireError,
  errorMessage,
  exitCodeFor,
} from '../../domain/errors.js'
import { DIAGRAM_FILE_NAME } from '../../domain/diagram.js'
import type { FixedChoice, GroupChooser } from '../../domain/ports/groupChooser.js'
import {
  CompositeTelemetrySink,
  ConsoleTelemetrySink,
  NoopTelemetrySink,
  type TelemetryEvent,
  type TelemetrySink,
} from '../../domain/ports/telemetry.js'
import { fixedChooser } from '../../application/firmware/groupSelector.js'
import { CONFIG_FILE_NAME, readConfig, resolveConfiguredPath } from '../../application/firmware/configWriter.js'
import { runSetup } from '../../application/setupService.js'
import { runDiagram } from '../../application/diagramService.js'
import { VERSION } from '../../version.js'
import type { IO } from './io.js'
import { promptChooser } from './promptChooser.js'

/**
 * CLI adapter: parse commands → call application services → exit code.
 *
 * Exit codes: 0 ok, 1 attempted and failed, 2 nothing to do / usage, 130 cancelled.
 * Ctrl+C aborts the running operation through an AbortSignal so temporary files
 * are still cleaned up before the process exits.
 */
export async function runCli(opts: {
  argv: string[]
  defaultWorkspace: string
  io: IO
  env?: NodeJS.ProcessEnv
  /** Overrides the OS temp dir for downloaded archives. */
  tempDir?: string
}): Promise<number> {
  const { argv, defaultWorkspace, io } = opts

  let config: AppConfig
  try {
    config = loadAppConfig(opts.env ?? process.env)
  } catch (err) {
    io.stderr(`Invalid environment: ${formatError(err)}\n`)
    return EXIT_NOTHING_TO_DO
  }

  const telemetry: TelemetrySink =
    config.telemetry.sink === 'console' ? new ConsoleTelemetrySink() : new NoopTelemetrySink()

  const controller = new AbortController()
  const onSigint = () => controller.abort()
  process.once('SIGINT', onSigint)

  let commandExitCode = EXIT_OK

  const parser = yargs(argv)
    .scriptName('simwire')
    .option('workspace', { alias: 'w', type: 'string', default: defaultWorkspace, describe: 'Working directory' })
    .strict()
    .help()
    .version(false)
    .exitProcess(false)
    .fail((msg, err) => {
      if (err) throw err
      throw new SimwireError('UsageError', msg)
    })

  parser.command(
    ['setup', 'scan', 'config'],
    'Scan firmware (.bin/.elf) and write wokwi.toml',
    (y) =>
      y
        .option('root', { type: 'string', describe: 'Scan this directory instead of the detected project root' })
        .option('select', {
          type: 'string',
          describe: 'Group number or "latest" when several groups are found',
          coerce: (value: string | undefined) => (value === undefined ? undefined : parseSelection(value)),
        }),
    async (args) => {
      const workDir = resolve(args.workspace)
      commandExitCode = await runSetupCommand({
        io,
        workDir,
        root: args.root,
        chooser: chooseFor(io, args.select ?? config.setup.selection),
        telemetry,
        signal: controller.signal,
      })
    },
  )

  parser.command(
    'show',
    `Show firmware paths configured in ${CONFIG_FILE_NAME}`,
    (y) => y,
    async (args) => {
      const workDir = resolve(args.workspace)
      const doc = await readConfig(workDir)
      io.stdout(`Config: ${resolve(workDir, CONFIG_FILE_NAME)}\n`)
      io.stdout(`Firmware: ${doc.firmware} -> ${resolveConfiguredPath(workDir, doc.firmware)}\n`)
      io.stdout(`ELF: ${doc.elf} -> ${resolveConfiguredPath(workDir, doc.elf)}\n`)
    },
  )

  parser.command(
    'diagram [source]',
    'Download diagram.json from a Wokwi project (URL, id or file holding one)',
    (y) =>
      y
        .positional('source', { type: 'string', describe: `Project URL, numeric id or file (default: ${config.diagram.referenceFile})` })
        .option('timeout', { type: 'number', default: config.download.timeoutMs, describe: 'Per-endpoint timeout in ms' }),
    async (args) => {
      const workDir = resolve(args.workspace)
      commandExitCode = await runDiagramCommand({
        io,
        workDir,
        source: args.source,
        referenceFile: config.diagram.referenceFile,
        timeoutMs: args.timeout,
        signal: controller.signal,
        telemetry,
        tempDir: opts.tempDir,
      })
    },
  )

  parser.command(
    'version',
    'Show version information',
    (y) => y,
    () => {
      io.stdout(`simwire ${VERSION}\n`)
      io.stdout(`Node.js: ${process.versions.node}\n`)
      io.stdout(`Platform: ${process.platform} (${process.arch})\n`)
    },
  )

  try {
    if (argv.length === 0) {
      parser.showHelp((text) => io.stdout(`${text}\n`))
      return EXIT_NOTHING_TO_DO
    }
    // With a parse callback yargs hands back --help output instead of printing it.
    await parser.parseAsync(argv, {}, (_err, _args, output) => {
      if (output) io.stdout(`${output}\n`)
    })
    return commandExitCode
  } catch (err) {
    io.stderr(`${formatError(err)}\n`)
    if (err instanceof ZodError) return EXIT_NOTHING_TO_DO
    return exitCodeFor(err)
  } finally {
    process.removeListener('SIGINT', onSigint)
  }
}

function chooseFor(io: IO, selection: FixedChoice | null | undefined): GroupChooser {
  if (selection) return fixedChooser(selection)
  if (io.isInteractive) return promptChooser(io)
  return {
    async choose() {
      io.stdout('Input is not interactive; selecting the most recently built group.\n')
      return { kind: 'latest' }
    },
  }
}

function formatError(err: unknown): string {
  if (err instanceof ZodError) {
    return err.issues.map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message)).join('; ')
  }
  return errorMessage(err)
}

// ============================================================================
// setup
// ============================================================================

async function runSetupCommand(input: {
  io: IO
  workDir: string
  root?: string
  chooser: GroupChooser
  telemetry: TelemetrySink
  signal: AbortSignal
}): Promise<number> {
  const { io } = input
  let scannedFiles: readonly string[] = []

  try {
    const result = await runSetup({
      workDir: input.workDir,
      root: input.root,
      chooser: input.chooser,
      telemetry: input.telemetry,
      signal: input.signal,
      reporter: {
        onWarning: (warning) => io.stderr(`Warning: ${warning.message}\n`),
        onRoot: (root) => {
          io.stdout(`Project: ${root.path}\n`)
          io.stdout(`Type: ${root.type}\n`)
          io.stdout('Scanning firmware files...\n')
        },
        onScanned: (files, grouping) => {
          scannedFiles = files.map((f) => f.path)
          if (files.length === 0) return
          io.stdout(`Found ${files.length} firmware files\n`)
          io.stdout(`Found ${grouping.groups.length} complete firmware groups\n`)
        },
        onSelected: ({ group }) => {
          io.stdout(`\nSelected: ${group.baseName}\n`)
          io.stdout(`  BIN: ${group.primary.path}\n`)
          io.stdout(`  ELF: ${group.debug.path}\n`)
        },
      },
    })

    io.stdout(`\nUpdated: ${result.configPath}\n`)
    io.stdout(`\n${CONFIG_FILE_NAME} content:\n`)
    const content = await readFile(result.configPath, 'utf8')
    io.stdout(numberLines(content))
    io.stdout('\nSetup completed successfully!\n')
    return EXIT_OK
  } catch (err) {
    io.stderr(`${errorMessage(err)}\n`)
    if (err instanceof SimwireError && err.kind === 'NoFirmwareFilesFound') {
      io.stdout('\nSuggestions:\n')
      io.stdout('  STM32: build the project in STM32CubeIDE\n')
      io.stdout("  ESP32: run 'pio run' in PlatformIO\n")
    }
    if (err instanceof SimwireError && err.kind === 'NoCompleteGroupsFound' && scannedFiles.length > 0) {
      io.stdout('\nFiles found:\n')
      for (const path of scannedFiles) io.stdout(`  ${path}\n`)
    }
    return exitCodeFor(err)
  }
}

export function numberLines(content: string): string {
  const lines = content.replace(/\n$/, '').split('\n')
  return lines.map((line, i) => `${String(i + 1).padStart(2, ' ')}: ${line}`).join('\n') + '\n'
}

// ============================================================================
// diagram
// ============================================================================

async function runDiagramCommand(input: {
  io: IO
  workDir: string
  source?: string
  referenceFile: string
  timeoutMs: number
  signal: AbortSignal
  telemetry: TelemetrySink
  tempDir?: string
}): Promise<number> {
  const { io } = input
  const progress: TelemetrySink = { emit: (event) => printProgress(io, event) }

  try {
    const result = await runDiagram({
      source: input.source,
      workDir: input.workDir,
      referenceFile: input.referenceFile,
      timeoutMs: input.timeoutMs,
      signal: input.signal,
      tempDir: input.tempDir,
      telemetry: new CompositeTelemetrySink([input.telemetry, progress]),
      onResolved: (reference, from) => {
        if (from !== reference.url) io.stdout(`Using input: ${from}\n`)
        io.stdout(`Target URL: ${reference.url}\n`)
      },
    })

    io.stdout(`Extracted ${result.entryName} -> ${result.outputPath} (${result.bytes} bytes)\n`)
    if (result.summary) {
      io.stdout('Diagram info:\n')
      io.stdout(`  - Version: ${result.summary.version ?? 'N/A'}\n`)
      io.stdout(`  - Parts: ${result.summary.parts}\n`)
      io.stdout(`  - Connections: ${result.summary.connections}\n`)
    }
    io.stdout('\nDiagram download completed successfully!\n')
    return EXIT_OK
  } catch (err) {
    if (err instanceof SimwireError && err.kind === 'NoInput') {
      io.stderr(`${err.message}\n`)
      io.stdout('Usage: simwire diagram <file_or_url>\n')
      return EXIT_NOTHING_TO_DO
    }
    io.stderr(`${errorMessage(err)}\n`)
    const code = exitCodeFor(err)
    return code === EXIT_CANCELLED ? code : EXIT_FAILED
  }
}

function printProgress(io: IO, event: TelemetryEvent): void {
  switch (event.type) {
    case 'diagram_state_changed':
      if (event.payload.to === 'downloading') io.stdout('Downloading ZIP file...\n')
      if (event.payload.to === 'extracting') io.stdout(`Extracting ${DIAGRAM_FILE_NAME}...\n`)
      return
    case 'diagram_candidate_rejected':
      io.stdout(`  skipped ${event.payload.url} (${event.payload.reason})\n`)
      return
    case 'diagram_extracted':
      io.stdout(`Downloaded from ${event.payload.url}\n`)
      return
    default:
      return
  }
}
