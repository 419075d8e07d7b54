/**
 * Error kinds raised by the setup and diagram paths.
 *
 * Every failure the CLI can report is a SimwireError with a `kind`; the CLI maps
 * kinds to exit codes in one place (see exitCodeFor).
 */

export type SimwireErrorKind =
  | 'NoProjectRootFound'
  | 'NoFirmwareFilesFound'
  | 'NoCompleteGroupsFound'
  | 'DuplicateArtifact'
  | 'InvalidSelection'
  | 'SelectionCancelled'
  | 'ConfigWriteFailed'
  | 'InvalidConfig'
  | 'InvalidReference'
  | 'FileNotFound'
  | 'DownloadFailed'
  | 'ArchiveCorrupt'
  | 'TargetEntryNotFound'
  | 'Cancelled'
  | 'NoInput'
  | 'UsageError'

export class SimwireError extends Error {
  readonly kind: SimwireErrorKind

  constructor(kind: SimwireErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'SimwireError'
    this.kind = kind
  }
}

export function isSimwireError(err: unknown, kind?: SimwireErrorKind): err is SimwireError {
  return err instanceof SimwireError && (kind === undefined || err.kind === kind)
}

export function cancelledError(): SimwireError {
  return new SimwireError('Cancelled', 'Operation cancelled by user')
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw cancelledError()
}

// ============================================================================
// Exit codes
// ============================================================================

export const EXIT_OK = 0
export const EXIT_FAILED = 1
export const EXIT_NOTHING_TO_DO = 2
export const EXIT_CANCELLED = 130

export function exitCodeFor(err: unknown): number {
  if (!(err instanceof SimwireError)) return EXIT_FAILED
  switch (err.kind) {
    case 'SelectionCancelled':
    case 'Cancelled':
      return EXIT_CANCELLED
    case 'NoInput':
    case 'UsageError':
      return EXIT_NOTHING_TO_DO
    default:
      return EXIT_FAILED
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

export function isNotFoundError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}
