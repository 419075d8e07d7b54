import type { ProjectType } from '../firmware.js'
import type { RetrievalState } from '../diagram.js'

export type TelemetryEvent =
  | {
      type: 'firmware_scan_completed'
      payload: { root: string; projectType: ProjectType; files: number; groups: number; duplicates: number }
    }
  | {
      type: 'firmware_group_selected'
      payload: { key: string; via: 'single' | 'index' | 'latest' }
    }
  | {
      type: 'config_written'
      payload: { path: string; firmware: string; elf: string }
    }
  | {
      type: 'diagram_state_changed'
      payload: { projectId: string; from: RetrievalState; to: RetrievalState }
    }
  | {
      type: 'diagram_candidate_rejected'
      payload: { url: string; reason: string }
    }
  | {
      type: 'diagram_extracted'
      payload: { url: string; entry: string; bytes: number }
    }

export interface TelemetrySink {
  emit(event: TelemetryEvent): void
}

export class NoopTelemetrySink implements TelemetrySink {
  emit(_event: TelemetryEvent): void {}
}

export class ConsoleTelemetrySink implements TelemetrySink {
  emit(event: TelemetryEvent): void {
    console.log(JSON.stringify({ ts: Date.now(), ...event }))
  }
}

export class CompositeTelemetrySink implements TelemetrySink {
  readonly #sinks: readonly TelemetrySink[]

  constructor(sinks: readonly TelemetrySink[]) {
    this.#sinks = sinks
  }

  emit(event: TelemetryEvent): void {
    for (const sink of this.#sinks) sink.emit(event)
  }
}
