/** Phases a scan or classification pass moves through. */
export type ProgressPhase =
  | "idle"
  | "resetting"
  | "manifests"
  | "scanning"
  | "loading"
  | "partitioning"
  | "writing"
  | "done"
  | "error"

/** A point-in-time view of a long-running operation. */
export interface ProgressEvent {
  phase: ProgressPhase
  /** Items processed in the current phase. */
  current: number
  /** Items expected in the current phase (0 when unknown). */
  total: number
  /** Project, partition or label currently being worked on. */
  item?: string
  /** Free-form status line. */
  message?: string
}

export type ProgressListener = (event: ProgressEvent) => void

const IDLE: ProgressEvent = { phase: "idle", current: 0, total: 0 }

/**
 * Progress handle passed explicitly into scans and classification passes.
 *
 * Consumers either subscribe for push updates or poll `snapshot()`. Each
 * operation gets its own channel, so two runs never share progress state.
 */
export class ProgressChannel {
  private listeners = new Set<ProgressListener>()
  private latest: ProgressEvent = IDLE

  /** Registers a listener and returns a function that removes it. */
  subscribe(listener: ProgressListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  emit(event: ProgressEvent): void {
    this.latest = { ...event }
    for (const listener of [...this.listeners]) {
      listener(this.latest)
    }
  }

  /** Most recent event, or an idle event before anything was emitted. */
  snapshot(): ProgressEvent {
    return { ...this.latest }
  }

  /** Integer percentage of the current phase; 100 once done. */
  percentage(): number {
    if (this.latest.phase === "done") return 100
    if (this.latest.total <= 0) return 0
    return Math.floor((this.latest.current / this.latest.total) * 100)
  }
}
