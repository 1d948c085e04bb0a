/**
 * Outcome of a job's most recent run
 */
export interface JobRunInfo {
  /** Epoch ms when the run finished */
  time: number
  status: 'completed' | 'failed'
  error?: string
  durationMs: number
}

/**
 * Type for configuration of interval jobs
 */
export interface IntervalConfig {
  hours?: number
  minutes?: number
  seconds?: number
  runImmediately?: boolean
}

/**
 * Snapshot of one registered job, as shown on the status endpoint
 */
export interface JobStatus {
  name: string
  intervalSeconds: number
  running: boolean
  lastRun: JobRunInfo | null
}
