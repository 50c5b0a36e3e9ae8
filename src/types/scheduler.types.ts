export interface IntervalConfig {
  days?: number
  hours?: number
  minutes?: number
  seconds?: number
  runImmediately?: boolean
}

export interface JobRunInfo {
  time: string
  status: 'completed' | 'failed'
  error?: string
}

export interface JobStatus {
  name: string
  config: IntervalConfig
  lastRun: JobRunInfo | null
  nextRun: string | null
}
