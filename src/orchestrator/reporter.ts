import pino from 'pino'
import type {FailureKind, PipelineState, RecordStatus, Verdict} from '../types.js'

/**
 * Discriminated union of run events.
 *
 * Lifecycle:
 * 1. RUN_START - Run begins, leftovers of a crashed run are cleaned up
 * 2. For each spec:
 *    a. SPEC_SKIPPED - Already completed by a previous run (resume)
 *    b. SPEC_STATE - Pipeline entered a state
 *    c. SPEC_LOG - Agent or test output line
 *    d. SPEC_FINISHED - Terminal record written
 * 3. IMAGE_BUILD - Image reused, building, built or failed (shared by specs)
 * 4. RUN_SHUTDOWN - Shutdown requested, in-flight specs are draining
 * 5. RUN_FINISHED - Every in-flight spec settled and instances are destroyed
 */
export type RunStartEvent = {
  event: 'RUN_START';
  runId: string;
  concurrency: number;
  resumed: number;
}

export type SpecSkippedEvent = {
  event: 'SPEC_SKIPPED';
  runId: string;
  specId: string;
  sequence: number;
}

export type SpecStateEvent = {
  event: 'SPEC_STATE';
  runId: string;
  specId: string;
  sequence: number;
  state: PipelineState;
}

export type SpecLogEvent = {
  event: 'SPEC_LOG';
  runId: string;
  specId: string;
  source: string;
  stream: 'stdout' | 'stderr';
  line: string;
}

export type SpecFinishedEvent = {
  event: 'SPEC_FINISHED';
  runId: string;
  specId: string;
  sequence: number;
  status: RecordStatus;
  verdict: Verdict | null;
  failure?: {kind: FailureKind; message: string};
  durationMs: number;
}

export type ImageBuildEvent = {
  event: 'IMAGE_BUILD';
  runId: string;
  tag: string;
  phase: 'reused' | 'building' | 'built' | 'failed';
  attempt?: number;
  durationMs?: number;
  error?: string;
}

export type RunShutdownEvent = {
  event: 'RUN_SHUTDOWN';
  runId: string;
  gracePeriodMs: number;
}

export type RunFinishedEvent = {
  event: 'RUN_FINISHED';
  runId: string;
  resolved: number;
  unresolved: number;
  errors: number;
  aborted: number;
  skipped: number;
  durationMs: number;
  exitCode: number;
}

export type RunEvent =
  | RunStartEvent
  | SpecSkippedEvent
  | SpecStateEvent
  | SpecLogEvent
  | SpecFinishedEvent
  | ImageBuildEvent
  | RunShutdownEvent
  | RunFinishedEvent

/**
 * Interface for reporting run events.
 */
export type Reporter = {
  emit(event: RunEvent): void;
}

/**
 * Reporter that outputs structured JSON logs via pino.
 * Suitable for CI and log aggregation.
 */
export class ConsoleReporter implements Reporter {
  private readonly logger = pino({level: 'info'})

  emit(event: RunEvent): void {
    if (event.event === 'SPEC_LOG') {
      this.logger.debug(event)
      return
    }

    this.logger.info(event)
  }
}
