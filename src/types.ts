/**
 * How to prepare the execution image of a repository.
 */
export type EnvironmentDescriptor = {
  /** Base image the repository is cloned into (defaults to config `image.baseImage`) */
  baseImage?: string;
  /** Shell commands run in the checkout to install dependencies */
  install: string[];
  /** Environment variables baked into the image */
  env?: Record<string, string>;
  /** Test command prefix, each test id is appended (defaults to pytest) */
  testCommand?: string[];
  /** Checkout location inside the image */
  workdir?: string;
}

/**
 * One unit of evaluation work. Frozen once loaded.
 */
export type EvaluationSpec = {
  id: string;
  /** Clone URL, or `owner/name` for GitHub repositories */
  repository: string;
  baseCommit: string;
  environment: EnvironmentDescriptor;
  /** Task description handed to the agent */
  prompt: string;
  /** Unified diff adding or adjusting tests */
  testPatch: string;
  /** Reference change, only used to derive test selection */
  goldPatch?: string;
  failToPass?: string[];
  passToPass?: string[];
  /** Agent name overriding the run default */
  agent?: string;
}

export type PatchOutcome = 'Applied' | 'Conflict' | 'NoOp' | 'Malformed'

export type PatchApplication = {
  outcome: PatchOutcome;
  filesChanged: string[];
  detail?: string;
}

export type TestStatus = 'Passed' | 'Failed' | 'Errored' | 'TimedOut' | 'Skipped'

export type TestPhase = 'pre' | 'post'

export type TestSelection = {
  failToPass: string[];
  passToPass: string[];
  source: 'declared' | 'derived';
}

export type PipelineState =
  | 'Queued'
  | 'ImagePreparing'
  | 'AgentRunning'
  | 'PatchValidating'
  | 'TestingPre'
  | 'TestingPost'
  | 'Scored'
  | 'Done'
  | 'Aborted'
  | 'Failed'

/** Pipeline states that do work and are timed. */
export type StageName = 'ImagePreparing' | 'AgentRunning' | 'PatchValidating' | 'TestingPre' | 'TestingPost'

export type Verdict = 'Resolved' | 'Unresolved' | 'Error'

export type RecordStatus = 'Done' | 'Failed' | 'Aborted'

export type AgentFailureReason = 'Timeout' | 'CrashExit' | 'NoPatchProduced'

export type FailureKind =
  | AgentFailureReason
  | 'PatchConflict'
  | 'PatchMalformed'
  | 'PreconditionViolation'
  | 'NoTestsSelected'
  | 'BuildFailure'
  | 'BuildTimeout'
  | 'EnvironmentFailure'
  | 'InvalidSpec'
  | 'Cancelled'
  | 'InternalError'

export type ResultRecord = {
  specId: string;
  /** Position of the spec in the input sequence */
  sequence: number;
  runId: string;
  status: RecordStatus;
  /** Null only when the spec was aborted */
  verdict: Verdict | null;
  /** Last pipeline state reached before the terminal one */
  lastState: PipelineState;
  image?: string;
  agent?: {
    name: string;
    durationMs: number;
    failureReason?: AgentFailureReason;
    /** Tokens reported by the agent, when its usage format is configured */
    usage?: {
      inputTokens?: number;
      outputTokens?: number;
      totalTokens?: number;
    };
  };
  patches: {
    test?: PatchApplication;
    candidate?: PatchApplication;
  };
  selection?: TestSelection;
  tests: Record<TestPhase, Record<string, TestStatus>>;
  timings: Partial<Record<StageName, number>>;
  failure?: {
    kind: FailureKind;
    message: string;
  };
  startedAt: string;
  finishedAt: string;
}

/**
 * Resource limits applied when an instance is created.
 */
export type ResourceLimits = {
  /** Fractional CPU count (`--cpus`) */
  cpus?: number;
  /** Memory limit in Docker notation, e.g. `4g` */
  memory?: string;
  /** GPU request (`--gpus`), e.g. `all` or `device=0` */
  gpus?: string;
  /** Exported as CUDA_VISIBLE_DEVICES inside the instance */
  visibleDevices?: string;
}
