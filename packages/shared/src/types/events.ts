/**
 * Base interface for all pipeline events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Identifier of the top-level pipeline run */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/** Emitted when a pipeline round starts for a task */
export interface PipelineStarted extends BaseEvent {
  type: 'PipelineStarted';
  payload: {
    taskId: string;
    taskType: string;
    riskTag: string;
    profile: string;
    nCandidates: number;
  };
}

/** Emitted once per generation slot, whether it produced an artifact or an error */
export interface CandidateGenerated extends BaseEvent {
  type: 'CandidateGenerated';
  payload: {
    taskId: string;
    candidateId: number;
    temperature: number;
    seed: number;
    model: string;
    durationMs: number;
    error?: string;
  };
}

/** Emitted after every validator has reported on a candidate */
export interface CandidateValidated extends BaseEvent {
  type: 'CandidateValidated';
  payload: {
    taskId: string;
    candidateId: number;
    totalScore: number;
    allPassed: boolean;
    rulesRun: number;
    rulesFailed: number;
    cacheHits: number;
    durationMs: number;
  };
}

/** Emitted when the selector stamps a winner */
export interface CandidateSelected extends BaseEvent {
  type: 'CandidateSelected';
  payload: {
    taskId: string;
    candidateId: number;
    score: number;
    allPassed: boolean;
    poolSize: number;
  };
}

export interface CorrectionIterationStarted extends BaseEvent {
  type: 'CorrectionIterationStarted';
  payload: {
    taskId: string;
    iteration: number;
    maxIterations: number;
    hintCount: number;
  };
}

export interface CorrectionIterationFinished extends BaseEvent {
  type: 'CorrectionIterationFinished';
  payload: {
    taskId: string;
    iteration: number;
    score: number;
    allPassed: boolean;
    errorCount: number;
  };
}

/** Emitted when the second-opinion reviewer returns issues */
export interface ReviewCompleted extends BaseEvent {
  type: 'ReviewCompleted';
  payload: {
    taskId: string;
    model: string;
    issueCount: number;
    hasCritical: boolean;
    costUsd: number;
    durationMs: number;
  };
}

/** Emitted when a review was requested but not performed */
export interface ReviewSkipped extends BaseEvent {
  type: 'ReviewSkipped';
  payload: {
    taskId: string;
    reason: string;
  };
}

/** Emitted when a pipeline round has selected a winner */
export interface PipelineFinished extends BaseEvent {
  type: 'PipelineFinished';
  payload: {
    taskId: string;
    bestCandidateId: number;
    bestScore: number;
    allPassed: boolean;
    totalMs: number;
  };
}

/** Emitted when a provider API request starts */
export interface ProviderRequestStarted extends BaseEvent {
  type: 'ProviderRequestStarted';
  payload: {
    provider: string;
    model: string;
  };
}

/**
 * Emitted when a provider API request completes (success or failure).
 */
export interface ProviderRequestFinished extends BaseEvent {
  type: 'ProviderRequestFinished';
  payload: {
    provider: string;
    durationMs: number;
    success: boolean;
    error?: string;
    /** Number of retry attempts made (0 = succeeded on first try) */
    retries: number;
  };
}

/** Emitted when an external static-check tool exits, times out, or is missing */
export interface ExternalToolFinished extends BaseEvent {
  type: 'ExternalToolFinished';
  payload: {
    tool: string;
    command: string;
    outcome: 'exited' | 'timeout' | 'not_found';
    exitCode: number | null;
    durationMs: number;
  };
}

export type PipelineEvent =
  | PipelineStarted
  | CandidateGenerated
  | CandidateValidated
  | CandidateSelected
  | CorrectionIterationStarted
  | CorrectionIterationFinished
  | ReviewCompleted
  | ReviewSkipped
  | PipelineFinished
  | ProviderRequestStarted
  | ProviderRequestFinished
  | ExternalToolFinished;
