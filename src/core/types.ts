/**
 * Domain types shared by the transport, scoring, mutation and control layers.
 *
 * Every value here is immutable once produced: requests form a lineage of
 * frozen snapshots, outcomes are written once per attempt, and a
 * ConvergenceResult is built exactly once when the loop terminates.
 */

/** The fixed set of scoring dimensions, in tie-break order. */
export const DIMENSIONS = ["tone", "approach", "cadence", "lexical", "structure"] as const;
export type Dimension = (typeof DIMENSIONS)[number];

/** Failure classes the Transport Layer can report. */
export type TransportErrorKind =
    | "rate_limited"
    | "timeout"
    | "connection_error"
    | "malformed_request"
    | "empty_content";

/** Tag naming the mutation strategy that produced a request. */
export type StrategyTag =
    | `${Dimension}_amplifier`
    | "comprehensive_amplifier"
    | "maximal_compliance";

export interface TokenUsage {
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
}

/** One outgoing request. `generation` counts mutations applied so far. */
export interface OracleRequest {
    readonly prompt: string;
    readonly directive?: string;
    readonly generation: number;
    readonly strategy?: StrategyTag;
}

interface OutcomeBase {
    readonly usage: TokenUsage;
    readonly latencyMs: number;
    /** Oracle calls spent inside the Transport Layer for this outcome. */
    readonly tries: number;
}

export interface SuccessfulOutcome extends OutcomeBase {
    readonly success: true;
    readonly content: string;
}

export interface FailedOutcome extends OutcomeBase {
    readonly success: false;
    readonly errorKind: TransportErrorKind;
    readonly message: string;
}

export type Outcome = SuccessfulOutcome | FailedOutcome;

export interface ScoreBreakdown {
    readonly dimensions: Readonly<Record<Dimension, number>>;
    readonly overall: number;
    readonly weakestDimension: Dimension;
    readonly evidence: readonly string[];
    readonly wordCount: number;
}

export interface AttemptRecord {
    /** 1-based attempt number within the run. */
    readonly index: number;
    readonly request: OracleRequest;
    readonly outcome: Outcome;
    /** Null when the outcome failed: the attempt counts as a zero score. */
    readonly breakdown: ScoreBreakdown | null;
    readonly strategy: StrategyTag | null;
    readonly timestamp: string;
}

export type RunStatus = "success" | "failure" | "error";

export interface ConvergenceResult {
    readonly runId: string;
    readonly profileId: string;
    readonly scenario: string;
    readonly status: RunStatus;
    readonly bestAttempt: AttemptRecord | null;
    readonly attempts: readonly AttemptRecord[];
    readonly totalAttempts: number;
    readonly successfulAttempt: number | null;
    readonly threshold: number;
    readonly elapsedMs: number;
    readonly reason: string;
}

export function emptyUsage(): TokenUsage {
    return { inputTokens: 0, outputTokens: 0, totalTokens: 0 };
}

export function addUsage(a: TokenUsage, b: TokenUsage): TokenUsage {
    return {
        inputTokens: a.inputTokens + b.inputTokens,
        outputTokens: a.outputTokens + b.outputTokens,
        totalTokens: a.totalTokens + b.totalTokens,
    };
}

/** Durable record store for completed runs. Best-effort: failures are logged, never surfaced. */
export interface ProvenanceSink {
    persist(result: ConvergenceResult): Promise<void> | void;
}
