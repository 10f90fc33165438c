/**
 * Attune — Public API
 *
 * An adaptive convergence loop that iteratively steers a language model's
 * output toward a target behavioural profile.
 */

// Core
export { ConvergenceController, buildResult, expectConverged, silentLogger, DIMENSIONS } from "./core/index.js";
export type {
    ConvergenceControllerOptions,
    ConvergenceEvents,
    RunOptions,
    Logger,
    LogFields,
    Dimension,
    TransportErrorKind,
    StrategyTag,
    TokenUsage,
    OracleRequest,
    Outcome,
    SuccessfulOutcome,
    FailedOutcome,
    ScoreBreakdown,
    AttemptRecord,
    RunStatus,
    ConvergenceResult,
    ProvenanceSink,
} from "./core/index.js";

// Scoring & mutation
export { score, weakestOf, weightedOverall, mutate, selectStrategy, composeInitialRequest } from "./engine/index.js";
export type { Scorer, ScoreOptions, Mutator, MutationResult, MutationStrategy } from "./engine/index.js";

// Schemas
export {
    AttuneConfig,
    AttuneConfigOverrides,
    DimensionWeights,
    PatternSets,
    ProfileFraming,
    TargetProfile,
    ProfileCatalog,
    BatchPairInput,
    BatchFile,
} from "./schemas/index.js";
export type { TransportSettings } from "./schemas/index.js";

// Profiles
export { InMemoryProfileStore, parseProfileCatalog, loadProfileCatalog, defineProfile } from "./profiles/index.js";
export type { ProfileStore } from "./profiles/index.js";

// LLM
export {
    LLMClient,
    resolveLanguageModel,
    ReliableTransport,
    backoffDelay,
    isRetryable,
    classifyOracleError,
} from "./llm/index.js";
export type { Oracle, OracleResponse, OracleCallParams, Transport, TransportStats } from "./llm/index.js";

// Memory
export { SqliteProvenanceStore } from "./memory/index.js";
export type { StoredRun, StoredAttempt, RunQuery, RunStatistics } from "./memory/index.js";

// Errors
export {
    ProfileNotFoundError,
    InvalidProfileError,
    ConvergenceExhaustedError,
    BatchTaskError,
} from "./errors/index.js";

// Orchestration
export { runAcrossProfiles, runBatch, summarizeBatch } from "./orchestrator.js";
export type {
    BatchPair,
    BatchSummary,
    MultiProfileOutcome,
    RunAcrossProfilesOptions,
    RunBatchOptions,
} from "./orchestrator.js";
