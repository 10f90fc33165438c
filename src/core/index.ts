export { ConvergenceController, buildResult, expectConverged } from "./controller.js";
export type { ConvergenceControllerOptions, ConvergenceEvents, RunOptions } from "./controller.js";
export { silentLogger } from "./logger.js";
export type { Logger, LogFields } from "./logger.js";
export { DIMENSIONS, emptyUsage, addUsage } from "./types.js";
export type {
    Dimension,
    TransportErrorKind,
    StrategyTag,
    TokenUsage,
    OracleRequest,
    SuccessfulOutcome,
    FailedOutcome,
    Outcome,
    ScoreBreakdown,
    AttemptRecord,
    RunStatus,
    ConvergenceResult,
    ProvenanceSink,
} from "./types.js";
