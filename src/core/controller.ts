/**
 * ConvergenceController — the attempt state machine for one
 * (profile, scenario) pair.
 *
 *   INIT → SEND → EVALUATE → DECIDE → { MUTATE → SEND | TERMINAL }
 *
 * Transport failures and quality shortfalls share a single attempt counter,
 * and the loop has no wall-clock deadline: `max_attempts` is the only
 * budget. Each Transport call carries its own hard timeout instead.
 */
import { EventEmitter } from "events";
import { setTimeout as delay } from "timers/promises";
import { v4 as uuidv4 } from "uuid";
import type { AttuneConfig } from "../schemas/config.js";
import type { TargetProfile } from "../schemas/profile.js";
import type { ProfileStore } from "../profiles/store.js";
import type { Transport } from "../llm/transport.js";
import { score as defaultScorer } from "../engine/scorer.js";
import type { Scorer } from "../engine/scorer.js";
import { composeInitialRequest, mutate as defaultMutator } from "../engine/mutator.js";
import type { Mutator } from "../engine/mutator.js";
import { ConvergenceExhaustedError, ProfileNotFoundError } from "../errors/index.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import type {
    AttemptRecord,
    ConvergenceResult,
    OracleRequest,
    ProvenanceSink,
    RunStatus,
    ScoreBreakdown,
} from "./types.js";

/** Events emitted by the ConvergenceController. */
export interface ConvergenceEvents {
    "run:start": [{ runId: string; profileId: string; scenario: string }];
    "attempt:start": [{ runId: string; index: number; request: OracleRequest }];
    "attempt:complete": [{ runId: string; record: AttemptRecord }];
    "run:complete": [{ result: ConvergenceResult }];
}

export interface ConvergenceControllerOptions {
    transport: Transport;
    profiles: ProfileStore;
    config: AttuneConfig;
    scorer?: Scorer;
    mutator?: Mutator;
    /** Receives successful runs only. */
    sink?: ProvenanceSink;
    logger?: Logger;
    /** Inter-attempt pause; injectable so tests need not wait. */
    sleep?: (ms: number) => Promise<void>;
}

export interface RunOptions {
    /** Checked at the top of every iteration and after each send; never preemptive. */
    signal?: AbortSignal;
}

interface ScoredAttempt {
    record: AttemptRecord;
    breakdown: ScoreBreakdown;
}

interface ResultFields {
    runId?: string;
    profileId: string;
    scenario: string;
    status: RunStatus;
    best?: ScoredAttempt | null;
    attempts?: readonly AttemptRecord[];
    threshold: number;
    startedAt: number;
    reason: string;
}

const formatScore = (value: number): string => value.toFixed(3);

/** Build the one ConvergenceResult a run produces. */
export function buildResult(fields: ResultFields): ConvergenceResult {
    const attempts = Object.freeze([...(fields.attempts ?? [])]);
    const best = fields.best ?? null;
    return Object.freeze({
        runId: fields.runId ?? uuidv4(),
        profileId: fields.profileId,
        scenario: fields.scenario,
        status: fields.status,
        bestAttempt: best ? best.record : null,
        attempts,
        totalAttempts: attempts.length,
        successfulAttempt: fields.status === "success" && best ? best.record.index : null,
        threshold: fields.threshold,
        elapsedMs: Date.now() - fields.startedAt,
        reason: fields.reason,
    });
}

/**
 * Narrow a result to a converged one, or throw ConvergenceExhaustedError
 * carrying the run's reason.
 */
export function expectConverged(result: ConvergenceResult): ConvergenceResult & { status: "success" } {
    if (result.status === "success") {
        return { ...result, status: "success" };
    }
    throw new ConvergenceExhaustedError(result.status, result.reason);
}

const defaultSleep = async (ms: number): Promise<void> => {
    await delay(ms);
};

export class ConvergenceController extends EventEmitter {
    public readonly config: AttuneConfig;

    private transport: Transport;
    private profiles: ProfileStore;
    private scorer: Scorer;
    private mutator: Mutator;
    private sink?: ProvenanceSink;
    private logger: Logger;
    private sleep: (ms: number) => Promise<void>;

    constructor(opts: ConvergenceControllerOptions) {
        super();
        this.transport = opts.transport;
        this.profiles = opts.profiles;
        this.config = opts.config;
        this.scorer = opts.scorer ?? defaultScorer;
        this.mutator = opts.mutator ?? defaultMutator;
        this.sink = opts.sink;
        this.logger = opts.logger ?? silentLogger;
        this.sleep = opts.sleep ?? defaultSleep;
    }

    /**
     * Drive one run to a terminal state. Resolves with exactly one
     * ConvergenceResult; only an unexpected fault (a throwing scorer or
     * mutator) rejects.
     */
    async run(profileId: string, scenario: string, options: RunOptions = {}): Promise<ConvergenceResult> {
        const { signal } = options;
        const { max_attempts: maxAttempts, threshold } = this.config;
        const runId = uuidv4();
        const startedAt = Date.now();
        const base = { runId, profileId, scenario, threshold, startedAt };

        this.emit("run:start", { runId, profileId, scenario });
        this.logger.info("run.start", { runId, profileId, maxAttempts, threshold });

        // --- INIT ---
        let profile: TargetProfile;
        try {
            profile = await this.profiles.getProfile(profileId);
        } catch (err) {
            if (err instanceof ProfileNotFoundError) {
                return this.finish(buildResult({ ...base, status: "error", reason: err.message }));
            }
            throw err;
        }

        const attempts: AttemptRecord[] = [];
        let best: ScoredAttempt | null = null;
        let request = composeInitialRequest(profile, scenario);
        let cancelled = false;

        for (let index = 1; index <= maxAttempts; index++) {
            if (signal?.aborted) {
                cancelled = true;
                break;
            }

            // --- SEND ---
            this.emit("attempt:start", { runId, index, request });
            const outcome = await this.transport.send(request, this.config);
            if (signal?.aborted) {
                // The in-flight call was allowed to finish; its result is discarded.
                cancelled = true;
                break;
            }

            // --- EVALUATE ---
            const breakdown = outcome.success
                ? this.scorer(outcome.content, profile, { minWords: this.config.min_words })
                : null;
            const record: AttemptRecord = Object.freeze({
                index,
                request,
                outcome,
                breakdown,
                strategy: request.strategy ?? null,
                timestamp: new Date().toISOString(),
            });
            attempts.push(record);
            if (breakdown && (!best || breakdown.overall > best.breakdown.overall)) {
                best = { record, breakdown };
            }
            this.emit("attempt:complete", { runId, record });
            this.logger.debug("attempt.complete", {
                runId,
                index,
                success: outcome.success,
                overall: breakdown?.overall ?? 0,
                errorKind: outcome.success ? undefined : outcome.errorKind,
            });

            // --- DECIDE ---
            if (breakdown && breakdown.overall >= threshold) {
                const result = buildResult({
                    ...base,
                    status: "success",
                    best,
                    attempts,
                    reason: `Converged on attempt ${index}: overall ${formatScore(breakdown.overall)} ≥ threshold ${threshold}`,
                });
                await this.persistBestEffort(result);
                return this.finish(result);
            }
            if (index === maxAttempts) break;

            // --- MUTATE ---
            // A transport failure leaves nothing to score against, so the same request is resent.
            if (breakdown) {
                request = this.mutator(request, profile, breakdown, index).request;
            }
            await this.sleep(this.config.inter_attempt_delay_ms);
        }

        if (cancelled) {
            return this.finish(buildResult({
                ...base,
                status: "error",
                best,
                attempts,
                reason: `Cancelled after ${attempts.length} attempt(s)`,
            }));
        }

        if (best) {
            return this.finish(buildResult({
                ...base,
                status: "failure",
                best,
                attempts,
                reason:
                    `Best overall ${formatScore(best.breakdown.overall)} (attempt ${best.record.index}) ` +
                    `stayed below threshold ${threshold} after ${attempts.length} attempts; ` +
                    `weakest dimension: ${best.breakdown.weakestDimension}`,
            }));
        }

        return this.finish(buildResult({
            ...base,
            status: "error",
            attempts,
            reason: this.transportFailureReason(attempts),
        }));
    }

    private transportFailureReason(attempts: readonly AttemptRecord[]): string {
        const last = attempts[attempts.length - 1];
        const detail = last && !last.outcome.success
            ? `${last.outcome.errorKind} (${last.outcome.message})`
            : "unknown";
        return `No valid response in ${attempts.length} attempt(s); last transport error: ${detail}`;
    }

    private async persistBestEffort(result: ConvergenceResult): Promise<void> {
        if (!this.sink) return;
        try {
            await this.sink.persist(result);
        } catch (err) {
            this.logger.error("provenance.persist_failed", {
                runId: result.runId,
                message: err instanceof Error ? err.message : String(err),
            });
        }
    }

    private finish(result: ConvergenceResult): ConvergenceResult {
        this.logger.info("run.complete", {
            runId: result.runId,
            status: result.status,
            totalAttempts: result.totalAttempts,
            reason: result.reason,
        });
        this.emit("run:complete", { result });
        return result;
    }
}
