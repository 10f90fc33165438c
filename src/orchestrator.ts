/**
 * Batch Coordinator — runs many (profile, scenario) pairs under a shared
 * concurrency bound.
 *
 * Every pair gets its own ConvergenceController; the only state shared
 * between tasks is the read-only ProfileStore, the Transport and the
 * optional sink. Results come back in submission order.
 *
 * `runAcrossProfiles` is the sequential sibling: one scenario, many profiles.
 */
import pLimit from "p-limit";
import { ConvergenceController, buildResult } from "./core/controller.js";
import type { ConvergenceControllerOptions } from "./core/controller.js";
import { silentLogger } from "./core/logger.js";
import type { ConvergenceResult, RunStatus } from "./core/types.js";
import { BatchTaskError } from "./errors/index.js";

export interface BatchPair {
    profileId: string;
    scenario: string;
}

export interface RunBatchOptions {
    pairs: readonly BatchPair[];
    /** Upper bound on concurrently running pairs. */
    maxConcurrent: number;
    /** Shared wiring for the per-pair controllers. */
    controller: ConvergenceControllerOptions;
    /** Callback for progress reporting as each pair terminates. */
    onRunComplete?: (result: ConvergenceResult, pairIndex: number) => void;
    signal?: AbortSignal;
}

export interface BatchSummary {
    total: number;
    counts: Record<RunStatus, number>;
    /** Share of runs that converged, 0 for an empty batch. */
    successRate: number;
    /** Mean best overall score over runs that produced at least one scored attempt. */
    meanBestOverall: number | null;
    /** Mean attempts spent by the runs that converged. */
    meanAttemptsToConverge: number | null;
}

/**
 * Run every pair to a terminal state. Never rejects because of one pair:
 * a task that throws becomes that pair's `error` result.
 */
export async function runBatch(options: RunBatchOptions): Promise<ConvergenceResult[]> {
    const { pairs, maxConcurrent, controller: wiring, onRunComplete, signal } = options;
    const logger = wiring.logger ?? silentLogger;
    const limit = pLimit(maxConcurrent);

    // One slot per pair; each task writes only its own.
    const results = new Array<ConvergenceResult>(pairs.length);

    logger.info("batch.start", { pairs: pairs.length, maxConcurrent });

    const tasks = pairs.map((pair, pairIndex) =>
        limit(async () => {
            const startedAt = Date.now();
            let result: ConvergenceResult;
            try {
                const controller = new ConvergenceController(wiring);
                result = await controller.run(pair.profileId, pair.scenario, { signal });
            } catch (err) {
                const failure = new BatchTaskError(pairIndex, pair.profileId, err);
                logger.error("batch.task_failed", { pairIndex, profileId: pair.profileId, message: failure.message });
                result = buildResult({
                    profileId: pair.profileId,
                    scenario: pair.scenario,
                    status: "error",
                    threshold: wiring.config.threshold,
                    startedAt,
                    reason: failure.message,
                });
            }
            results[pairIndex] = result;
            try {
                onRunComplete?.(result, pairIndex);
            } catch (err) {
                logger.error("batch.progress_failed", {
                    pairIndex,
                    message: err instanceof Error ? err.message : String(err),
                });
            }
        }),
    );

    await Promise.all(tasks);

    logger.info("batch.complete", { ...summarizeBatch(results).counts });
    return results;
}

export interface RunAcrossProfilesOptions {
    scenario: string;
    /** Profiles to run, in order. Defaults to every profile in the store. */
    profileIds?: readonly string[];
    /** Stop after the first run that does not converge. */
    requireAllSuccess?: boolean;
    controller: ConvergenceControllerOptions;
    onRunComplete?: (result: ConvergenceResult, index: number) => void;
    signal?: AbortSignal;
}

export interface MultiProfileOutcome {
    /** One result per profile actually run, in run order. */
    results: ConvergenceResult[];
    /** True when `requireAllSuccess` cut the sequence short. */
    stoppedEarly: boolean;
}

/**
 * Run one scenario against several profiles, one after another. Unlike
 * `runBatch` the runs are sequential, so `requireAllSuccess` can skip the
 * profiles after a miss.
 */
export async function runAcrossProfiles(options: RunAcrossProfilesOptions): Promise<MultiProfileOutcome> {
    const { scenario, requireAllSuccess = false, controller: wiring, onRunComplete, signal } = options;
    const logger = wiring.logger ?? silentLogger;

    const profileIds =
        options.profileIds && options.profileIds.length > 0
            ? [...options.profileIds]
            : (await wiring.profiles.listProfiles()).map((profile) => profile.id);

    logger.info("multi.start", { profiles: profileIds.length, requireAllSuccess });

    const results: ConvergenceResult[] = [];
    let stoppedEarly = false;

    for (const [index, profileId] of profileIds.entries()) {
        const startedAt = Date.now();
        let result: ConvergenceResult;
        try {
            result = await new ConvergenceController(wiring).run(profileId, scenario, { signal });
        } catch (err) {
            const failure = new BatchTaskError(index, profileId, err);
            logger.error("batch.task_failed", { pairIndex: index, profileId, message: failure.message });
            result = buildResult({
                profileId,
                scenario,
                status: "error",
                threshold: wiring.config.threshold,
                startedAt,
                reason: failure.message,
            });
        }
        results.push(result);
        try {
            onRunComplete?.(result, index);
        } catch (err) {
            logger.error("batch.progress_failed", {
                pairIndex: index,
                message: err instanceof Error ? err.message : String(err),
            });
        }

        if (result.status !== "success" && requireAllSuccess && index < profileIds.length - 1) {
            stoppedEarly = true;
            logger.warn("multi.stopped_early", { profileId, status: result.status, skipped: profileIds.length - index - 1 });
            break;
        }
    }

    logger.info("multi.complete", { run: results.length, converged: results.filter((r) => r.status === "success").length });
    return { results, stoppedEarly };
}

const meanOf = (values: number[]): number | null =>
    values.length === 0 ? null : values.reduce((sum, v) => sum + v, 0) / values.length;

export function summarizeBatch(results: readonly ConvergenceResult[]): BatchSummary {
    const counts: Record<RunStatus, number> = { success: 0, failure: 0, error: 0 };
    const bestScores: number[] = [];
    const convergedAttempts: number[] = [];

    for (const result of results) {
        counts[result.status]++;
        const breakdown = result.bestAttempt?.breakdown;
        if (breakdown) bestScores.push(breakdown.overall);
        if (result.status === "success") convergedAttempts.push(result.totalAttempts);
    }

    return {
        total: results.length,
        counts,
        successRate: results.length === 0 ? 0 : counts.success / results.length,
        meanBestOverall: meanOf(bestScores),
        meanAttemptsToConverge: meanOf(convergedAttempts),
    };
}
