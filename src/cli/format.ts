/**
 * Terminal rendering of run results.
 */
import chalk from "chalk";
import type { AttemptRecord, ConvergenceResult, RunStatus } from "../core/types.js";
import type { RunStatistics } from "../memory/sqlite.js";
import type { BatchSummary } from "../orchestrator.js";

export function statusLabel(status: RunStatus): string {
    switch (status) {
        case "success":
            return chalk.green.bold("SUCCESS");
        case "failure":
            return chalk.yellow.bold("FAILURE");
        case "error":
            return chalk.red.bold("ERROR");
    }
}

export function describeAttempt(record: AttemptRecord): string {
    const strategy = record.strategy ?? "initial";
    if (!record.outcome.success) {
        return `#${record.index} ${strategy}: ${chalk.red(record.outcome.errorKind)} after ${record.outcome.tries} tr${record.outcome.tries === 1 ? "y" : "ies"}`;
    }
    const overall = record.breakdown ? record.breakdown.overall.toFixed(3) : "n/a";
    const weakest = record.breakdown ? `, weakest ${record.breakdown.weakestDimension}` : "";
    return `#${record.index} ${strategy}: overall ${chalk.cyan(overall)}${weakest}`;
}

/** Multi-line summary of one result, for `p.note`. */
export function formatResult(result: ConvergenceResult): string {
    const lines = [
        `${statusLabel(result.status)}  ${chalk.bold(result.profileId)}  ${chalk.dim(result.runId)}`,
        result.reason,
        "",
        ...result.attempts.map(describeAttempt),
    ];
    const best = result.bestAttempt;
    if (best?.outcome.success) {
        lines.push("", chalk.bold("Best response:"), best.outcome.content);
    }
    return lines.join("\n");
}

export function formatSummary(summary: BatchSummary): string {
    const mean = (value: number | null): string => (value === null ? "n/a" : value.toFixed(3));
    return [
        `runs: ${summary.total}`,
        `${chalk.green("success")}: ${summary.counts.success}  ${chalk.yellow("failure")}: ${summary.counts.failure}  ${chalk.red("error")}: ${summary.counts.error}`,
        `success rate: ${(summary.successRate * 100).toFixed(1)}%`,
        `mean best overall: ${mean(summary.meanBestOverall)}`,
        `mean attempts to converge: ${mean(summary.meanAttemptsToConverge)}`,
    ].join("\n");
}

/**
 * The CLI records converged runs only, so a success rate or per-status
 * counts read from its database say nothing. Report what they can.
 */
export interface ConvergedRunStatistics {
    convergedRuns: number;
    meanAttemptsToConverge: number | null;
    meanBestOverall: number | null;
}

export function convergedRunStatistics(statistics: RunStatistics): ConvergedRunStatistics {
    return {
        convergedRuns: statistics.counts.success,
        meanAttemptsToConverge: statistics.meanAttemptsToConverge,
        meanBestOverall: statistics.meanBestOverall,
    };
}

export function formatStatistics(statistics: ConvergedRunStatistics): string {
    const mean = (value: number | null): string => (value === null ? "n/a" : value.toFixed(3));
    return [
        `converged runs recorded: ${statistics.convergedRuns}`,
        `mean attempts to converge: ${mean(statistics.meanAttemptsToConverge)}`,
        `mean best overall: ${mean(statistics.meanBestOverall)}`,
    ].join("\n");
}
