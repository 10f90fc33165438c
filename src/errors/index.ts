/**
 * Custom Error Classes — typed failures surfaced by the convergence loop.
 *
 * Transport failures are deliberately absent here: they never throw, they
 * travel inside `Outcome` values as a `TransportErrorKind`.
 */
import type { RunStatus } from "../core/types.js";

/**
 * Thrown by a ProfileStore when asked for an id it does not hold.
 * The controller turns it into an immediate `error` result.
 */
export class ProfileNotFoundError extends Error {
    public readonly profileId: string;

    constructor(profileId: string) {
        super(`Profile "${profileId}" not found.`);
        this.name = "ProfileNotFoundError";
        this.profileId = profileId;
    }
}

/**
 * Thrown at load time when a profile catalog is missing weights, pattern
 * sets or framing, or carries a pattern that does not compile.
 */
export class InvalidProfileError extends Error {
    public readonly issues: string[];

    constructor(source: string, issues: string[]) {
        super(`Invalid profile catalog "${source}": ${issues.join("; ")}`);
        this.name = "InvalidProfileError";
        this.issues = issues;
    }
}

/**
 * Thrown by `expectConverged()` when a run spent its attempt budget
 * without reaching the threshold, or never got a valid response.
 */
export class ConvergenceExhaustedError extends Error {
    public readonly status: Exclude<RunStatus, "success">;
    public readonly reason: string;

    constructor(status: Exclude<RunStatus, "success">, reason: string) {
        super(`Run did not converge (${status}): ${reason}`);
        this.name = "ConvergenceExhaustedError";
        this.status = status;
        this.reason = reason;
    }
}

/**
 * Wraps an unexpected failure inside one batch task. Contained per pair:
 * the Batch Coordinator turns it into that pair's `error` result.
 */
export class BatchTaskError extends Error {
    public readonly pairIndex: number;
    public readonly profileId: string;

    constructor(pairIndex: number, profileId: string, cause: unknown) {
        const detail = cause instanceof Error ? cause.message : String(cause);
        super(`Batch task #${pairIndex} (${profileId}) failed: ${detail}`, { cause });
        this.name = "BatchTaskError";
        this.pairIndex = pairIndex;
        this.profileId = profileId;
    }
}
