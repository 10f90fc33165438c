/**
 * Oracle contract — the only thing the core needs from the generative
 * text service: one raw exchange, with failures classified into a status
 * instead of thrown.
 */
import { APICallError, InvalidPromptError } from "ai";
import type { OracleRequest, TokenUsage, TransportErrorKind } from "../core/types.js";

/** Failure statuses an Oracle can report; empty content is judged by the Transport. */
export type OracleFailureStatus = Exclude<TransportErrorKind, "empty_content">;

export type OracleResponse =
    | { status: "ok"; content: string; usage: TokenUsage }
    | { status: OracleFailureStatus; message: string };

export interface OracleCallParams {
    temperature: number;
    maxOutputTokens: number;
    /** Aborted by the Transport Layer when its hard timeout fires. */
    signal: AbortSignal;
}

export interface Oracle {
    sendRaw(request: OracleRequest, params: OracleCallParams): Promise<OracleResponse>;
}

/** Statuses that reject the request itself. */
const MALFORMED_STATUSES: ReadonlySet<number> = new Set([400, 413, 422]);

/**
 * Map anything an Oracle call can throw onto a failure status.
 *
 *   429                          → rate_limited
 *   408 / 504, aborts            → timeout
 *   400 / 413 / 422, bad prompts → malformed_request (never retried)
 *   other statuses, network      → connection_error
 */
export function classifyOracleError(err: unknown): OracleFailureStatus {
    if (APICallError.isInstance(err)) {
        const status = err.statusCode;
        if (status === 429) return "rate_limited";
        if (status === 408 || status === 504) return "timeout";
        if (status !== undefined && MALFORMED_STATUSES.has(status)) return "malformed_request";
        return "connection_error";
    }
    if (InvalidPromptError.isInstance(err)) return "malformed_request";
    if (err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError")) {
        return "timeout";
    }
    return "connection_error";
}
