/**
 * Transport Layer — one logical request/response against the Oracle, with
 * bounded reliability retries.
 *
 * `send()` never rejects. Every failure mode resolves to an Outcome with
 * `success: false` and a TransportErrorKind, after the retry budget for the
 * call is spent (or immediately, for a malformed request).
 */
import { setTimeout as delay } from "timers/promises";
import type { Oracle, OracleResponse } from "./oracle.js";
import { classifyOracleError } from "./oracle.js";
import type { TransportSettings } from "../schemas/config.js";
import type { Logger } from "../core/logger.js";
import { silentLogger } from "../core/logger.js";
import { addUsage, emptyUsage } from "../core/types.js";
import type {
    FailedOutcome,
    OracleRequest,
    Outcome,
    SuccessfulOutcome,
    TokenUsage,
    TransportErrorKind,
} from "../core/types.js";

export interface Transport {
    send(request: OracleRequest, config: TransportSettings): Promise<Outcome>;
}

export interface TransportStats {
    calls: number;
    retries: number;
    failures: Partial<Record<TransportErrorKind, number>>;
}

export interface ReliableTransportOptions {
    oracle: Oracle;
    logger?: Logger;
    /** Backoff sleep; injectable so tests can record delays instead of waiting. */
    sleep?: (ms: number) => Promise<void>;
}

/**
 * Delay before the next try, given the failure class and the 1-based try
 * that just failed. Rate limiting backs off exponentially; everything else
 * linearly.
 */
export function backoffDelay(kind: TransportErrorKind, attempt: number, baseDelayMs: number): number {
    if (kind === "rate_limited") return baseDelayMs * 2 ** attempt;
    return baseDelayMs * attempt;
}

export function isRetryable(kind: TransportErrorKind): boolean {
    return kind !== "malformed_request";
}

const defaultSleep = async (ms: number): Promise<void> => {
    await delay(ms);
};

export class ReliableTransport implements Transport {
    private oracle: Oracle;
    private logger: Logger;
    private sleep: (ms: number) => Promise<void>;
    private counters: TransportStats = { calls: 0, retries: 0, failures: {} };

    constructor(opts: ReliableTransportOptions) {
        this.oracle = opts.oracle;
        this.logger = opts.logger ?? silentLogger;
        this.sleep = opts.sleep ?? defaultSleep;
    }

    /** Snapshot of the telemetry counters. */
    stats(): TransportStats {
        return {
            calls: this.counters.calls,
            retries: this.counters.retries,
            failures: { ...this.counters.failures },
        };
    }

    async send(request: OracleRequest, config: TransportSettings): Promise<Outcome> {
        const startedAt = Date.now();
        let usage: TokenUsage = emptyUsage();
        let lastKind: TransportErrorKind = "connection_error";
        let lastMessage = "no call was made";
        let tries = 0;

        for (let attempt = 1; attempt <= config.max_retries; attempt++) {
            tries = attempt;
            this.counters.calls++;
            const response = await this.callWithDeadline(request, config);

            if (response.status === "ok") {
                usage = addUsage(usage, response.usage);
                if (response.content.trim().length > 0) {
                    const outcome: SuccessfulOutcome = {
                        success: true,
                        content: response.content,
                        usage,
                        latencyMs: Date.now() - startedAt,
                        tries,
                    };
                    return Object.freeze(outcome);
                }
                lastKind = "empty_content";
                lastMessage = "Oracle returned an empty response";
            } else {
                lastKind = response.status;
                lastMessage = response.message;
            }

            this.counters.failures[lastKind] = (this.counters.failures[lastKind] ?? 0) + 1;

            if (!isRetryable(lastKind)) {
                this.logger.warn("transport.abort", { kind: lastKind, attempt, message: lastMessage });
                break;
            }
            if (attempt < config.max_retries) {
                const waitMs = backoffDelay(lastKind, attempt, config.base_delay_ms);
                this.counters.retries++;
                this.logger.warn("transport.retry", {
                    kind: lastKind,
                    attempt,
                    maxRetries: config.max_retries,
                    waitMs,
                });
                await this.sleep(waitMs);
            }
        }

        this.logger.error("transport.failed", { kind: lastKind, tries, message: lastMessage });
        const outcome: FailedOutcome = {
            success: false,
            errorKind: lastKind,
            message: lastMessage,
            usage,
            latencyMs: Date.now() - startedAt,
            tries,
        };
        return Object.freeze(outcome);
    }

    /**
     * One Oracle call under a hard deadline. When the deadline wins, the
     * call's signal is aborted and the try resolves to `timeout`; a call
     * that throws anyway is classified rather than propagated.
     */
    private async callWithDeadline(request: OracleRequest, config: TransportSettings): Promise<OracleResponse> {
        const controller = new AbortController();
        let timer: NodeJS.Timeout | undefined;

        const deadline = new Promise<OracleResponse>((resolve) => {
            timer = setTimeout(() => {
                controller.abort();
                resolve({
                    status: "timeout",
                    message: `Oracle call exceeded ${config.request_timeout_ms}ms`,
                });
            }, config.request_timeout_ms);
        });

        const invoke = async (): Promise<OracleResponse> =>
            this.oracle.sendRaw(request, {
                temperature: config.temperature,
                maxOutputTokens: config.max_output_tokens,
                signal: controller.signal,
            });
        const call = invoke().catch((err: unknown): OracleResponse => ({
                status: classifyOracleError(err),
                message: err instanceof Error ? err.message : String(err),
            }));

        try {
            return await Promise.race([call, deadline]);
        } finally {
            clearTimeout(timer);
        }
    }
}
