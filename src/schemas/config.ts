/**
 * Configuration — All tunable parameters in one place.
 */
import { z } from "zod/v4";

const fields = {
    max_attempts: z.number().int().min(1),
    threshold: z.number().min(0).max(1),
    inter_attempt_delay_ms: z.number().int().min(0),
    min_words: z.number().int().min(1),
    max_retries: z.number().int().min(1),
    base_delay_ms: z.number().int().min(0),
    request_timeout_ms: z.number().int().min(1),
    temperature: z.number().min(0).max(2),
    max_output_tokens: z.number().int().min(1),
    max_concurrent: z.number().int().min(1),
};

/**
 * The single configuration object controlling the convergence loop, the
 * transport reliability layer and the batch runner.
 */
export const AttuneConfig = z.object({
    // --- Convergence Loop ---
    /** Hard attempt budget per run; transport failures and low scores share it. */
    max_attempts: fields.max_attempts.default(3),
    /** Overall score at or above which a run converges. */
    threshold: fields.threshold.default(0.85),
    /** Fixed pause between attempts. */
    inter_attempt_delay_ms: fields.inter_attempt_delay_ms.default(2000),
    /** Responses shorter than this many words get a proportional floor penalty. */
    min_words: fields.min_words.default(20),

    // --- Transport Reliability ---
    /** Oracle calls per attempt, including the first. */
    max_retries: fields.max_retries.default(3),
    /** Base unit for retry backoff. */
    base_delay_ms: fields.base_delay_ms.default(1000),
    /** Hard timeout for a single Oracle call. */
    request_timeout_ms: fields.request_timeout_ms.default(60000),
    temperature: fields.temperature.default(0.8),
    max_output_tokens: fields.max_output_tokens.default(2000),

    // --- Batch ---
    /** Runs executing at once inside a batch. */
    max_concurrent: fields.max_concurrent.default(2),
});
export type AttuneConfig = z.infer<typeof AttuneConfig>;

/**
 * A sparse layer of overrides (config file, batch file). Carries no
 * defaults, so merging layers never resets a value set underneath.
 */
export const AttuneConfigOverrides = z.object(fields).partial();
export type AttuneConfigOverrides = z.infer<typeof AttuneConfigOverrides>;

/** The subset of configuration the Transport Layer reads on every send. */
export type TransportSettings = Pick<
    AttuneConfig,
    "max_retries" | "base_delay_ms" | "request_timeout_ms" | "temperature" | "max_output_tokens"
>;
