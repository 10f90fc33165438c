/**
 * Batch File Schema — the JSON input of `attune batch`.
 */
import { z } from "zod/v4";
import { AttuneConfigOverrides } from "./config.js";

export const BatchPairInput = z.object({
    profile_id: z.string().min(1),
    scenario: z.string().min(1),
});
export type BatchPairInput = z.infer<typeof BatchPairInput>;

export const BatchFile = z.object({
    pairs: z.array(BatchPairInput).min(1),
    /** Overrides applied on top of the CLI configuration for this batch. */
    config: AttuneConfigOverrides.default({}),
});
export type BatchFile = z.infer<typeof BatchFile>;
