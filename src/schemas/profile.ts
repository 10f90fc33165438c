/**
 * Profile Schemas — the validated shape of a target behavioural profile.
 *
 * Profiles fail fast at load time: every dimension needs a weight, a
 * non-empty pattern set and an emphasis phrase, and the weights must sum
 * to one. Nothing downstream falls back on a missing key.
 */
import { z } from "zod/v4";
import { DIMENSIONS } from "../core/types.js";

/** Tolerance for the weight-sum check. */
export const WEIGHT_EPSILON = 1e-6;

function isUsablePattern(source: string): boolean {
    try {
        return !new RegExp(source, "i").test("");
    } catch {
        return false;
    }
}

/** A case-insensitive regular-expression source that cannot match "". */
const Pattern = z
    .string()
    .min(1)
    .refine(isUsablePattern, "must be a valid regular expression that does not match the empty string");

const PatternList = z.array(Pattern).min(1);

const Weight = z.number().min(0).max(1);

export const DimensionWeights = z.object({
    tone: Weight,
    approach: Weight,
    cadence: Weight,
    lexical: Weight,
    structure: Weight,
});
export type DimensionWeights = z.infer<typeof DimensionWeights>;

export const PatternSets = z.object({
    tone: PatternList,
    approach: PatternList,
    cadence: PatternList,
    /** Literal keywords, matched by case-insensitive containment. */
    lexical: z.array(z.string().min(1)).min(1),
    /** Structural trait markers; scored by presence, not count. */
    structure: PatternList,
    /** Optional intensity markers that add a small bonus to tone. */
    intensifiers: z.array(Pattern).default([]),
});
export type PatternSets = z.infer<typeof PatternSets>;

/** Opaque phrases the request composer and the Mutator splice in. */
export const ProfileFraming = z.object({
    identity: z.string().min(1),
    instructions: z.string().min(1),
    emphasis: z.object({
        tone: z.string().min(1),
        approach: z.string().min(1),
        cadence: z.string().min(1),
        lexical: z.string().min(1),
        structure: z.string().min(1),
    }),
    closing: z.string().min(1),
    compliance: z.string().min(1),
});
export type ProfileFraming = z.infer<typeof ProfileFraming>;

export const TargetProfile = z
    .object({
        id: z.string().min(1),
        name: z.string().min(1),
        description: z.string().optional(),
        dimension_weights: DimensionWeights,
        pattern_sets: PatternSets,
        categorical_codes: z.record(z.string(), z.string()).default({}),
        framing: ProfileFraming,
    })
    .superRefine((profile, ctx) => {
        const sum = DIMENSIONS.reduce((total, dim) => total + profile.dimension_weights[dim], 0);
        if (Math.abs(sum - 1) > WEIGHT_EPSILON) {
            ctx.addIssue({
                code: "custom",
                message: `dimension_weights must sum to 1 (got ${sum})`,
                path: ["dimension_weights"],
            });
        }
    });
export type TargetProfile = z.infer<typeof TargetProfile>;

/** A JSON file holding several profiles. */
export const ProfileCatalog = z.object({
    profiles: z.array(TargetProfile).min(1).superRefine((profiles, ctx) => {
        const seen = new Set<string>();
        for (let i = 0; i < profiles.length; i++) {
            const id = profiles[i].id;
            if (seen.has(id)) {
                ctx.addIssue({
                    code: "custom",
                    message: `Duplicate profile id: ${id}`,
                    path: [i, "id"],
                });
            }
            seen.add(id);
        }
    }),
});
export type ProfileCatalog = z.infer<typeof ProfileCatalog>;
