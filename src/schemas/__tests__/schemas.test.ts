/**
 * Schema Tests — configuration defaults, profile validation and batch files.
 */
import { describe, it, expect } from "vitest";
import { AttuneConfig, AttuneConfigOverrides } from "../config.js";
import { TargetProfile, ProfileCatalog } from "../profile.js";
import { BatchFile } from "../batch.js";
import { rawProfile } from "../../__tests__/fixtures.js";

describe("AttuneConfig", () => {
    it("fills every default", () => {
        expect(AttuneConfig.parse({})).toEqual({
            max_attempts: 3,
            threshold: 0.85,
            inter_attempt_delay_ms: 2000,
            min_words: 20,
            max_retries: 3,
            base_delay_ms: 1000,
            request_timeout_ms: 60000,
            temperature: 0.8,
            max_output_tokens: 2000,
            max_concurrent: 2,
        });
    });

    it("rejects a zero attempt budget and out-of-range thresholds", () => {
        expect(AttuneConfig.safeParse({ max_attempts: 0 }).success).toBe(false);
        expect(AttuneConfig.safeParse({ threshold: 1.2 }).success).toBe(false);
        expect(AttuneConfig.safeParse({ max_retries: 0 }).success).toBe(false);
    });

    it("overrides carry no defaults", () => {
        expect(AttuneConfigOverrides.parse({ threshold: 0.5 })).toEqual({ threshold: 0.5 });
    });
});

describe("TargetProfile", () => {
    it("accepts a complete profile and defaults the optional parts", () => {
        const profile = TargetProfile.parse(rawProfile);
        expect(profile.categorical_codes).toEqual({});
        expect(profile.pattern_sets.intensifiers).toEqual(["very"]);
    });

    it("rejects weights that do not sum to one", () => {
        const result = TargetProfile.safeParse({
            ...rawProfile,
            dimension_weights: { tone: 0.5, approach: 0.5, cadence: 0.5, lexical: 0, structure: 0 },
        });
        expect(result.success).toBe(false);
        if (!result.success) {
            expect(result.error.issues[0].path).toEqual(["dimension_weights"]);
        }
    });

    it("rejects a missing weight", () => {
        const { structure: _dropped, ...weights } = rawProfile.dimension_weights;
        expect(TargetProfile.safeParse({ ...rawProfile, dimension_weights: weights }).success).toBe(false);
    });

    it("rejects an empty pattern set", () => {
        const result = TargetProfile.safeParse({
            ...rawProfile,
            pattern_sets: { ...rawProfile.pattern_sets, cadence: [] },
        });
        expect(result.success).toBe(false);
    });

    it("rejects patterns that do not compile or match the empty string", () => {
        for (const bad of ["(unclosed", "a*"]) {
            const result = TargetProfile.safeParse({
                ...rawProfile,
                pattern_sets: { ...rawProfile.pattern_sets, tone: [bad] },
            });
            expect(result.success).toBe(false);
        }
    });
});

describe("ProfileCatalog", () => {
    it("rejects duplicate ids", () => {
        const result = ProfileCatalog.safeParse({ profiles: [rawProfile, rawProfile] });
        expect(result.success).toBe(false);
        if (!result.success) {
            expect(result.error.issues[0].message).toBe("Duplicate profile id: helper");
        }
    });
});

describe("BatchFile", () => {
    it("defaults the config overrides to empty", () => {
        const batch = BatchFile.parse({ pairs: [{ profile_id: "helper", scenario: "A rainy day" }] });
        expect(batch.config).toEqual({});
        expect(batch.pairs).toHaveLength(1);
    });

    it("requires at least one pair", () => {
        expect(BatchFile.safeParse({ pairs: [] }).success).toBe(false);
    });
});
