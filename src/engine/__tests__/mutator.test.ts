/**
 * Mutator Tests — strategy selection, prompt lineage and immutability.
 */
import { describe, it, expect } from "vitest";
import { composeInitialRequest, mutate, selectStrategy } from "../mutator.js";
import { makeBreakdown, makeProfile } from "../../__tests__/fixtures.js";

const profile = makeProfile();
const SCENARIO = "A neighbour asks for help planting a garden.";

describe("composeInitialRequest()", () => {
    it("frames the scenario with the profile's instructions", () => {
        const request = composeInitialRequest(profile, SCENARIO);
        expect(request.prompt).toBe(`Scenario: ${SCENARIO}\n\nINSTRUCTIONS`);
        expect(request.directive).toBe("IDENTITY");
        expect(request.generation).toBe(0);
        expect(request.strategy).toBeUndefined();
        expect(Object.isFrozen(request)).toBe(true);
    });
});

describe("selectStrategy()", () => {
    it("amplifies the weakest dimension after the first attempt", () => {
        const strategy = selectStrategy(1, makeBreakdown(0.4, "cadence"));
        expect(strategy.tag).toBe("cadence_amplifier");
        expect(strategy.targets).toEqual(["cadence"]);
        expect(strategy.restateIdentity).toBe(false);
    });

    it("amplifies everything after the second attempt", () => {
        const strategy = selectStrategy(2, makeBreakdown(0.4));
        expect(strategy.tag).toBe("comprehensive_amplifier");
        expect(strategy.targets).toHaveLength(5);
        expect(strategy.restateIdentity).toBe(true);
        expect(strategy.complianceDirective).toBe(false);
    });

    it("escalates to maximal compliance from the third attempt on", () => {
        expect(selectStrategy(3, makeBreakdown(0.4)).tag).toBe("maximal_compliance");
        expect(selectStrategy(7, makeBreakdown(0.4)).complianceDirective).toBe(true);
    });

    it("rejects non-positive or fractional indices", () => {
        expect(() => selectStrategy(0, makeBreakdown(0.4))).toThrow(RangeError);
        expect(() => selectStrategy(1.5, makeBreakdown(0.4))).toThrow(RangeError);
    });
});

describe("mutate()", () => {
    it("wraps the previous prompt with the weakest dimension's emphasis", () => {
        const initial = composeInitialRequest(profile, SCENARIO);
        const { request, strategy } = mutate(initial, profile, makeBreakdown(0.4, "lexical"), 1);

        expect(strategy).toBe("lexical_amplifier");
        expect(request.prompt).toBe(`EMPHASIS_LEXICAL\n\n${initial.prompt}`);
        expect(request.directive).toBe("IDENTITY");
        expect(request.generation).toBe(1);
        expect(request.strategy).toBe("lexical_amplifier");
    });

    it("builds a lineage that never shortens and keeps the scenario verbatim", () => {
        let request = composeInitialRequest(profile, SCENARIO);
        for (let index = 1; index <= 4; index++) {
            const next = mutate(request, profile, makeBreakdown(0.3, "structure"), index).request;
            expect(next.prompt.length).toBeGreaterThan(request.prompt.length);
            expect(next.prompt).toContain(request.prompt);
            expect(next.prompt).toContain(SCENARIO);
            expect(next.generation).toBe(index);
            request = next;
        }
    });

    it("adds closing and compliance at maximal compliance", () => {
        const previous = composeInitialRequest(profile, SCENARIO);
        const { request } = mutate(previous, profile, makeBreakdown(0.3), 3);
        expect(request.prompt).toBe(
            [
                "IDENTITY",
                "EMPHASIS_TONE",
                "EMPHASIS_APPROACH",
                "EMPHASIS_CADENCE",
                "EMPHASIS_LEXICAL",
                "EMPHASIS_STRUCTURE",
                previous.prompt,
                "CLOSING",
                "COMPLIANCE",
            ].join("\n\n"),
        );
    });

    it("never modifies the previous request", () => {
        const previous = composeInitialRequest(profile, SCENARIO);
        const snapshot = { ...previous };
        mutate(previous, profile, makeBreakdown(0.3), 2);
        expect(previous).toEqual(snapshot);
    });
});
