/**
 * Mutator — deterministic request rewriting between attempts.
 *
 * Strategy selection is a small state machine keyed by the attempt that just
 * fell short:
 *   attempt 1  → amplify only the weakest dimension
 *   attempt 2  → amplify every dimension and restate the identity framing
 *   attempt 3+ → everything above plus the closing and compliance directive
 *
 * A mutation only ever wraps the previous prompt, so the new prompt is never
 * shorter and the scenario text survives verbatim down the whole lineage.
 */
import type { TargetProfile } from "../schemas/profile.js";
import { DIMENSIONS } from "../core/types.js";
import type { Dimension, OracleRequest, ScoreBreakdown, StrategyTag } from "../core/types.js";

export interface MutationStrategy {
    tag: StrategyTag;
    targets: readonly Dimension[];
    restateIdentity: boolean;
    complianceDirective: boolean;
}

export interface MutationResult {
    request: OracleRequest;
    strategy: StrategyTag;
}

export type Mutator = (
    request: OracleRequest,
    profile: TargetProfile,
    breakdown: ScoreBreakdown,
    attemptIndex: number,
) => MutationResult;

const SECTION_SEPARATOR = "\n\n";

/**
 * Pick the strategy for the attempt that just fell short.
 */
export function selectStrategy(attemptIndex: number, breakdown: ScoreBreakdown): MutationStrategy {
    if (!Number.isInteger(attemptIndex) || attemptIndex < 1) {
        throw new RangeError(`attemptIndex must be a positive integer (got ${attemptIndex})`);
    }
    if (attemptIndex === 1) {
        return {
            tag: `${breakdown.weakestDimension}_amplifier`,
            targets: [breakdown.weakestDimension],
            restateIdentity: false,
            complianceDirective: false,
        };
    }
    if (attemptIndex === 2) {
        return {
            tag: "comprehensive_amplifier",
            targets: DIMENSIONS,
            restateIdentity: true,
            complianceDirective: false,
        };
    }
    return {
        tag: "maximal_compliance",
        targets: DIMENSIONS,
        restateIdentity: true,
        complianceDirective: true,
    };
}

/** The first request of a run: the scenario framed by the profile. */
export function composeInitialRequest(profile: TargetProfile, scenario: string): OracleRequest {
    return Object.freeze({
        prompt: [`Scenario: ${scenario}`, profile.framing.instructions].join(SECTION_SEPARATOR),
        directive: profile.framing.identity,
        generation: 0,
    });
}

export function mutate(
    request: OracleRequest,
    profile: TargetProfile,
    breakdown: ScoreBreakdown,
    attemptIndex: number,
): MutationResult {
    const strategy = selectStrategy(attemptIndex, breakdown);
    const { framing } = profile;

    const sections: string[] = [];
    if (strategy.restateIdentity) sections.push(framing.identity);
    for (const dim of strategy.targets) {
        sections.push(framing.emphasis[dim]);
    }
    sections.push(request.prompt);
    if (strategy.complianceDirective) {
        sections.push(framing.closing, framing.compliance);
    }

    const next: OracleRequest = Object.freeze({
        prompt: sections.join(SECTION_SEPARATOR),
        directive: strategy.restateIdentity ? framing.identity : request.directive,
        generation: request.generation + 1,
        strategy: strategy.tag,
    });
    return { request: next, strategy: strategy.tag };
}
