/**
 * Shared test fixtures: a small hand-scored profile and stand-ins for the
 * Oracle, Transport and Scorer.
 */
import { defineProfile, InMemoryProfileStore } from "../profiles/store.js";
import { AttuneConfig } from "../schemas/config.js";
import type { TargetProfile } from "../schemas/profile.js";
import type { Transport } from "../llm/transport.js";
import type { Oracle, OracleResponse } from "../llm/oracle.js";
import type { TransportSettings } from "../schemas/config.js";
import type { Scorer } from "../engine/scorer.js";
import type { Dimension, OracleRequest, Outcome, ScoreBreakdown } from "../core/types.js";

export const rawProfile = {
    id: "helper",
    name: "Gentle Helper",
    dimension_weights: { tone: 0.25, approach: 0.25, cadence: 0.2, lexical: 0.15, structure: 0.15 },
    pattern_sets: {
        tone: ["warm", "care"],
        approach: ["step by step", "together"],
        cadence: ["gently"],
        lexical: ["kindness", "trust"],
        structure: ["because", "therefore"],
        intensifiers: ["very"],
    },
    framing: {
        identity: "IDENTITY",
        instructions: "INSTRUCTIONS",
        emphasis: {
            tone: "EMPHASIS_TONE",
            approach: "EMPHASIS_APPROACH",
            cadence: "EMPHASIS_CADENCE",
            lexical: "EMPHASIS_LEXICAL",
            structure: "EMPHASIS_STRUCTURE",
        },
        closing: "CLOSING",
        compliance: "COMPLIANCE",
    },
};

export function makeProfile(overrides: Record<string, unknown> = {}): TargetProfile {
    return defineProfile({ ...structuredClone(rawProfile), ...overrides });
}

export function makeStore(...profiles: TargetProfile[]): InMemoryProfileStore {
    return new InMemoryProfileStore(profiles.length > 0 ? profiles : [makeProfile()]);
}

export function makeConfig(overrides: Partial<AttuneConfig> = {}): AttuneConfig {
    return AttuneConfig.parse({ inter_attempt_delay_ms: 0, base_delay_ms: 0, ...overrides });
}

export function makeBreakdown(overall: number, weakestDimension: Dimension = "tone"): ScoreBreakdown {
    return {
        dimensions: { tone: overall, approach: overall, cadence: overall, lexical: overall, structure: overall },
        overall,
        weakestDimension,
        evidence: [],
        wordCount: 30,
    };
}

/** A Scorer that looks the response text up in a table of overall scores. */
export function tableScorer(table: Record<string, number>): Scorer {
    return (content) => makeBreakdown(table[content] ?? 0);
}

export const okOutcome = (content: string): Outcome => ({
    success: true,
    content,
    usage: { inputTokens: 10, outputTokens: 20, totalTokens: 30 },
    latencyMs: 5,
    tries: 1,
});

export const failedOutcome = (errorKind: "rate_limited" | "timeout" | "connection_error" = "rate_limited"): Outcome => ({
    success: false,
    errorKind,
    message: `${errorKind} from stub`,
    usage: { inputTokens: 0, outputTokens: 0, totalTokens: 0 },
    latencyMs: 5,
    tries: 3,
});

/** A Transport that replays scripted outcomes and records every request. */
export class ScriptedTransport implements Transport {
    public readonly requests: OracleRequest[] = [];
    private index = 0;

    constructor(private outcomes: Outcome[]) {}

    async send(request: OracleRequest, _config: TransportSettings): Promise<Outcome> {
        this.requests.push(request);
        const outcome = this.outcomes[Math.min(this.index, this.outcomes.length - 1)];
        this.index++;
        return outcome;
    }
}

/** An Oracle that replays scripted responses (or throws scripted errors). */
export class ScriptedOracle implements Oracle {
    public calls = 0;

    constructor(private script: Array<OracleResponse | Error>) {}

    async sendRaw(): Promise<OracleResponse> {
        const step = this.script[Math.min(this.calls, this.script.length - 1)];
        this.calls++;
        if (step instanceof Error) throw step;
        return step;
    }
}

export const okResponse = (content: string): OracleResponse => ({
    status: "ok",
    content,
    usage: { inputTokens: 1, outputTokens: 2, totalTokens: 3 },
});

export const noSleep = async (): Promise<void> => {};
