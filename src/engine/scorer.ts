/**
 * Scorer — maps a response text onto the target profile's dimensions.
 *
 * Pure and deterministic: identical (content, profile, options) always give
 * an identical ScoreBreakdown. Each dimension is a pattern-hit density
 * normalised by word count and clipped to [0, 1]; `overall` is the weighted
 * sum under the profile's configured weights.
 */
import type { TargetProfile } from "../schemas/profile.js";
import { DIMENSIONS } from "../core/types.js";
import type { Dimension, ScoreBreakdown } from "../core/types.js";

export interface ScoreOptions {
    /** Responses under this many words have every dimension scaled by words / minWords. */
    minWords?: number;
}

export type Scorer = (content: string, profile: TargetProfile, options?: ScoreOptions) => ScoreBreakdown;

const DEFAULT_MIN_WORDS = 20;
const EVIDENCE_TERMS_PER_DIMENSION = 3;

interface DimensionReading {
    score: number;
    matched: string[];
}

interface PatternHits {
    total: number;
    /** Number of distinct patterns that hit at least once. */
    patternsHit: number;
    matched: string[];
}

const clip = (value: number): number => Math.min(Math.max(value, 0), 1);

function countWords(text: string): number {
    const trimmed = text.trim();
    return trimmed ? trimmed.split(/\s+/).length : 0;
}

function collectHits(text: string, patterns: readonly string[]): PatternHits {
    let total = 0;
    let patternsHit = 0;
    const matched: string[] = [];
    for (const source of patterns) {
        const found = text.match(new RegExp(source, "gi"));
        if (!found) continue;
        total += found.length;
        patternsHit++;
        matched.push(...found.map((m) => m.toLowerCase()));
    }
    return { total, patternsHit, matched };
}

function scoreTone(text: string, words: number, profile: TargetProfile): DimensionReading {
    const hits = collectHits(text, profile.pattern_sets.tone);
    const intensifiers = collectHits(text, profile.pattern_sets.intensifiers);
    const density = Math.min(hits.total / words, 1);
    const intensity = Math.min(intensifiers.total * 0.1, 0.3);
    return { score: Math.min(density * 2 + intensity, 1), matched: hits.matched };
}

function scoreApproach(text: string, words: number, profile: TargetProfile): DimensionReading {
    const patterns = profile.pattern_sets.approach;
    const hits = collectHits(text, patterns);
    const coverage = hits.patternsHit / patterns.length;
    const density = Math.min(hits.total / words, 1);
    return { score: coverage * 0.7 + density * 0.3, matched: hits.matched };
}

function sentenceLengths(text: string): number[] {
    return text
        .split(/[.!?]+/)
        .map((sentence) => sentence.trim())
        .filter((sentence) => sentence.length > 0)
        .map(countWords);
}

function scoreCadence(text: string, words: number, profile: TargetProfile): DimensionReading {
    const lengths = sentenceLengths(text);
    let consistency = 0;
    if (lengths.length > 0) {
        const mean = lengths.reduce((sum, n) => sum + n, 0) / lengths.length;
        const variance = lengths.reduce((sum, n) => sum + (n - mean) ** 2, 0) / lengths.length;
        consistency = 1 / (1 + variance / 100);
    }
    const indicators = collectHits(text, profile.pattern_sets.cadence);
    const indicatorDensity = Math.min((indicators.total / words) * 10, 1);
    return { score: consistency * 0.6 + indicatorDensity * 0.4, matched: indicators.matched };
}

function scoreLexical(text: string, words: number, profile: TargetProfile): DimensionReading {
    const keywords = profile.pattern_sets.lexical;
    const haystack = text.toLowerCase();
    const found = keywords.filter((keyword) => haystack.includes(keyword.toLowerCase()));
    const coverage = found.length / keywords.length;
    const density = Math.min((found.length / words) * 20, 1);
    return { score: coverage * 0.7 + density * 0.3, matched: found.map((k) => k.toLowerCase()) };
}

function scoreStructure(text: string, _words: number, profile: TargetProfile): DimensionReading {
    const markers = profile.pattern_sets.structure;
    const hits = collectHits(text, markers);
    return { score: hits.patternsHit / markers.length, matched: hits.matched };
}

const READERS: Record<Dimension, (text: string, words: number, profile: TargetProfile) => DimensionReading> = {
    tone: scoreTone,
    approach: scoreApproach,
    cadence: scoreCadence,
    lexical: scoreLexical,
    structure: scoreStructure,
};

function zeroDimensions(): Record<Dimension, number> {
    return { tone: 0, approach: 0, cadence: 0, lexical: 0, structure: 0 };
}

/** Argmin over the fixed dimension order; the first dimension wins ties. */
export function weakestOf(dimensions: Readonly<Record<Dimension, number>>): Dimension {
    let weakest: Dimension = DIMENSIONS[0];
    for (const dim of DIMENSIONS) {
        if (dimensions[dim] < dimensions[weakest]) weakest = dim;
    }
    return weakest;
}

export function weightedOverall(
    dimensions: Readonly<Record<Dimension, number>>,
    profile: TargetProfile,
): number {
    return DIMENSIONS.reduce((sum, dim) => sum + profile.dimension_weights[dim] * dimensions[dim], 0);
}

export function score(content: string, profile: TargetProfile, options?: ScoreOptions): ScoreBreakdown {
    const minWords = options?.minWords ?? DEFAULT_MIN_WORDS;
    const words = countWords(content);

    if (words === 0) {
        const dimensions = zeroDimensions();
        return Object.freeze({
            dimensions: Object.freeze(dimensions),
            overall: 0,
            weakestDimension: weakestOf(dimensions),
            evidence: Object.freeze([]),
            wordCount: 0,
        });
    }

    const floor = words < minWords ? words / minWords : 1;
    const dimensions = zeroDimensions();
    const evidence: string[] = [];

    for (const dim of DIMENSIONS) {
        const reading = READERS[dim](content, words, profile);
        dimensions[dim] = clip(reading.score * floor);
        const terms = [...new Set(reading.matched)].slice(0, EVIDENCE_TERMS_PER_DIMENSION);
        if (terms.length > 0) {
            evidence.push(`${dim}: ${terms.join(", ")}`);
        }
    }
    if (floor < 1) {
        evidence.push(`floor penalty: ${words}/${minWords} words`);
    }

    return Object.freeze({
        dimensions: Object.freeze(dimensions),
        overall: weightedOverall(dimensions, profile),
        weakestDimension: weakestOf(dimensions),
        evidence: Object.freeze(evidence),
        wordCount: words,
    });
}
