// src/domain/similarity.ts
import { sequenceRatio } from "./sequence";
import { charLength, digitRuns, isNumericToken, normalizeName, wordSet } from "../utils/normalize";

/**
 * Tunable thresholds of the scorer. Defaults were calibrated by hand on
 * inventory-style names ("med 99" / "med_99"); override per caller.
 */
export interface SimilarityParams {
    /** Minimum word overlap before the overlap boost applies. */
    wordOverlapMin: number;
    /** Overlap boost only applies when the base ratio is below this. */
    wordOverlapBaseCeiling: number;
    wordOverlapWeight: number;
    /** Score granted when both sides share a purely numeric token. */
    numericTokenScore: number;
    substringWeight: number;
    /** Keyword both strings must contain for the digit-run boost. */
    keyword: string;
    keywordDigitScore: number;
}

export const DEFAULT_SIMILARITY_PARAMS: Readonly<SimilarityParams> = {
    wordOverlapMin: 0.5,
    wordOverlapBaseCeiling: 0.6,
    wordOverlapWeight: 0.85,
    numericTokenScore: 0.8,
    substringWeight: 0.75,
    keyword: "med",
    keywordDigitScore: 0.7,
};

/** Both inputs after normalization, plus what the rules read from them. */
export interface NormalizedPair {
    a: string;
    b: string;
    wordsA: Set<string>;
    wordsB: Set<string>;
    base: number;
}

/** A boost: returns the running score, possibly raised. Never lowers it. */
export type SimilarityRule = (pair: NormalizedPair, score: number, params: SimilarityParams) => number;

export function normalizePair(a: string, b: string): NormalizedPair {
    const na = normalizeName(a);
    const nb = normalizeName(b);
    return { a: na, b: nb, wordsA: wordSet(na), wordsB: wordSet(nb), base: sequenceRatio(na, nb) };
}

/** Shared words count when the character-level ratio under-rates the pair. */
export const wordOverlapRule: SimilarityRule = (pair, score, p) => {
    const { wordsA, wordsB } = pair;
    if (wordsA.size === 0 || wordsB.size === 0) return score;
    let common = 0;
    for (const w of wordsA) if (wordsB.has(w)) common++;
    const overlap = common / Math.max(wordsA.size, wordsB.size);
    if (overlap >= p.wordOverlapMin && pair.base < p.wordOverlapBaseCeiling) {
        return Math.max(score, overlap * p.wordOverlapWeight);
    }
    return score;
};

export const numericTokenRule: SimilarityRule = (pair, score, p) => {
    for (const w of pair.wordsA) {
        if (isNumericToken(w) && pair.wordsB.has(w)) return Math.max(score, p.numericTokenScore);
    }
    return score;
};

export const substringRule: SimilarityRule = (pair, score, p) => {
    const la = charLength(pair.a);
    const lb = charLength(pair.b);
    const longer = Math.max(la, lb);
    if (longer === 0) return score;
    if (!pair.a.includes(pair.b) && !pair.b.includes(pair.a)) return score;
    return Math.max(score, (Math.min(la, lb) / longer) * p.substringWeight);
};

export const keywordDigitRule: SimilarityRule = (pair, score, p) => {
    if (!pair.a.includes(p.keyword) || !pair.b.includes(p.keyword)) return score;
    const runsB = new Set(digitRuns(pair.b));
    if (digitRuns(pair.a).some(run => runsB.has(run))) {
        return Math.max(score, p.keywordDigitScore);
    }
    return score;
};

/** Applied in order after the base ratio. */
export const SIMILARITY_RULES: ReadonlyArray<{ name: string; apply: SimilarityRule }> = [
    { name: "word-overlap", apply: wordOverlapRule },
    { name: "numeric-token", apply: numericTokenRule },
    { name: "substring", apply: substringRule },
    { name: "keyword-digits", apply: keywordDigitRule },
];

export interface SimilarityStep {
    rule: string;
    score: number;
}

export interface SimilarityExplanation {
    pair: NormalizedPair;
    steps: SimilarityStep[];
    score: number;
}

/** Score with the running value recorded after the base ratio and after every rule. */
export function explainSimilarity(a: string, b: string, params: Partial<SimilarityParams> = {}): SimilarityExplanation {
    const p: SimilarityParams = { ...DEFAULT_SIMILARITY_PARAMS, ...params };
    const pair = normalizePair(a, b);

    let score = pair.base;
    const steps: SimilarityStep[] = [{ rule: "base", score }];
    for (const rule of SIMILARITY_RULES) {
        score = rule.apply(pair, score, p);
        steps.push({ rule: rule.name, score });
    }
    return { pair, steps, score };
}

/** Relatedness of two names in [0, 1]; 1 means identical after normalization. */
export function similarity(a: string, b: string, params: Partial<SimilarityParams> = {}): number {
    return explainSimilarity(a, b, params).score;
}
