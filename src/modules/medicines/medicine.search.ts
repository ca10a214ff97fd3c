// src/modules/medicines/medicine.search.ts
import { similarity, type SimilarityParams } from "../../domain/similarity";
import { normalizeName, wordSet } from "../../utils/normalize";
import type { Scored, SearchOptions } from "../../types/domain";

/** Query fully contained in the name. */
const CONTAINED_QUERY_SCORE = 0.8;
/** Every query word is a word of the name. */
const WORD_SUBSET_SCORE = 0.9;

export const DEFAULT_SEARCH_OPTIONS: SearchOptions = { threshold: 0.3, maxResults: 5 };

/**
 * Score one candidate name for a search query.
 * On top of the generic similarity, queries that are a prefix-like part of a
 * longer product name ("med" → "medicine 99") are ranked as strong hits.
 */
export function scoreCandidate(query: string, name: string, params: Partial<SimilarityParams> = {}): number {
    let score = similarity(query, name, params);

    const q = normalizeName(query);
    const n = normalizeName(name);
    if (q && n.includes(q)) score = Math.max(score, CONTAINED_QUERY_SCORE);

    const qWords = wordSet(q);
    const nWords = wordSet(n);
    if (qWords.size && nWords.size && [...qWords].every(w => nWords.has(w))) {
        score = Math.max(score, WORD_SUBSET_SCORE);
    }
    return score;
}

export interface RankOptions<T> extends SearchOptions {
    getName: (item: T) => string;
    params?: Partial<SimilarityParams>;
}

/**
 * Rank items against a query: score ≥ threshold, best first, at most maxResults.
 * Equal scores keep their input order.
 */
export function rankCandidates<T extends object>(query: string, items: readonly T[], opts: RankOptions<T>): Array<Scored<T>> {
    if (!normalizeName(query)) return [];

    const scored: Array<Scored<T>> = [];
    for (const item of items) {
        const score = scoreCandidate(query, opts.getName(item), opts.params);
        if (score >= opts.threshold) scored.push({ ...item, score });
    }
    scored.sort((x, y) => y.score - x.score);
    return scored.slice(0, Math.max(0, opts.maxResults));
}
