// tools/maintenance/fuzzy-search.ts
// Usage: fuzzy-search [query ...] [--threshold 0.3] [--limit 5] [--verbose]
//                     [--names "med_99,Medicine 99"] [--report ./reports]
// Without --names the candidates are the active medicines in the DB.
import { getConfig, flagBool, flagNumber, flagString } from './config';
import { withPool } from './pools';
import { formatScore, writeJsonReport } from './util';
import { explainSimilarity } from '../../src/domain/similarity';
import { DEFAULT_SEARCH_OPTIONS, rankCandidates, scoreCandidate } from '../../src/modules/medicines/medicine.search';
import { MedicinesRepo } from '../../src/modules/medicines/medicines.repo';

const DEFAULT_QUERIES = ['med 99', 'mad_99', 'Med 9', 'med'];

type Candidate = { id: number; name: string };

async function loadCandidates(names: string | undefined, load: () => Promise<Candidate[]>): Promise<Candidate[]> {
    if (names === undefined) return load();
    return names.split(',').map(n => n.trim()).filter(Boolean).map((name, i) => ({ id: i + 1, name }));
}

function trace(query: string, name: string) {
    const ex = explainSimilarity(query, name);
    console.log(`\nTesting: '${query}' vs '${name}'`);
    console.log(`  Normalized: '${ex.pair.a}' / '${ex.pair.b}'`);
    for (const step of ex.steps) console.log(`  ${step.rule.padEnd(15)} ${step.score.toFixed(3)}`);
    console.log(`  Final: ${formatScore(scoreCandidate(query, name))}`);
}

async function main() {
    const cfg = getConfig();
    const queries = cfg.args.length ? cfg.args : DEFAULT_QUERIES;
    const threshold = flagNumber(cfg.flags, 'threshold') ?? DEFAULT_SEARCH_OPTIONS.threshold;
    const maxResults = flagNumber(cfg.flags, 'limit') ?? DEFAULT_SEARCH_OPTIONS.maxResults;
    const verbose = flagBool(cfg.flags, 'verbose');

    const candidates = await loadCandidates(flagString(cfg.flags, 'names'), () =>
        withPool(cfg.db, pool => new MedicinesRepo(pool).listActive())
    );
    console.log(`[fuzzy-search] ${candidates.length} candidates, threshold=${threshold}, limit=${maxResults}`);

    const summary: Record<string, Array<{ name: string; score: number }>> = {};
    for (const query of queries) {
        console.log(`\n${'='.repeat(80)}\nTESTING SEARCH: '${query}'\n${'='.repeat(80)}`);
        if (verbose) for (const c of candidates) trace(query, c.name);

        const results = rankCandidates(query, candidates, { threshold, maxResults, getName: c => c.name });
        summary[query] = results.map(r => ({ name: r.name, score: r.score }));

        console.log(`\nRESULTS FOR '${query}':`);
        if (!results.length) console.log('No results found above threshold');
        results.forEach((r, i) => console.log(`${i + 1}. ${r.name} - ${formatScore(r.score)}`));
    }

    const dir = flagString(cfg.flags, 'report');
    if (dir) console.log(`\n[fuzzy-search] Summary: ${writeJsonReport(dir, 'fuzzy-search', summary)}`);
}

main().catch(e => { console.error(e); process.exit(1); });
