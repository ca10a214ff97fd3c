// src/modules/medicines/medicines.service.ts
import type { Medicine, Scored, SearchOptions } from "../../types/domain";
import type { SimilarityParams } from "../../domain/similarity";
import type { MedicinesRepo } from "./medicines.repo";
import { DEFAULT_SEARCH_OPTIONS, rankCandidates } from "./medicine.search";

export const UNCATEGORIZED = "Uncategorized";

export type MedicinesReader = Pick<MedicinesRepo, "listActive" | "listCategories">;

export interface CategoryGroup {
    category: string;
    medicines: Medicine[];
}

export interface Catalogue {
    groups: CategoryGroup[];
    categories: string[];
    total: number;
}

/** Group consecutive rows sharing a category; input is expected sorted by category. */
export function groupByCategory(medicines: readonly Medicine[]): CategoryGroup[] {
    const groups: CategoryGroup[] = [];
    let current: CategoryGroup | null = null;
    for (const m of medicines) {
        const category = m.therapeuticCategory || UNCATEGORIZED;
        if (!current || current.category !== category) {
            current = { category, medicines: [] };
            groups.push(current);
        }
        current.medicines.push(m);
    }
    return groups;
}

export class MedicinesService {
    constructor(
        private repo: MedicinesReader,
        private defaults: SearchOptions = DEFAULT_SEARCH_OPTIONS,
        private params: Partial<SimilarityParams> = {}
    ) {}

    async search(query: string, opts: Partial<SearchOptions> = {}): Promise<Array<Scored<Medicine>>> {
        const medicines = await this.repo.listActive();
        return rankCandidates(query, medicines, {
            threshold: opts.threshold ?? this.defaults.threshold,
            maxResults: opts.maxResults ?? this.defaults.maxResults,
            getName: m => m.name,
            params: this.params,
        });
    }

    async catalogue(): Promise<Catalogue> {
        const [medicines, categories] = await Promise.all([this.repo.listActive(), this.repo.listCategories()]);
        return { groups: groupByCategory(medicines), categories, total: medicines.length };
    }
}
