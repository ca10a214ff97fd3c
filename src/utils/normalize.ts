// src/utils/normalize.ts

/**
 * Normalize a free-text name for comparison:
 * lowercase, underscores → spaces, whitespace collapsed, trimmed.
 * Examples: "Med_99" → "med 99", "  Vitamin   C " → "vitamin c"
 */
export function normalizeName(text: string): string {
    return text.toLowerCase().replace(/_/g, " ").split(/\s+/).filter(Boolean).join(" ");
}

/** Whitespace-delimited word set of an already normalized string. */
export function wordSet(normalized: string): Set<string> {
    return new Set(normalized.split(" ").filter(Boolean));
}

/** Token made of ASCII digits only ("99", not "99mg"). */
export function isNumericToken(token: string): boolean {
    return /^[0-9]+$/.test(token);
}

/** Maximal runs of digits, in order of appearance ("med 5 x500mg" → ["5", "500"]). */
export function digitRuns(text: string): string[] {
    return text.match(/[0-9]+/g) ?? [];
}

/** Length in code points, so astral characters count once. */
export function charLength(text: string): number {
    return Array.from(text).length;
}
