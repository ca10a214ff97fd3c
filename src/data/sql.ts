// Backtick-quote an identifier (e.g., column or table)
export function qid(id: string) {
    // allow only alnum + underscore to prevent injection; then wrap in backticks
    if (!/^[A-Za-z0-9_]+$/.test(id)) throw new Error(`Invalid identifier: ${id}`);
    return `\`${id}\``;
}

// Build "`a`, `b`" for statements that take a table list (OPTIMIZE, ANALYZE)
export function tableList(tables: readonly string[]) {
    return tables.map(qid).join(", ");
}
