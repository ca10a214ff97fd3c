// src/modules/settings/envFile.ts
import fs from "node:fs";

export const ADMIN_KEY = "ADMIN_TELEGRAM_ID";

/** Telegram user ids are plain positive integers. */
export function isTelegramId(value: string): boolean {
    return /^[0-9]+$/.test(value);
}

/**
 * Replace the first `ADMIN_TELEGRAM_ID=` line. Every other line, and the
 * line's own CRLF ending, is kept as is.
 */
export function applyAdminTelegramId(content: string, telegramId: string): { content: string; updated: boolean } {
    const lines = content.split("\n");
    const idx = lines.findIndex(l => l.startsWith(`${ADMIN_KEY}=`));
    if (idx === -1) return { content, updated: false };

    const cr = lines[idx].endsWith("\r") ? "\r" : "";
    lines[idx] = `${ADMIN_KEY}=${telegramId}${cr}`;
    return { content: lines.join("\n"), updated: true };
}

export type UpdateEnvFailure = "missing-file" | "invalid-id" | "missing-key";

export type UpdateEnvResult =
    | { ok: true; file: string; telegramId: string }
    | { ok: false; reason: UpdateEnvFailure };

export function updateEnvFile(file: string, telegramId: string): UpdateEnvResult {
    if (!fs.existsSync(file)) return { ok: false, reason: "missing-file" };

    const id = telegramId.trim();
    if (!isTelegramId(id)) return { ok: false, reason: "invalid-id" };

    const current = fs.readFileSync(file, "utf8");
    const next = applyAdminTelegramId(current, id);
    if (!next.updated) return { ok: false, reason: "missing-key" };

    fs.writeFileSync(file, next.content, "utf8");
    return { ok: true, file, telegramId: id };
}
