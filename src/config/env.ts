// src/config/env.ts
import * as dotenv from "dotenv";
dotenv.config();

function req(name: string, fallback?: string) {
  const v = process.env[name] ?? fallback;
  if (v === undefined) throw new Error(`Missing env var: ${name}`);
  return v;
}

/** Integer env var, or null when unset/blank/not a number. */
function optInt(name: string): number | null {
  const raw = (process.env[name] ?? "").trim();
  if (!raw) return null;
  const n = Number(raw);
  return Number.isInteger(n) ? n : null;
}

export const env = {
  nodeEnv: process.env.NODE_ENV ?? "development",
  port: Number(process.env.PORT ?? 3000),

  db: {
    host: req("DB_HOST"),
    port: Number(req("DB_PORT", "3306")),
    user: req("DB_USER"),
    password: req("DB_PASSWORD"),
    name: req("DB_NAME"),
    connLimit: Number(req("DB_CONN_LIMIT", "10")),
  },

  /** Comma-separated CORS origins */
  corsOrigin: (process.env.CORS_ORIGIN ?? "").split(",").filter(Boolean),

  /** Telegram bot */
  bot: {
    token: process.env.BOT_TOKEN || "",
    adminTelegramId: optInt("ADMIN_TELEGRAM_ID"),
  },

  business: {
    name: process.env.BUSINESS_NAME || "Pharmacy",
    phone: process.env.CONTACT_PHONE || "",
    email: process.env.CONTACT_EMAIL || "",
  },

  /** Medicine search ranking */
  search: {
    threshold: Number(process.env.SEARCH_THRESHOLD || 0.3),
    maxResults: Number(process.env.SEARCH_MAX_RESULTS || 5),
  },
};
