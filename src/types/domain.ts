// src/types/domain.ts
// === Core domain models (subset of the bot's DB columns) ===

export type ID = number;

export type UserType = "customer" | "staff" | "admin";

export interface Medicine {
    id: ID;
    name: string;
    therapeuticCategory: string | null;
    dosageForm: string | null;
    manufacturingDate: string | null; // YYYY-MM-DD
    expiringDate: string | null;      // YYYY-MM-DD
    price: number;
    stockQuantity: number;
}

export interface BotUser {
    id: ID;
    telegramId: number;
    username: string | null;
    firstName: string;
    lastName: string | null;
    userType: UserType;
    isActive: boolean;
}

export interface ContactSetting {
    key: string;
    value: string | null;
}

// === Search ===
export interface SearchOptions {
    /** Drop candidates scoring below this. */
    threshold: number;
    maxResults: number;
}

export type Scored<T> = T & { score: number };

// === Helpers ===
const USER_TYPES: readonly UserType[] = ["customer", "staff", "admin"];

/** Unknown/NULL roles fall back to "customer". */
export function parseUserType(v: unknown): UserType {
    const s = String(v ?? "").trim().toLowerCase();
    return USER_TYPES.find(t => t === s) ?? "customer";
}
