// src/modules/users/users.service.ts
import type { BotUser } from "../../types/domain";
import type { UsersRepo } from "./users.repo";

export type UsersReader = Pick<UsersRepo, "getByTelegramId">;

export type AdminStatus =
    | { configured: false }
    | { configured: true; telegramId: number; user: BotUser | null; isAdmin: boolean; isStaff: boolean };

export class UsersService {
    constructor(private repo: UsersReader) {}

    /** Admins are staff too. */
    async adminStatus(adminTelegramId: number | null): Promise<AdminStatus> {
        if (adminTelegramId == null) return { configured: false };

        const user = await this.repo.getByTelegramId(adminTelegramId);
        const role = user?.userType;
        return {
            configured: true,
            telegramId: adminTelegramId,
            user,
            isAdmin: role === "admin",
            isStaff: role === "admin" || role === "staff",
        };
    }
}
