// src/modules/users/test/users.service.spec.ts
import { UsersService, type UsersReader } from "../users.service";
import { parseUserType, type BotUser, type UserType } from "../../../types/domain";

function user(telegramId: number, userType: UserType): BotUser {
    return { id: telegramId, telegramId, username: null, firstName: "Test", lastName: null, userType, isActive: true };
}

class FakeRepo implements UsersReader {
    constructor(private users: BotUser[]) {}
    async getByTelegramId(telegramId: number) {
        return this.users.find(u => u.telegramId === telegramId) ?? null;
    }
}

describe("UsersService.adminStatus", () => {
    const svc = new UsersService(new FakeRepo([user(100, "admin"), user(200, "staff"), user(300, "customer")]));

    test("no admin id configured", async () => {
        expect(await svc.adminStatus(null)).toEqual({ configured: false });
    });

    test("admin is admin and staff", async () => {
        expect(await svc.adminStatus(100)).toMatchObject({ configured: true, telegramId: 100, isAdmin: true, isStaff: true });
    });

    test("staff and customer roles", async () => {
        expect(await svc.adminStatus(200)).toMatchObject({ isAdmin: false, isStaff: true });
        expect(await svc.adminStatus(300)).toMatchObject({ isAdmin: false, isStaff: false });
    });

    test("unknown user", async () => {
        expect(await svc.adminStatus(999)).toEqual({
            configured: true,
            telegramId: 999,
            user: null,
            isAdmin: false,
            isStaff: false,
        });
    });
});

describe("parseUserType", () => {
    test("normalizes case and falls back to customer", () => {
        expect(parseUserType(" Admin ")).toBe("admin");
        expect(parseUserType(null)).toBe("customer");
        expect(parseUserType("owner")).toBe("customer");
    });
});
