// src/modules/orders/test/orders.service.spec.ts
import { OrdersService, type OrderHistoryRepo } from "../orders.service";

class FakeRepo implements OrderHistoryRepo {
    public calls: string[] = [];
    constructor(public orders: number, public items: number, private failDelete = false) {}
    async countOrders() { return this.orders; }
    async countOrderItems() { return this.items; }
    async countUsers() { return 4; }
    async countMedicines() { return 12; }
    async deleteAllOrders() {
        this.calls.push("delete");
        if (this.failDelete) throw new Error("lock wait timeout");
        this.orders = 0;
        this.items = 0;
    }
    async optimizeOrderTables() { this.calls.push("optimize"); }
}

describe("OrdersService.clearHistory", () => {
    beforeEach(() => {
        jest.spyOn(console, "log").mockImplementation(() => undefined);
    });
    afterEach(() => {
        jest.restoreAllMocks();
    });

    test("deletes orders and items, then optimizes", async () => {
        const repo = new FakeRepo(3, 7);
        const out = await new OrdersService(repo).clearHistory();
        expect(out).toEqual({
            skipped: false,
            dryRun: false,
            foundOrders: 3,
            foundItems: 7,
            remainingOrders: 0,
            remainingItems: 0,
        });
        expect(repo.calls).toEqual(["delete", "optimize"]);
    });

    test("skips when there are no orders", async () => {
        const repo = new FakeRepo(0, 2);
        const out = await new OrdersService(repo).clearHistory();
        expect(out.skipped).toBe(true);
        expect(out.remainingItems).toBe(2);
        expect(repo.calls).toEqual([]);
    });

    test("dry run only counts", async () => {
        const repo = new FakeRepo(5, 9);
        const out = await new OrdersService(repo).clearHistory({ dryRun: true });
        expect(out).toMatchObject({ skipped: false, dryRun: true, remainingOrders: 5, remainingItems: 9 });
        expect(repo.calls).toEqual([]);
    });

    test("optimize can be turned off", async () => {
        const repo = new FakeRepo(1, 1);
        await new OrdersService(repo).clearHistory({ optimize: false });
        expect(repo.calls).toEqual(["delete"]);
    });

    test("propagates a failed delete", async () => {
        const repo = new FakeRepo(1, 1, true);
        await expect(new OrdersService(repo).clearHistory()).rejects.toThrow("lock wait timeout");
        expect(repo.calls).toEqual(["delete"]);
    });
});

describe("OrdersService.verifyOtherData", () => {
    test("reports users and medicines", async () => {
        const out = await new OrdersService(new FakeRepo(0, 0)).verifyOtherData();
        expect(out).toEqual({ users: 4, medicines: 12 });
    });
});
