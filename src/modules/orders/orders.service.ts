// src/modules/orders/orders.service.ts
import type { OrdersRepo } from "./orders.repo";

export type OrderHistoryRepo = Pick<
    OrdersRepo,
    "countOrders" | "countOrderItems" | "countUsers" | "countMedicines" | "deleteAllOrders" | "optimizeOrderTables"
>;

export interface ClearHistoryResult {
    /** Nothing to delete. */
    skipped: boolean;
    dryRun: boolean;
    foundOrders: number;
    foundItems: number;
    remainingOrders: number;
    remainingItems: number;
}

export interface PreservedCounts {
    users: number;
    medicines: number;
}

export class OrdersService {
    constructor(private repo: OrderHistoryRepo) {}

    /**
     * Remove every order and order item; users, medicines and settings are untouched.
     * Returns the counts before and after.
     */
    async clearHistory(opts: { dryRun?: boolean; optimize?: boolean } = {}): Promise<ClearHistoryResult> {
        const dryRun = opts.dryRun ?? false;
        const foundOrders = await this.repo.countOrders();
        const foundItems = await this.repo.countOrderItems();
        console.log("[orders] found", { orders: foundOrders, items: foundItems });

        const unchanged = { foundOrders, foundItems, remainingOrders: foundOrders, remainingItems: foundItems };
        if (foundOrders === 0) {
            console.log("[orders] no orders found → nothing to clear");
            return { skipped: true, dryRun, ...unchanged };
        }
        if (dryRun) {
            console.log("[orders] dry run → not deleting");
            return { skipped: false, dryRun, ...unchanged };
        }

        await this.repo.deleteAllOrders();
        const remainingOrders = await this.repo.countOrders();
        const remainingItems = await this.repo.countOrderItems();
        console.log("[orders] cleared", { remainingOrders, remainingItems });

        if (opts.optimize ?? true) {
            console.log("[orders] optimizing order tables");
            await this.repo.optimizeOrderTables();
        }

        return { skipped: false, dryRun, foundOrders, foundItems, remainingOrders, remainingItems };
    }

    async verifyOtherData(): Promise<PreservedCounts> {
        const [users, medicines] = await Promise.all([this.repo.countUsers(), this.repo.countMedicines()]);
        return { users, medicines };
    }
}
