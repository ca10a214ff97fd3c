// src/routes/medicines.ts
import { Router } from "express";
import { parseBounded } from "../utils/validators";
import { HttpError } from "../utils/httpError";
import type { MedicinesService } from "../modules/medicines/medicines.service";

export type MedicineQueries = Pick<MedicinesService, "search" | "catalogue">;

export const MAX_LIMIT = 50;

export function medicinesRouter(svc: MedicineQueries) {
    const router = Router();

    /**
     * GET /api/v1/medicines/search?q=med%2099&limit=5&threshold=0.3
     *   - q         = free text (required)
     *   - limit     = 1..50, defaults to SEARCH_MAX_RESULTS
     *   - threshold = 0..1, defaults to SEARCH_THRESHOLD
     */
    router.get("/search", async (req, res, next) => {
        try {
            const q = typeof req.query.q === "string" ? req.query.q : "";
            if (!q.trim()) throw new HttpError(400, "q is required");

            const results = await svc.search(q, {
                maxResults: parseBounded(req.query.limit, 1, MAX_LIMIT),
                threshold: parseBounded(req.query.threshold, 0, 1),
            });
            res.json({ query: q, results });
        } catch (err) {
            next(err);
        }
    });

    /** GET /api/v1/medicines → active medicines grouped by therapeutic category */
    router.get("/", async (_req, res, next) => {
        try {
            res.json(await svc.catalogue());
        } catch (err) {
            next(err);
        }
    });

    return router;
}
