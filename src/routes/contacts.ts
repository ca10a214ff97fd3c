// src/routes/contacts.ts
import { Router } from "express";
import type { ContactsService } from "../modules/contacts/contacts.service";

export function contactsRouter(svc: Pick<ContactsService, "inspect">) {
    const router = Router();

    /** GET /api/v1/contacts → { tableFound, settings: [{ key, value }] } */
    router.get("/", async (_req, res, next) => {
        try {
            res.json(await svc.inspect());
        } catch (err) {
            next(err);
        }
    });

    return router;
}
