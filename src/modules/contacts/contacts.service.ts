// src/modules/contacts/contacts.service.ts
import type { ContactSetting } from "../../types/domain";
import type { ContactsRepo } from "./contacts.repo";

export const CONTACTS_TABLE = "contact_settings";

export type ContactsReader = Pick<ContactsRepo, "tableExists" | "listSettings">;

export interface ContactsInspection {
    tableFound: boolean;
    settings: ContactSetting[];
}

export class ContactsService {
    constructor(private repo: ContactsReader) {}

    async inspect(): Promise<ContactsInspection> {
        if (!(await this.repo.tableExists(CONTACTS_TABLE))) {
            return { tableFound: false, settings: [] };
        }
        return { tableFound: true, settings: await this.repo.listSettings() };
    }
}
