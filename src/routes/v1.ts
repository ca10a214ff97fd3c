// src/routes/v1.ts
import { Router } from "express";
import { pool } from "../db";
import { env } from "../config/env";
import { MedicinesRepo } from "../modules/medicines/medicines.repo";
import { MedicinesService } from "../modules/medicines/medicines.service";
import { ContactsRepo } from "../modules/contacts/contacts.repo";
import { ContactsService } from "../modules/contacts/contacts.service";

import { medicinesRouter } from "./medicines";
import { contactsRouter } from "./contacts";

const v1 = Router();

v1.use("/medicines", medicinesRouter(new MedicinesService(new MedicinesRepo(pool), env.search)));
v1.use("/contacts",  contactsRouter(new ContactsService(new ContactsRepo(pool))));

export default v1;
