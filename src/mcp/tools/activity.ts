import { z } from "zod";
import type { Store } from "../../db/database.js";
import { listActiveContacts, listDormantContacts } from "../../db/activity.js";
import { parseArgs } from "./args.js";

// About ten thousand years; SQLite dates end at 9999.
const MAX_ACTIVITY_DAYS = 3_650_000;

const activityArgs = (defaultDays: number) =>
  z.object({
    days: z.number().int().nonnegative().max(MAX_ACTIVITY_DAYS).default(defaultDays),
    limit: z.number().int().nonnegative().default(100),
  });

export const activeContactsArgs = activityArgs(30);
export const dormantContactsArgs = activityArgs(90);

export function listActiveContactsTool(store: Store, args: unknown): string {
  const { days, limit } = parseArgs("list_active_contacts", activeContactsArgs, args);
  const contacts = listActiveContacts(store, { days, limit });
  return JSON.stringify({ days, total: contacts.length, contacts }, null, 2);
}

export function listDormantContactsTool(store: Store, args: unknown): string {
  const { days, limit } = parseArgs("list_dormant_contacts", dormantContactsArgs, args);
  const contacts = listDormantContacts(store, { days, limit });
  return JSON.stringify({ days, total: contacts.length, contacts }, null, 2);
}
