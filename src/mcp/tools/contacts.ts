import { z } from "zod";
import type { Store } from "../../db/database.js";
import { getContact, listContacts } from "../../db/contacts.js";
import { parseArgs } from "./args.js";

export const listContactsArgs = z.object({
  includeMetrics: z.boolean().default(true),
  includeInsights: z.boolean().default(true),
  limit: z.number().int().nonnegative().default(100),
  offset: z.number().int().nonnegative().default(0),
});

export const getContactArgs = z.object({
  jid: z.string().min(1),
});

export function listContactsTool(store: Store, args: unknown): string {
  const options = parseArgs("list_all_contacts", listContactsArgs, args);
  const contacts = listContacts(store, options);
  return JSON.stringify({ total: contacts.length, contacts }, null, 2);
}

export function getContactTool(store: Store, args: unknown): string {
  const { jid } = parseArgs("get_contact_details", getContactArgs, args);
  const contact = getContact(store, jid);
  if (!contact) {
    throw new Error(`Contact ${jid} not found`);
  }
  return JSON.stringify(contact, null, 2);
}
