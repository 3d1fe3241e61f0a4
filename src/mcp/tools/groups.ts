import { z } from "zod";
import type { Store } from "../../db/database.js";
import { getGroupInfo, listGroups } from "../../db/groups.js";
import { parseArgs } from "./args.js";

export const listGroupsArgs = z.object({
  includeMembers: z.boolean().default(false),
  limit: z.number().int().nonnegative().default(100),
  offset: z.number().int().nonnegative().default(0),
});

export const getGroupArgs = z.object({
  jid: z.string().min(1),
  includeMembers: z.boolean().default(true),
});

export function listGroupsTool(store: Store, args: unknown): string {
  const options = parseArgs("list_all_groups", listGroupsArgs, args);
  const groups = listGroups(store, options);
  return JSON.stringify({ total: groups.length, groups }, null, 2);
}

export function getGroupTool(store: Store, args: unknown): string {
  const { jid, includeMembers } = parseArgs("get_group_details", getGroupArgs, args);
  const group = getGroupInfo(store, jid, { includeMembers });
  if (!group) {
    throw new Error(`Group ${jid} not found`);
  }
  return JSON.stringify(group, null, 2);
}
