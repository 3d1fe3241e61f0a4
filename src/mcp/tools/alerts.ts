import { z } from "zod";
import type { Store } from "../../db/database.js";
import { listTopicAlerts } from "../../db/alerts.js";
import { parseArgs } from "./args.js";

export const listAlertsArgs = z.object({
  acknowledged: z.boolean().default(false),
  limit: z.number().int().nonnegative().default(100),
});

export function listTopicAlertsTool(store: Store, args: unknown): string {
  const options = parseArgs("list_topic_alerts", listAlertsArgs, args);
  const alerts = listTopicAlerts(store, options);
  return JSON.stringify({ total: alerts.length, alerts }, null, 2);
}
