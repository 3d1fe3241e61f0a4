import { z } from "zod";
import type { Store } from "../../db/database.js";
import { addTrackedTopic, listTopics, listTrackedTopics } from "../../db/topics.js";
import { parseArgs } from "./args.js";

export const listTopicsArgs = z.object({
  chatJid: z.string().optional(),
  keyword: z.string().optional(),
  limit: z.number().int().nonnegative().default(50),
  minMentions: z.number().int().default(2),
});

// importance is documented as 0.0-10.0 but is stored as given.
export const addTopicArgs = z.object({
  keyword: z.string().trim().min(1),
  category: z.string().optional(),
  importance: z.number().finite().default(1.0),
  notifyOnMention: z.boolean().default(false),
  notes: z.string().optional(),
});

export function listTopicsTool(store: Store, args: unknown): string {
  const options = parseArgs("list_conversation_topics", listTopicsArgs, args);
  const topics = listTopics(store, options);
  return JSON.stringify({ total: topics.length, topics }, null, 2);
}

export function listTrackedTopicsTool(store: Store): string {
  const topics = listTrackedTopics(store);
  return JSON.stringify({ total: topics.length, topics }, null, 2);
}

export function addTrackedTopicTool(store: Store, args: unknown): string {
  const topic = parseArgs("add_topic_to_track", addTopicArgs, args);
  return JSON.stringify(addTrackedTopic(store, topic), null, 2);
}
