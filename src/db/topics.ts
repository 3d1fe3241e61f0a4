import { readOrDefault, type Store } from "./database.js";
import { isUniqueViolation } from "./errors.js";
import { logger } from "../utils/logger.js";
import type {
  AddTrackedTopicResult,
  NewTrackedTopic,
  TopicRecord,
  TopicRow,
  TrackedTopicRecord,
  TrackedTopicRow,
} from "../types/database.js";

export interface ListTopicsOptions {
  chatJid?: string;
  keyword?: string;
  limit?: number;
  minMentions?: number;
}

/** Escapes LIKE wildcards so the keyword matches as a literal substring. */
export function likeSubstring(value: string): string {
  return `%${value.replace(/[\\%_]/g, (ch) => `\\${ch}`)}%`;
}

function toTopicRecord(row: TopicRow): TopicRecord {
  return {
    id: row.id,
    chatJid: row.chat_jid,
    chatName: row.chat_name ?? undefined,
    keyword: row.keyword,
    mentionCount: row.mention_count,
    importanceScore: row.importance_score ?? undefined,
    lastMentioned: row.last_mentioned ?? undefined,
  };
}

function toTrackedTopicRecord(row: TrackedTopicRow): TrackedTopicRecord {
  return {
    id: row.id,
    keyword: row.keyword,
    category: row.category ?? undefined,
    importance: row.importance,
    notifyOnMention: row.notify_on_mention === 1,
    notes: row.notes ?? undefined,
    createdAt: row.created_at ?? undefined,
  };
}

// ─── Conversation topics ─────────────────────────────────────────────────────

export function listTopics(store: Store, options: ListTopicsOptions = {}): TopicRecord[] {
  const { chatJid, keyword, limit = 50, minMentions = 2 } = options;

  const whereClauses: string[] = ["ct.mention_count >= ?"];
  const params: unknown[] = [minMentions];

  if (chatJid) {
    whereClauses.push("ct.chat_jid = ?");
    params.push(chatJid);
  }
  if (keyword) {
    whereClauses.push("ct.keyword LIKE ? ESCAPE '\\'");
    params.push(likeSubstring(keyword));
  }
  params.push(limit);

  const sql = `
    SELECT
      ct.id, ct.chat_jid, c.name AS chat_name, ct.keyword,
      ct.mention_count, ct.importance_score, ct.last_mentioned
    FROM conversation_topics ct
    JOIN chats c ON ct.chat_jid = c.jid
    WHERE ${whereClauses.join(" AND ")}
    ORDER BY ct.importance_score DESC, ct.mention_count DESC
    LIMIT ?
  `;

  return readOrDefault<TopicRecord[]>(store, "listTopics", [], (db) =>
    db.raw.prepare<unknown[], TopicRow>(sql).all(...params).map(toTopicRecord),
  );
}

// ─── Tracked topics ──────────────────────────────────────────────────────────

export function listTrackedTopics(store: Store): TrackedTopicRecord[] {
  return readOrDefault<TrackedTopicRecord[]>(store, "listTrackedTopics", [], (db) =>
    db.raw
      .prepare<[], TrackedTopicRow>(`
        SELECT id, keyword, category, importance, notify_on_mention, notes, created_at
        FROM interesting_topics
        ORDER BY importance DESC, keyword ASC
      `)
      .all()
      .map(toTrackedTopicRecord),
  );
}

/**
 * Inserts a tracked topic. Never throws: a keyword that is already tracked and any
 * other storage failure both come back as `success: false` with a message.
 */
export function addTrackedTopic(store: Store, topic: NewTrackedTopic): AddTrackedTopicResult {
  const { keyword, category, importance = 1.0, notifyOnMention = false, notes } = topic;

  try {
    const id = store.write((db) => {
      const info = db.raw
        .prepare(`
          INSERT INTO interesting_topics (keyword, category, importance, notify_on_mention, notes)
          VALUES (?, ?, ?, ?, ?)
        `)
        .run(keyword, category ?? null, importance, notifyOnMention ? 1 : 0, notes ?? null);
      return Number(info.lastInsertRowid);
    });

    logger.info(`[topics] tracking "${keyword}" (#${id})`);
    return { success: true, message: `Added topic: ${keyword}`, id };
  } catch (error) {
    if (isUniqueViolation(error)) {
      return { success: false, message: `Topic '${keyword}' already exists` };
    }
    const detail = error instanceof Error ? error.message : String(error);
    logger.error("[topics] addTrackedTopic failed:", detail);
    return { success: false, message: `Database error: ${detail}` };
  }
}
