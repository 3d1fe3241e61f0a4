import { readOrDefault, type Store } from "./database.js";
import type { AlertRecord, AlertRow } from "../types/database.js";

export interface ListAlertsOptions {
  acknowledged?: boolean;
  limit?: number;
}

function toAlertRecord(row: AlertRow): AlertRecord {
  return {
    id: row.id,
    topicKeyword: row.topic_keyword,
    chatJid: row.chat_jid,
    chatName: row.chat_name ?? undefined,
    detectedAt: row.detected_at ?? undefined,
    acknowledged: row.acknowledged === 1,
    category: row.category ?? undefined,
    importance: row.importance ?? undefined,
  };
}

/**
 * Alerts whose tracked topic or chat no longer exists are dropped by the inner joins.
 */
export function listTopicAlerts(store: Store, options: ListAlertsOptions = {}): AlertRecord[] {
  const { acknowledged = false, limit = 100 } = options;

  return readOrDefault<AlertRecord[]>(store, "listTopicAlerts", [], (db) =>
    db.raw
      .prepare<[number, number], AlertRow>(`
        SELECT
          ta.id, ta.topic_keyword, ta.chat_jid, c.name AS chat_name,
          ta.detected_at, ta.acknowledged, it.category, it.importance
        FROM topic_alerts ta
        JOIN interesting_topics it ON ta.topic_keyword = it.keyword
        JOIN chats c ON ta.chat_jid = c.jid
        WHERE ta.acknowledged = ?
        ORDER BY julianday(ta.detected_at) DESC NULLS LAST, ta.id DESC
        LIMIT ?
      `)
      .all(acknowledged ? 1 : 0, limit)
      .map(toAlertRecord),
  );
}
