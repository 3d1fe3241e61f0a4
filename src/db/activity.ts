import { readOrDefault, type Store } from "./database.js";
import { CONTACT_COLUMNS, toContactRecord } from "./contacts.js";
import type { ContactRecord, ContactRow, DormantContactRow } from "../types/database.js";

export interface ActivityOptions {
  days?: number;
  limit?: number;
  /** Reference time for the recency threshold. Defaults to the call time. */
  now?: Date;
}

/** Formats a date the way SQLite's datetime() does: `YYYY-MM-DD HH:MM:SS` in UTC. */
export function toSqliteTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace("T", " ");
}

// Contacts without a metrics row are excluded by the inner join. The two listings share
// one cutoff comparison (>= vs <) so together they cover every contact with a last message.
// The cutoff stays a julian day number in SQL; it may fall before year 0.

export function listActiveContacts(store: Store, options: ActivityOptions = {}): ContactRecord[] {
  const { days = 30, limit = 100, now = new Date() } = options;

  return readOrDefault<ContactRecord[]>(store, "listActiveContacts", [], (db) =>
    db.raw
      .prepare<[string, number, number], ContactRow>(`
        SELECT ${CONTACT_COLUMNS}
        FROM contacts c
        JOIN conversation_metrics cm ON c.jid = cm.chat_jid
        LEFT JOIN contact_insights ci ON c.jid = ci.contact_jid
        WHERE julianday(cm.last_message_date) >= julianday(?) - ?
        ORDER BY julianday(cm.last_message_date) DESC, c.jid ASC
        LIMIT ?
      `)
      .all(toSqliteTimestamp(now), days, limit)
      .map((row) => toContactRecord(row)),
  );
}

export function listDormantContacts(store: Store, options: ActivityOptions = {}): ContactRecord[] {
  const { days = 90, limit = 100, now = new Date() } = options;

  return readOrDefault<ContactRecord[]>(store, "listDormantContacts", [], (db) => {
    const reference = toSqliteTimestamp(now);
    return db.raw
      .prepare<[string, string, number, number], DormantContactRow>(`
        SELECT ${CONTACT_COLUMNS},
          julianday(?) - julianday(cm.last_message_date) AS days_since_last_message
        FROM contacts c
        JOIN conversation_metrics cm ON c.jid = cm.chat_jid
        LEFT JOIN contact_insights ci ON c.jid = ci.contact_jid
        WHERE julianday(cm.last_message_date) < julianday(?) - ?
        ORDER BY julianday(cm.last_message_date) ASC, c.jid ASC
        LIMIT ?
      `)
      .all(reference, reference, days, limit)
      .map((row) => ({
        ...toContactRecord(row),
        daysSinceLastMessage: row.days_since_last_message ?? undefined,
      }));
  });
}
