import { readOrDefault, type Store } from "./database.js";
import type {
  ContactInsight,
  ContactRecord,
  ContactRow,
  ConversationMetrics,
} from "../types/database.js";

export interface ListContactsOptions {
  includeMetrics?: boolean;
  includeInsights?: boolean;
  limit?: number;
  offset?: number;
}

export const CONTACT_COLUMNS = `
  c.jid, c.full_name, c.push_name, c.first_seen, c.last_updated,
  cm.last_message_date, cm.total_messages, cm.messages_sent, cm.messages_received,
  ci.connection_strength, ci.relationship_status, ci.days_since_last_contact, ci.mutual_group_count
`;

function toMetrics(row: ContactRow): ConversationMetrics | undefined {
  if (
    row.last_message_date === null &&
    row.total_messages === null &&
    row.messages_sent === null &&
    row.messages_received === null
  ) {
    return undefined;
  }
  return {
    lastMessageDate: row.last_message_date ?? undefined,
    totalMessages: row.total_messages ?? undefined,
    messagesSent: row.messages_sent ?? undefined,
    messagesReceived: row.messages_received ?? undefined,
  };
}

function toInsights(row: ContactRow): ContactInsight | undefined {
  if (
    row.connection_strength === null &&
    row.relationship_status === null &&
    row.days_since_last_contact === null &&
    row.mutual_group_count === null
  ) {
    return undefined;
  }
  return {
    connectionStrength: row.connection_strength ?? undefined,
    relationshipStatus: row.relationship_status ?? undefined,
    daysSinceLastContact: row.days_since_last_contact ?? undefined,
    mutualGroupCount: row.mutual_group_count ?? undefined,
  };
}

export function toContactRecord(
  row: ContactRow,
  include: { metrics: boolean; insights: boolean } = { metrics: true, insights: true },
): ContactRecord {
  return {
    jid: row.jid,
    fullName: row.full_name ?? undefined,
    pushName: row.push_name ?? undefined,
    firstSeen: row.first_seen ?? undefined,
    lastUpdated: row.last_updated ?? undefined,
    metrics: include.metrics ? toMetrics(row) : undefined,
    insights: include.insights ? toInsights(row) : undefined,
  };
}

// ─── Contact Reader ──────────────────────────────────────────────────────────

export function listContacts(store: Store, options: ListContactsOptions = {}): ContactRecord[] {
  const { includeMetrics = true, includeInsights = true, limit = 100, offset = 0 } = options;

  return readOrDefault<ContactRecord[]>(store, "listContacts", [], (db) => {
    const rows = db.raw
      .prepare<[number, number], ContactRow>(`
        SELECT ${CONTACT_COLUMNS}
        FROM contacts c
        LEFT JOIN conversation_metrics cm ON c.jid = cm.chat_jid
        LEFT JOIN contact_insights ci ON c.jid = ci.contact_jid
        ORDER BY julianday(cm.last_message_date) DESC NULLS LAST, c.jid ASC
        LIMIT ? OFFSET ?
      `)
      .all(limit, offset);

    return rows.map((row) =>
      toContactRecord(row, { metrics: includeMetrics, insights: includeInsights }),
    );
  });
}

export function getContact(store: Store, jid: string): ContactRecord | null {
  return readOrDefault<ContactRecord | null>(store, "getContact", null, (db) => {
    const row = db.raw
      .prepare<[string], ContactRow>(`
        SELECT ${CONTACT_COLUMNS}
        FROM contacts c
        LEFT JOIN conversation_metrics cm ON c.jid = cm.chat_jid
        LEFT JOIN contact_insights ci ON c.jid = ci.contact_jid
        WHERE c.jid = ?
      `)
      .get(jid);

    return row ? toContactRecord(row) : null;
  });
}
