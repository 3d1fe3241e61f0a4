import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { Store } from "../database.js";

export type SeedValue = string | number | null;

export interface TestStore {
  store: Store;
  dir: string;
}

export function createTestStore(): TestStore {
  const dir = mkdtempSync(join(tmpdir(), "chat-insights-test-"));
  const store = new Store(join(dir, "messages.db"));
  store.migrate();
  return { store, dir };
}

export function removeTestStore({ dir }: TestStore): void {
  rmSync(dir, { recursive: true, force: true });
}

export function insertRows(store: Store, table: string, rows: Record<string, SeedValue>[]): void {
  store.write((db) => {
    for (const row of rows) {
      const columns = Object.keys(row);
      db.raw
        .prepare(`INSERT INTO ${table} (${columns.join(", ")}) VALUES (${columns.map(() => "?").join(", ")})`)
        .run(...Object.values(row));
    }
  });
}

export const ALICE = "111@s.whatsapp.net";
export const BOB = "222@s.whatsapp.net";
export const CAROL = "333@s.whatsapp.net";
export const DAN = "444@s.whatsapp.net";
export const EVE = "555@s.whatsapp.net";
export const STRANGER = "999@s.whatsapp.net";

export const BOOK_CLUB = "120363001@g.us";
export const HIKING = "120363002@g.us";
export const OLD_PROJECT = "120363003@g.us";

/**
 * Contacts, groups, memberships and mined topics shared by the reader suites.
 *
 * Activity: Bob (Oct 15) > Alice (Oct 10) > Dan (May 1); Carol and Eve have no metrics.
 */
export function seedDirectory(store: Store): void {
  insertRows(store, "contacts", [
    { jid: ALICE, full_name: "Alice Moreno", push_name: "Ali", first_seen: "2025-01-05 10:00:00", last_updated: "2026-10-10 09:00:00" },
    { jid: BOB, full_name: "Bob Lee", push_name: null, first_seen: "2025-02-01 08:00:00", last_updated: null },
    { jid: CAROL, full_name: "Carol Diaz", push_name: "caro", first_seen: null, last_updated: null },
    { jid: DAN, full_name: null, push_name: "danny", first_seen: null, last_updated: null },
    { jid: EVE, full_name: "Eve Park", push_name: null, first_seen: null, last_updated: null },
  ]);

  insertRows(store, "conversation_metrics", [
    { chat_jid: ALICE, last_message_date: "2026-10-10 09:00:00", total_messages: 40, messages_sent: 15, messages_received: 25 },
    { chat_jid: BOB, last_message_date: "2026-10-15 12:00:00", total_messages: 5, messages_sent: 2, messages_received: 3 },
    { chat_jid: DAN, last_message_date: "2026-05-01 08:00:00", total_messages: 12, messages_sent: 6, messages_received: 6 },
    { chat_jid: BOOK_CLUB, last_message_date: "2026-10-16 20:00:00", total_messages: 300, messages_sent: 20, messages_received: 280 },
    { chat_jid: HIKING, last_message_date: "2026-09-01 07:30:00", total_messages: 50, messages_sent: 10, messages_received: 40 },
  ]);

  insertRows(store, "contact_insights", [
    { contact_jid: ALICE, connection_strength: 0.8, relationship_status: "close", days_since_last_contact: 8, mutual_group_count: 3 },
    { contact_jid: DAN, connection_strength: 0.2, relationship_status: "fading", days_since_last_contact: 170, mutual_group_count: 1 },
  ]);

  insertRows(store, "groups", [
    { jid: BOOK_CLUB, name: "Book Club", description: "Monthly reads", created_at: "2024-03-01 10:00:00" },
    { jid: HIKING, name: "Hiking", description: null, created_at: null },
    { jid: OLD_PROJECT, name: "Old Project", description: null, created_at: null },
  ]);

  insertRows(store, "group_members", [
    { group_jid: BOOK_CLUB, member_jid: ALICE, is_admin: 1, is_super_admin: 0, joined_at: "2024-03-05 09:00:00", left_at: null, added_by_jid: BOB },
    { group_jid: BOOK_CLUB, member_jid: BOB, is_admin: 0, is_super_admin: 1, joined_at: "2024-03-10 09:00:00", left_at: null, added_by_jid: null },
    { group_jid: BOOK_CLUB, member_jid: CAROL, is_admin: 0, is_super_admin: 0, joined_at: "2024-02-01 09:00:00", left_at: "2025-06-01 00:00:00", added_by_jid: ALICE },
    { group_jid: BOOK_CLUB, member_jid: DAN, is_admin: 0, is_super_admin: 0, joined_at: "2024-04-01 09:00:00", left_at: null, added_by_jid: ALICE },
    { group_jid: BOOK_CLUB, member_jid: STRANGER, is_admin: 0, is_super_admin: 0, joined_at: "2024-05-01 09:00:00", left_at: null, added_by_jid: null },
    { group_jid: HIKING, member_jid: EVE, is_admin: 0, is_super_admin: 0, joined_at: "2025-01-01 09:00:00", left_at: null, added_by_jid: null },
  ]);

  insertRows(store, "chats", [
    { jid: BOOK_CLUB, name: "Book Club" },
    { jid: ALICE, name: "Alice Moreno" },
  ]);

  insertRows(store, "conversation_topics", [
    { chat_jid: BOOK_CLUB, keyword: "murakami", mention_count: 9, importance_score: 7.5, last_mentioned: "2026-10-16 19:00:00" },
    { chat_jid: BOOK_CLUB, keyword: "book_fair", mention_count: 3, importance_score: 4.0, last_mentioned: null },
    { chat_jid: ALICE, keyword: "bookshelf", mention_count: 2, importance_score: 4.0, last_mentioned: null },
    { chat_jid: ALICE, keyword: "budget", mention_count: 5, importance_score: 6.0, last_mentioned: "2026-10-09 18:00:00" },
    { chat_jid: BOOK_CLUB, keyword: "coffee", mention_count: 1, importance_score: 9.0, last_mentioned: null },
    // no chats row for this chat
    { chat_jid: "888@s.whatsapp.net", keyword: "bookkeeping", mention_count: 6, importance_score: 8.0, last_mentioned: null },
  ]);
}
