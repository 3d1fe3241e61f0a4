import type BetterSqlite3 from "better-sqlite3";

/**
 * Creates the tables the readers consume. The store is normally populated by the
 * ingestion job, so every statement is IF NOT EXISTS and nothing is altered.
 */
export function runMigrations(db: BetterSqlite3.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS chats (
      jid TEXT PRIMARY KEY,
      name TEXT,
      last_message_time TIMESTAMP
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS contacts (
      jid TEXT PRIMARY KEY,
      full_name TEXT,
      push_name TEXT,
      first_seen TIMESTAMP,
      last_updated TIMESTAMP
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS groups (
      jid TEXT PRIMARY KEY,
      name TEXT,
      description TEXT,
      created_at TIMESTAMP
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS group_members (
      group_jid TEXT NOT NULL,
      member_jid TEXT NOT NULL,
      is_admin INTEGER NOT NULL DEFAULT 0,
      is_super_admin INTEGER NOT NULL DEFAULT 0,
      joined_at TIMESTAMP,
      left_at TIMESTAMP,
      added_by_jid TEXT,
      PRIMARY KEY (group_jid, member_jid)
    )
  `);

  db.exec("CREATE INDEX IF NOT EXISTS idx_group_members_member ON group_members(member_jid)");

  db.exec(`
    CREATE TABLE IF NOT EXISTS conversation_metrics (
      chat_jid TEXT PRIMARY KEY,
      last_message_date TIMESTAMP,
      total_messages INTEGER NOT NULL DEFAULT 0,
      messages_sent INTEGER NOT NULL DEFAULT 0,
      messages_received INTEGER NOT NULL DEFAULT 0
    )
  `);

  db.exec(
    "CREATE INDEX IF NOT EXISTS idx_metrics_last_message ON conversation_metrics(last_message_date DESC)",
  );

  db.exec(`
    CREATE TABLE IF NOT EXISTS contact_insights (
      contact_jid TEXT PRIMARY KEY,
      connection_strength REAL,
      relationship_status TEXT,
      days_since_last_contact INTEGER,
      mutual_group_count INTEGER
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS conversation_topics (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      chat_jid TEXT NOT NULL,
      keyword TEXT NOT NULL,
      mention_count INTEGER NOT NULL DEFAULT 1,
      importance_score REAL,
      last_mentioned TIMESTAMP,
      UNIQUE (chat_jid, keyword)
    )
  `);

  db.exec("CREATE INDEX IF NOT EXISTS idx_topics_chat ON conversation_topics(chat_jid)");
  db.exec(
    "CREATE INDEX IF NOT EXISTS idx_topics_rank ON conversation_topics(importance_score DESC, mention_count DESC)",
  );

  db.exec(`
    CREATE TABLE IF NOT EXISTS interesting_topics (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      keyword TEXT NOT NULL UNIQUE,
      category TEXT,
      importance REAL NOT NULL DEFAULT 1.0,
      notify_on_mention INTEGER NOT NULL DEFAULT 0,
      notes TEXT,
      created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS topic_alerts (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      topic_keyword TEXT NOT NULL,
      chat_jid TEXT NOT NULL,
      detected_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP,
      acknowledged INTEGER NOT NULL DEFAULT 0
    )
  `);

  db.exec(
    "CREATE INDEX IF NOT EXISTS idx_alerts_pending ON topic_alerts(acknowledged, detected_at DESC)",
  );
}
