// ─── Contacts ────────────────────────────────────────────────────────────────

export interface ContactRow {
  jid: string;
  full_name: string | null;
  push_name: string | null;
  first_seen: string | null;
  last_updated: string | null;
  last_message_date: string | null;
  total_messages: number | null;
  messages_sent: number | null;
  messages_received: number | null;
  connection_strength: number | null;
  relationship_status: string | null;
  days_since_last_contact: number | null;
  mutual_group_count: number | null;
}

export interface DormantContactRow extends ContactRow {
  days_since_last_message: number | null;
}

export interface ConversationMetrics {
  lastMessageDate?: string;
  totalMessages?: number;
  messagesSent?: number;
  messagesReceived?: number;
}

export interface ContactInsight {
  connectionStrength?: number;
  relationshipStatus?: string;
  daysSinceLastContact?: number;
  mutualGroupCount?: number;
}

export interface ContactRecord {
  jid: string;
  fullName?: string;
  pushName?: string;
  firstSeen?: string;
  lastUpdated?: string;
  metrics?: ConversationMetrics;
  insights?: ContactInsight;
  /** Only set by the dormant-contact listing. */
  daysSinceLastMessage?: number;
}

// ─── Groups ──────────────────────────────────────────────────────────────────

export interface GroupRow {
  jid: string;
  name: string | null;
  description: string | null;
  created_at: string | null;
  current_member_count: number;
  total_messages: number | null;
  last_message_date: string | null;
}

export interface GroupMemberRow {
  member_jid: string;
  full_name: string | null;
  push_name: string | null;
  is_admin: number;
  is_super_admin: number;
  joined_at: string | null;
  left_at: string | null;
  added_by_jid: string | null;
}

export interface GroupMemberRecord {
  memberJid: string;
  fullName?: string;
  pushName?: string;
  isAdmin: boolean;
  isSuperAdmin: boolean;
  joinedAt?: string;
  leftAt?: string;
  addedByJid?: string;
  active: boolean;
}

export interface GroupRecord {
  jid: string;
  name?: string;
  description?: string;
  createdAt?: string;
  currentMemberCount: number;
  totalMessages?: number;
  lastMessageDate?: string;
  members?: GroupMemberRecord[];
}

// ─── Topics ──────────────────────────────────────────────────────────────────

export interface TopicRow {
  id: number;
  chat_jid: string;
  chat_name: string | null;
  keyword: string;
  mention_count: number;
  importance_score: number | null;
  last_mentioned: string | null;
}

export interface TopicRecord {
  id: number;
  chatJid: string;
  chatName?: string;
  keyword: string;
  mentionCount: number;
  importanceScore?: number;
  lastMentioned?: string;
}

export interface TrackedTopicRow {
  id: number;
  keyword: string;
  category: string | null;
  importance: number;
  notify_on_mention: number;
  notes: string | null;
  created_at: string | null;
}

export interface TrackedTopicRecord {
  id: number;
  keyword: string;
  category?: string;
  importance: number;
  notifyOnMention: boolean;
  notes?: string;
  createdAt?: string;
}

export interface NewTrackedTopic {
  keyword: string;
  category?: string;
  importance?: number;
  notifyOnMention?: boolean;
  notes?: string;
}

export type AddTrackedTopicResult =
  | { success: true; message: string; id: number }
  | { success: false; message: string };

// ─── Alerts ──────────────────────────────────────────────────────────────────

export interface AlertRow {
  id: number;
  topic_keyword: string;
  chat_jid: string;
  chat_name: string | null;
  detected_at: string | null;
  acknowledged: number;
  category: string | null;
  importance: number | null;
}

export interface AlertRecord {
  id: number;
  topicKeyword: string;
  chatJid: string;
  chatName?: string;
  detectedAt?: string;
  acknowledged: boolean;
  category?: string;
  importance?: number;
}
