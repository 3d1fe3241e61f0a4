import { readOrDefault, type Store } from "./database.js";
import type {
  GroupMemberRecord,
  GroupMemberRow,
  GroupRecord,
  GroupRow,
} from "../types/database.js";

export interface ListGroupsOptions {
  includeMembers?: boolean;
  limit?: number;
  offset?: number;
}

// Member count is computed from memberships that have not been left; it is not stored.
const GROUP_SELECT = `
  SELECT
    g.jid, g.name, g.description, g.created_at,
    COUNT(DISTINCT gm.member_jid) AS current_member_count,
    cm.total_messages,
    cm.last_message_date
  FROM groups g
  LEFT JOIN group_members gm ON g.jid = gm.group_jid AND gm.left_at IS NULL
  LEFT JOIN conversation_metrics cm ON g.jid = cm.chat_jid
`;

const MEMBER_SELECT = `
  SELECT
    gm.member_jid, c.full_name, c.push_name,
    gm.is_admin, gm.is_super_admin, gm.joined_at, gm.left_at, gm.added_by_jid
  FROM group_members gm
  LEFT JOIN contacts c ON gm.member_jid = c.jid
`;

function toMemberRecord(row: GroupMemberRow): GroupMemberRecord {
  return {
    memberJid: row.member_jid,
    fullName: row.full_name ?? undefined,
    pushName: row.push_name ?? undefined,
    isAdmin: row.is_admin === 1,
    isSuperAdmin: row.is_super_admin === 1,
    joinedAt: row.joined_at ?? undefined,
    leftAt: row.left_at ?? undefined,
    addedByJid: row.added_by_jid ?? undefined,
    active: row.left_at === null,
  };
}

function toGroupRecord(row: GroupRow, members?: GroupMemberRecord[]): GroupRecord {
  return {
    jid: row.jid,
    name: row.name ?? undefined,
    description: row.description ?? undefined,
    createdAt: row.created_at ?? undefined,
    currentMemberCount: row.current_member_count,
    totalMessages: row.total_messages ?? undefined,
    lastMessageDate: row.last_message_date ?? undefined,
    members,
  };
}

// ─── Group Reader ────────────────────────────────────────────────────────────

export function listGroups(store: Store, options: ListGroupsOptions = {}): GroupRecord[] {
  const { includeMembers = false, limit = 100, offset = 0 } = options;

  return readOrDefault<GroupRecord[]>(store, "listGroups", [], (db) => {
    const rows = db.raw
      .prepare<[number, number], GroupRow>(`
        ${GROUP_SELECT}
        GROUP BY g.jid
        ORDER BY julianday(cm.last_message_date) DESC NULLS LAST, g.jid ASC
        LIMIT ? OFFSET ?
      `)
      .all(limit, offset);

    if (!includeMembers) {
      return rows.map((row) => toGroupRecord(row));
    }

    const activeMembers = db.raw.prepare<[string], GroupMemberRow>(`
      ${MEMBER_SELECT}
      WHERE gm.group_jid = ? AND gm.left_at IS NULL
      ORDER BY gm.is_super_admin DESC, gm.is_admin DESC, gm.joined_at ASC, gm.member_jid ASC
    `);

    return rows.map((row) =>
      toGroupRecord(row, activeMembers.all(row.jid).map(toMemberRecord)),
    );
  });
}

/**
 * Single-group lookup. Unlike the listing, the roster includes departed members,
 * placed after every active one.
 */
export function getGroupInfo(
  store: Store,
  jid: string,
  options: { includeMembers?: boolean } = {},
): GroupRecord | null {
  const { includeMembers = true } = options;

  return readOrDefault<GroupRecord | null>(store, "getGroupInfo", null, (db) => {
    const row = db.raw
      .prepare<[string], GroupRow>(`
        ${GROUP_SELECT}
        WHERE g.jid = ?
        GROUP BY g.jid
      `)
      .get(jid);

    if (!row) return null;
    if (!includeMembers) return toGroupRecord(row);

    const members = db.raw
      .prepare<[string], GroupMemberRow>(`
        ${MEMBER_SELECT}
        WHERE gm.group_jid = ?
        ORDER BY gm.left_at IS NULL DESC, gm.is_super_admin DESC, gm.is_admin DESC,
          gm.joined_at ASC, gm.member_jid ASC
      `)
      .all(jid);

    return toGroupRecord(row, members.map(toMemberRecord));
  });
}
