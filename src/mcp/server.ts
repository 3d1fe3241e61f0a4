/**
 * Chat insights MCP server
 *
 * Exposes the contact, group, topic, activity and alert readers as MCP tools.
 * Every tool call opens its own store connection through `Store`.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";

import type { Store } from "../db/database.js";
import { logger } from "../utils/logger.js";
import { listContactsTool, getContactTool } from "./tools/contacts.js";
import { listGroupsTool, getGroupTool } from "./tools/groups.js";
import { listTopicsTool, listTrackedTopicsTool, addTrackedTopicTool } from "./tools/topics.js";
import { listActiveContactsTool, listDormantContactsTool } from "./tools/activity.js";
import { listTopicAlertsTool } from "./tools/alerts.js";

export const SERVER_NAME = "chat-insights";
export const SERVER_VERSION = "0.1.0";

export const toolDefinitions: Tool[] = [
  {
    name: "list_all_contacts",
    description: "List contacts with conversation metrics and relationship insights, most recently active first. Params: includeMetrics, includeInsights, limit, offset",
    inputSchema: {
      type: "object",
      properties: {
        includeMetrics: { type: "boolean", description: "Include conversation metrics (default true)" },
        includeInsights: { type: "boolean", description: "Include relationship insights (default true)" },
        limit: { type: "number", description: "Max contacts (default 100)" },
        offset: { type: "number", description: "Pagination offset (default 0)" },
      },
    },
  },
  {
    name: "get_contact_details",
    description: "Get one contact with metrics and insights. Params: jid (required)",
    inputSchema: {
      type: "object",
      properties: {
        jid: { type: "string", description: "Contact JID, e.g. 15551230000@s.whatsapp.net" },
      },
      required: ["jid"],
    },
  },
  {
    name: "list_all_groups",
    description: "List groups with live member counts and metrics, most recently active first. Params: includeMembers, limit, offset",
    inputSchema: {
      type: "object",
      properties: {
        includeMembers: { type: "boolean", description: "Include active members for each group (default false)" },
        limit: { type: "number", description: "Max groups (default 100)" },
        offset: { type: "number", description: "Pagination offset (default 0)" },
      },
    },
  },
  {
    name: "get_group_details",
    description: "Get one group, including current and former members. Params: jid (required), includeMembers",
    inputSchema: {
      type: "object",
      properties: {
        jid: { type: "string", description: "Group JID, e.g. 120363000000000000@g.us" },
        includeMembers: { type: "boolean", description: "Include member list (default true)" },
      },
      required: ["jid"],
    },
  },
  {
    name: "list_conversation_topics",
    description: "List topics mined from chats, by importance then mentions. Params: chatJid, keyword, limit, minMentions",
    inputSchema: {
      type: "object",
      properties: {
        chatJid: { type: "string", description: "Only topics from this chat" },
        keyword: { type: "string", description: "Substring the keyword must contain" },
        limit: { type: "number", description: "Max topics (default 50)" },
        minMentions: { type: "number", description: "Minimum mention count (default 2)" },
      },
    },
  },
  {
    name: "list_active_contacts",
    description: "Contacts whose last message is within the past N days, newest first. Params: days, limit",
    inputSchema: {
      type: "object",
      properties: {
        days: { type: "number", description: "Look-back window in days (default 30, at most 3650000)" },
        limit: { type: "number", description: "Max contacts (default 100)" },
      },
    },
  },
  {
    name: "list_dormant_contacts",
    description: "Contacts with no message in the past N days, most dormant first. Params: days, limit",
    inputSchema: {
      type: "object",
      properties: {
        days: { type: "number", description: "Dormancy threshold in days (default 90, at most 3650000)" },
        limit: { type: "number", description: "Max contacts (default 100)" },
      },
    },
  },
  {
    name: "list_interesting_topics",
    description: "List user-tracked topics by importance",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "add_topic_to_track",
    description: "Track a new keyword across conversations. Params: keyword (required), category, importance, notifyOnMention, notes",
    inputSchema: {
      type: "object",
      properties: {
        keyword: { type: "string", description: "Keyword or phrase to track (required)" },
        category: { type: "string", description: "Category, e.g. business, personal, tech" },
        importance: { type: "number", description: "Importance weight, 0.0 to 10.0 (default 1.0)" },
        notifyOnMention: { type: "boolean", description: "Create alerts when mentioned (default false)" },
        notes: { type: "string", description: "Free-text notes" },
      },
      required: ["keyword"],
    },
  },
  {
    name: "list_topic_alerts",
    description: "List alerts raised when a tracked topic was mentioned, newest first. Params: acknowledged, limit",
    inputSchema: {
      type: "object",
      properties: {
        acknowledged: { type: "boolean", description: "Show acknowledged alerts instead of new ones (default false)" },
        limit: { type: "number", description: "Max alerts (default 100)" },
      },
    },
  },
];

export type ToolResponse = {
  content: { type: "text"; text: string }[];
  isError?: boolean;
};

function runTool(store: Store, name: string, args: unknown): string {
  switch (name) {
    case "list_all_contacts": return listContactsTool(store, args);
    case "get_contact_details": return getContactTool(store, args);
    case "list_all_groups": return listGroupsTool(store, args);
    case "get_group_details": return getGroupTool(store, args);
    case "list_conversation_topics": return listTopicsTool(store, args);
    case "list_active_contacts": return listActiveContactsTool(store, args);
    case "list_dormant_contacts": return listDormantContactsTool(store, args);
    case "list_interesting_topics": return listTrackedTopicsTool(store);
    case "add_topic_to_track": return addTrackedTopicTool(store, args);
    case "list_topic_alerts": return listTopicAlertsTool(store, args);
    default: throw new Error(`Unknown tool: ${name}`);
  }
}

export function callTool(store: Store, name: string, args: unknown): ToolResponse {
  try {
    return { content: [{ type: "text", text: runTool(store, name, args) }] };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn(`[MCP] Tool ${name} failed:`, message);
    return { content: [{ type: "text", text: `Error: ${message}` }], isError: true };
  }
}

export function createMCPServer(store: Store): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: toolDefinitions }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    logger.debug(`[MCP] ${name}`, args ?? {});
    return callTool(store, name, args);
  });

  return server;
}

export async function startMCPServer(store: Store): Promise<Server> {
  const server = createMCPServer(store);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info(`[MCP] ${SERVER_NAME} server started on ${store.path}`);
  return server;
}
