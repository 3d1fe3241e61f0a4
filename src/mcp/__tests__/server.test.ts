import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { createMCPServer, callTool, toolDefinitions, type ToolResponse } from "../server.js";
import {
  createTestStore,
  removeTestStore,
  seedDirectory,
  ALICE,
  BOB,
  BOOK_CLUB,
  type TestStore,
} from "../../db/__tests__/helpers.js";

function textOf(response: ToolResponse): string {
  return response.content.map((c) => c.text).join("");
}

function jsonOf(response: ToolResponse): unknown {
  expect(response.isError).toBeUndefined();
  return JSON.parse(textOf(response));
}

describe("MCP Server", () => {
  let fixture: TestStore;

  beforeEach(() => {
    fixture = createTestStore();
    seedDirectory(fixture.store);
  });

  afterEach(() => {
    removeTestStore(fixture);
  });

  test("creates server instance", () => {
    expect(createMCPServer(fixture.store)).toBeDefined();
  });

  test("every listed tool is dispatchable", () => {
    expect(toolDefinitions.map((t) => t.name)).toEqual([
      "list_all_contacts",
      "get_contact_details",
      "list_all_groups",
      "get_group_details",
      "list_conversation_topics",
      "list_active_contacts",
      "list_dormant_contacts",
      "list_interesting_topics",
      "add_topic_to_track",
      "list_topic_alerts",
    ]);
    for (const tool of toolDefinitions) {
      const response = callTool(fixture.store, tool.name, { jid: ALICE, keyword: "probe" });
      expect(textOf(response)).not.toMatch(/^Error: Unknown tool/);
    }
  });

  test("unknown tool is an error result", () => {
    const response = callTool(fixture.store, "send_message", {});
    expect(response).toEqual({ content: [{ type: "text", text: "Error: Unknown tool: send_message" }], isError: true });
  });

  describe("list_all_contacts", () => {
    test("applies defaults", () => {
      const result = jsonOf(callTool(fixture.store, "list_all_contacts", undefined));
      expect(result).toMatchObject({ total: 5 });
    });

    test("passes limit and offset through", () => {
      const result = jsonOf(callTool(fixture.store, "list_all_contacts", { limit: 1, offset: 1 }));
      expect(result).toMatchObject({ total: 1, contacts: [{ jid: ALICE }] });
    });

    test("rejects a negative limit", () => {
      const response = callTool(fixture.store, "list_all_contacts", { limit: -1 });
      expect(response.isError).toBe(true);
      expect(textOf(response)).toBe(
        "Error: Invalid arguments for list_all_contacts: 'limit' Number must be greater than or equal to 0",
      );
    });
  });

  describe("get_contact_details", () => {
    test("returns the contact", () => {
      const result = jsonOf(callTool(fixture.store, "get_contact_details", { jid: BOB }));
      expect(result).toMatchObject({ jid: BOB, fullName: "Bob Lee" });
    });

    test("reports a missing contact", () => {
      const response = callTool(fixture.store, "get_contact_details", { jid: "000@s.whatsapp.net" });
      expect(response.isError).toBe(true);
      expect(textOf(response)).toBe("Error: Contact 000@s.whatsapp.net not found");
    });

    test("requires jid", () => {
      const response = callTool(fixture.store, "get_contact_details", {});
      expect(textOf(response)).toBe("Error: Invalid arguments for get_contact_details: 'jid' Required");
    });
  });

  describe("groups", () => {
    test("list_all_groups omits members by default", () => {
      const result = jsonOf(callTool(fixture.store, "list_all_groups", {}));
      expect(result).toMatchObject({ total: 3 });
      expect(textOf(callTool(fixture.store, "list_all_groups", {}))).not.toContain("members");
    });

    test("get_group_details includes members by default", () => {
      const result = jsonOf(callTool(fixture.store, "get_group_details", { jid: BOOK_CLUB }));
      expect(result).toMatchObject({ jid: BOOK_CLUB, currentMemberCount: 4 });
      expect(result).toHaveProperty("members");
    });

    test("get_group_details reports a missing group", () => {
      const response = callTool(fixture.store, "get_group_details", { jid: "1@g.us" });
      expect(textOf(response)).toBe("Error: Group 1@g.us not found");
    });
  });

  describe("topics", () => {
    test("list_conversation_topics filters by keyword", () => {
      const result = jsonOf(callTool(fixture.store, "list_conversation_topics", { keyword: "book" }));
      expect(result).toMatchObject({ total: 2, topics: [{ keyword: "book_fair" }, { keyword: "bookshelf" }] });
    });

    test("add_topic_to_track reports duplicates without failing the call", () => {
      const first = jsonOf(callTool(fixture.store, "add_topic_to_track", { keyword: "budget", notifyOnMention: true }));
      const second = jsonOf(callTool(fixture.store, "add_topic_to_track", { keyword: "budget" }));
      expect(first).toEqual({ success: true, message: "Added topic: budget", id: 1 });
      expect(second).toEqual({ success: false, message: "Topic 'budget' already exists" });

      const listed = jsonOf(callTool(fixture.store, "list_interesting_topics", undefined));
      expect(listed).toMatchObject({ total: 1, topics: [{ keyword: "budget", notifyOnMention: true }] });
    });

    test("add_topic_to_track rejects a blank keyword", () => {
      const response = callTool(fixture.store, "add_topic_to_track", { keyword: "   " });
      expect(response.isError).toBe(true);
      expect(textOf(response)).toMatch(/^Error: Invalid arguments for add_topic_to_track: 'keyword'/);
    });
  });

  describe("activity and alerts", () => {
    test("list_active_contacts echoes the applied window", () => {
      expect(jsonOf(callTool(fixture.store, "list_active_contacts", {}))).toMatchObject({ days: 30 });
      expect(jsonOf(callTool(fixture.store, "list_dormant_contacts", {}))).toMatchObject({ days: 90 });
    });

    test("a window reaching before year 0 lists every dated contact as active", () => {
      expect(jsonOf(callTool(fixture.store, "list_active_contacts", { days: 1_000_000 }))).toMatchObject({
        days: 1_000_000,
        total: 3,
      });
      expect(jsonOf(callTool(fixture.store, "list_dormant_contacts", { days: 1_000_000 }))).toMatchObject({
        total: 0,
        contacts: [],
      });
    });

    test("rejects a window beyond the supported date range", () => {
      const response = callTool(fixture.store, "list_active_contacts", { days: 200_000_000 });
      expect(response.isError).toBe(true);
      expect(textOf(response)).toBe(
        "Error: Invalid arguments for list_active_contacts: 'days' Number must be less than or equal to 3650000",
      );
    });

    test("list_topic_alerts returns an empty list when nothing is tracked", () => {
      expect(jsonOf(callTool(fixture.store, "list_topic_alerts", {}))).toEqual({ total: 0, alerts: [] });
    });

    test("rejects a non-boolean acknowledged flag", () => {
      const response = callTool(fixture.store, "list_topic_alerts", { acknowledged: "yes" });
      expect(response.isError).toBe(true);
      expect(textOf(response)).toBe("Error: Invalid arguments for list_topic_alerts: 'acknowledged' Expected boolean, received string");
    });
  });
});
