import { describe, it, expect } from "vitest";
import { encodeAction, isActionAllowed, parseAction } from "./actions";
import { parseCommand } from "./commands";
import { buildArticleKeyboard, originalLinkFrom } from "./keyboards";

describe("parseAction", () => {
  it("should parse unlock and menu actions", () => {
    expect(parseAction("unlock")).toEqual({ kind: "unlock" });
    expect(parseAction("menu:status")).toEqual({ kind: "menu", item: "status" });
  });

  it("should reject unknown data", () => {
    expect(parseAction(undefined)).toBeNull();
    expect(parseAction("menu:delete_everything")).toBeNull();
    expect(parseAction("status")).toBeNull();
  });

  it("should read back what encodeAction writes", () => {
    const action = { kind: "menu", item: "check_now" } as const;
    expect(parseAction(encodeAction(action))).toEqual(action);
  });
});

describe("isActionAllowed", () => {
  it("should restrict menu actions to the owner", () => {
    const menu = { kind: "menu", item: "status" } as const;
    expect(isActionAllowed(menu, 7, 7)).toBe(true);
    expect(isActionAllowed(menu, 8, 7)).toBe(false);
    expect(isActionAllowed(menu, 8, null)).toBe(false);
  });

  it("should allow unlock for anyone", () => {
    expect(isActionAllowed({ kind: "unlock" }, 8, 7)).toBe(true);
    expect(isActionAllowed({ kind: "unlock" }, 8, null)).toBe(true);
  });
});

describe("parseCommand", () => {
  it("should read commands with and without a bot mention", () => {
    expect(parseCommand("/status")).toBe("status");
    expect(parseCommand("/Check@news_monitor_bot")).toBe("check");
    expect(parseCommand("/reset now")).toBe("reset");
  });

  it("should return null for plain text and unknown commands", () => {
    expect(parseCommand("+alpha")).toBeNull();
    expect(parseCommand("/unknown")).toBeNull();
    expect(parseCommand("/statusx")).toBeNull();
  });
});

describe("originalLinkFrom", () => {
  it("should read the link from the first button", () => {
    expect(
      originalLinkFrom({
        message_id: 1,
        chat: { id: 1, type: "private" },
        reply_markup: buildArticleKeyboard("https://news.example.com/a"),
      }),
    ).toBe("https://news.example.com/a");
  });

  it("should return null without buttons", () => {
    expect(originalLinkFrom({ message_id: 1, chat: { id: 1, type: "private" } })).toBeNull();
    expect(originalLinkFrom(undefined)).toBeNull();
  });
});
