import type { DashboardView } from "@callboard/core";
import { describe, expect, it, vi } from "vitest";
import { renderTerminalLines, TerminalRenderer } from "./terminalRenderer.js";

const VIEW: DashboardView = {
  activeCount: 1,
  anyActive: true,
  cards: [
    {
      id: "c1",
      sessionId: "s1",
      title: "Conversation c1 (session s1)",
      active: true,
      expanded: true,
      utteranceCount: 2,
      summaryCount: 2,
      pendingSummaryCount: 1,
      entries: [
        { kind: "utterance", key: "utterance-0", channel: "0", text: "Hello.", startLabel: "0:00", endLabel: "0:02" },
        { kind: "summary", key: "summary-1", lines: ["Greeting.", "Waiting."], pointLabel: "0:02", isFinal: false },
        { kind: "utterance", key: "utterance-2", channel: "1", text: "Hi.", startLabel: "0:03", endLabel: "0:04" },
      ],
    },
    {
      id: "c2",
      sessionId: "s2",
      title: "Conversation c2 (session s2)",
      active: false,
      expanded: false,
      utteranceCount: 1,
      summaryCount: 1,
      pendingSummaryCount: 0,
      entries: [],
    },
    {
      id: "c3",
      sessionId: "s3",
      title: "Conversation c3 (session s3)",
      active: false,
      expanded: true,
      utteranceCount: 0,
      summaryCount: 0,
      pendingSummaryCount: 0,
      entries: [],
    },
  ],
};

describe("renderTerminalLines", () => {
  it("lays out every card with its timeline", () => {
    expect(renderTerminalLines(VIEW)).toEqual([
      "Callboard: 3 conversations, 1 active",
      "",
      "[-] 1. Conversation c1 (session s1)  live",
      "    0:00-0:02  ch0  Hello.",
      "    summary @ 0:02:",
      "      Greeting.",
      "      Waiting.",
      "    0:03-0:04  ch1  Hi.",
      "    1 summary pending",
      "",
      "[+] 2. Conversation c2 (session s2)  1 utterance, 1 summary",
      "",
      "[-] 3. Conversation c3 (session s3)",
      "    (no utterances yet)",
    ]);
  });

  it("labels the closing summary", () => {
    const [card] = VIEW.cards;
    if (!card) throw new Error("fixture has no cards");
    const lines = renderTerminalLines({
      ...VIEW,
      cards: [
        {
          ...card,
          pendingSummaryCount: 0,
          entries: [{ kind: "summary", key: "summary-0", lines: ["Resolved."], pointLabel: "end", isFinal: true }],
        },
      ],
    });
    expect(lines.slice(2)).toEqual(["[-] 1. Conversation c1 (session s1)  live", "    final summary:", "      Resolved."]);
  });

  it("renders an empty dashboard", () => {
    expect(renderTerminalLines({ cards: [], activeCount: 0, anyActive: false })).toEqual([
      "Callboard: 0 conversations, 0 active",
      "",
      "no conversations yet",
    ]);
  });
});

describe("TerminalRenderer", () => {
  it("clears the screen and redraws on every render", () => {
    const write = vi.fn();
    const renderer = new TerminalRenderer({ write });
    const actions = { toggle: vi.fn() };

    renderer.render(VIEW, actions);
    renderer.render({ cards: [], activeCount: 0, anyActive: false }, actions);

    expect(write).toHaveBeenCalledTimes(2);
    expect(write).toHaveBeenLastCalledWith(
      "\u001b[2J\u001b[HCallboard: 0 conversations, 0 active\n\nno conversations yet\n\nkeys 1-9 expand or collapse a conversation, ctrl-c quits\n",
    );
  });

  it("toggles the numbered card on a digit key", () => {
    const renderer = new TerminalRenderer({ write: vi.fn() });
    const actions = { toggle: vi.fn() };

    expect(renderer.handleKey("1")).toBe(false);
    renderer.render(VIEW, actions);

    expect(renderer.handleKey("2")).toBe(true);
    expect(actions.toggle).toHaveBeenCalledWith("c2");
    expect(renderer.handleKey("9")).toBe(false);
    expect(renderer.handleKey("x")).toBe(false);
    expect(renderer.handleKey(undefined)).toBe(false);
    expect(actions.toggle).toHaveBeenCalledTimes(1);
  });
});
