import { describe, expect, it } from "vitest";
import { InMemoryConversationStore, UnknownConversationError } from "./store.js";

describe("InMemoryConversationStore", () => {
  it("appends transcript and summary items in arrival order", async () => {
    const store = new InMemoryConversationStore();
    await store.set({ id: "c1", session_id: "s1", active: true, transcript: [], summary: [] });

    await store.appendTranscript("c1", { channel: "0", text: "one", end: "PT1S" });
    await store.appendTranscript("c1", { channel: "1", text: "two", end: "PT2S" });
    await store.appendSummary("c1", { text: "so far", transcription_end: "PT2S" });
    await store.setActive("c1", false);

    expect(await store.get("c1")).toEqual({
      id: "c1",
      session_id: "s1",
      active: false,
      transcript: [
        { channel: "0", text: "one", end: "PT1S" },
        { channel: "1", text: "two", end: "PT2S" },
      ],
      summary: [{ text: "so far", transcription_end: "PT2S" }],
    });
  });

  it("hands out copies", async () => {
    const store = new InMemoryConversationStore();
    await store.set({ id: "c1", session_id: "s1", active: true, transcript: [], summary: [] });

    const copy = await store.get("c1");
    copy?.transcript.push({ channel: "0", text: "sneaky" });
    expect((await store.get("c1"))?.transcript).toEqual([]);
  });

  it("lists by activity in insertion order", async () => {
    const store = new InMemoryConversationStore();
    await store.set({ id: "b", session_id: "s", active: false, transcript: [], summary: [] });
    await store.set({ id: "a", session_id: "s", active: true, transcript: [], summary: [] });

    expect((await store.list()).map((c) => c.id)).toEqual(["b", "a"]);
    expect((await store.list({ active: true })).map((c) => c.id)).toEqual(["a"]);
    expect((await store.list({ active: false })).map((c) => c.id)).toEqual(["b"]);
  });

  it("refuses writes to unknown conversations", async () => {
    const store = new InMemoryConversationStore();
    expect(await store.get("missing")).toBeNull();
    await expect(store.appendSummary("missing", { text: "x", transcription_end: "end" })).rejects.toBeInstanceOf(
      UnknownConversationError,
    );
  });
});
