import type { SummaryItem, TranscriptItem } from "@callboard/contracts";
import { describe, expect, it } from "vitest";
import { countPendingSummaries, mergeTimeline } from "../timeline.js";

function utterance(text: string, end?: string): TranscriptItem {
  const item: TranscriptItem = { channel: "0", text, start: "PT0S" };
  if (end !== undefined) item.end = end;
  return item;
}

function summary(text: string, transcriptionEnd: string): SummaryItem {
  return { text, transcription_end: transcriptionEnd };
}

function labels(entries: ReturnType<typeof mergeTimeline>): string[] {
  return entries.map((entry) => entry.item.text);
}

describe("mergeTimeline", () => {
  it("holds a summary back until an utterance reaches its point", () => {
    const u1 = utterance("u1", "PT1S");
    const u2 = utterance("u2", "PT3S");
    const s1 = summary("s1", "PT2S");

    const merged = mergeTimeline([u1, u2], [s1]);

    expect(merged).toEqual([
      { kind: "utterance", item: u1 },
      { kind: "utterance", item: u2 },
      { kind: "summary", item: s1 },
    ]);
  });

  it("flushes a summary right after an utterance ending at the same point", () => {
    const merged = mergeTimeline(
      [utterance("u1", "PT2S"), utterance("u2", "PT4S")],
      [summary("s1", "PT2S")],
    );
    expect(labels(merged)).toEqual(["u1", "s1", "u2"]);
  });

  it("flushes several summaries behind the same utterance in input order", () => {
    const merged = mergeTimeline(
      [utterance("u1", "PT1S"), utterance("u2", "PT10S")],
      [summary("s1", "PT4S"), summary("s2", "PT8S")],
    );
    expect(labels(merged)).toEqual(["u1", "u2", "s1", "s2"]);
  });

  it("always places the closing summary last", () => {
    const merged = mergeTimeline(
      [utterance("u1", "PT1S"), utterance("u2", "PT5S"), utterance("u3", "PT9S")],
      [summary("s1", "PT4S"), summary("final", "end")],
    );
    expect(labels(merged)).toEqual(["u1", "u2", "s1", "u3", "final"]);
  });

  it("places the closing summary last even behind a summary no utterance reached", () => {
    const transcript = [utterance("u1", "PT3S"), utterance("u2", "PT9S")];
    const summaries = [summary("late", "PT30S"), summary("final", "end")];

    expect(labels(mergeTimeline(transcript, summaries))).toEqual(["u1", "u2", "final"]);
    expect(countPendingSummaries(transcript, summaries)).toBe(1);
  });

  it("returns an empty timeline when no utterance exists yet", () => {
    expect(mergeTimeline([], [summary("s1", "PT1S"), summary("final", "end")])).toEqual([]);
  });

  it("leaves out summaries past the last utterance", () => {
    const transcript = [utterance("u1", "PT1S")];
    const summaries = [summary("s1", "PT1S"), summary("late", "PT30S")];

    expect(labels(mergeTimeline(transcript, summaries))).toEqual(["u1", "s1"]);
    expect(countPendingSummaries(transcript, summaries)).toBe(1);
    expect(countPendingSummaries([], summaries)).toBe(2);
  });

  it("keeps each input's own order instead of sorting", () => {
    const merged = mergeTimeline(
      [utterance("u1", "PT2S"), utterance("u2", "PT6S")],
      [summary("s-late", "PT5S"), summary("s-early", "PT1S")],
    );
    expect(labels(merged)).toEqual(["u1", "u2", "s-late", "s-early"]);
  });

  it("treats an utterance without an end as the start of the conversation", () => {
    const merged = mergeTimeline([utterance("u1")], [summary("s0", "PT0S"), summary("s1", "PT1S")]);
    expect(labels(merged)).toEqual(["u1", "s0"]);
  });
});
