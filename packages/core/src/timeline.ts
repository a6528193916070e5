import { END_OF_CONVERSATION, type SummaryItem, type TimelineEntry, type TranscriptItem } from "@callboard/contracts";
import { parseDuration } from "./duration.js";

function isClosingSummary(summary: SummaryItem): boolean {
  return summary.transcription_end.trim() === END_OF_CONVERSATION;
}

function interleave(
  transcript: readonly TranscriptItem[],
  summaries: readonly SummaryItem[],
): { entries: TimelineEntry[]; placed: number } {
  const entries: TimelineEntry[] = [];
  let cursor = 0;
  let placed = 0;
  for (const item of transcript) {
    entries.push({ kind: "utterance", item });
    const utteranceEnd = parseDuration(item.end);
    while (cursor < summaries.length) {
      const summary = summaries[cursor];
      if (!summary || parseDuration(summary.transcription_end) > utteranceEnd) break;
      entries.push({ kind: "summary", item: summary });
      cursor += 1;
      placed += 1;
    }
  }
  if (transcript.length === 0) return { entries, placed };

  for (const summary of summaries.slice(cursor)) {
    if (!isClosingSummary(summary)) continue;
    entries.push({ kind: "summary", item: summary });
    placed += 1;
  }
  return { entries, placed };
}

/**
 * Interleaves a conversation's transcript with its summaries.
 *
 * Each summary is placed after the first utterance whose end reaches the
 * summary's `transcription_end`. Both inputs keep their own order. Once the
 * transcript is exhausted only summaries carrying the `"end"` sentinel are
 * appended, so the closing summary always comes last while a periodic
 * summary that no utterance has reached yet stays out of the timeline.
 * A conversation without utterances yields an empty timeline.
 */
export function mergeTimeline(
  transcript: readonly TranscriptItem[],
  summaries: readonly SummaryItem[],
): TimelineEntry[] {
  return interleave(transcript, summaries).entries;
}

/** Summaries {@link mergeTimeline} left out of the timeline. */
export function countPendingSummaries(
  transcript: readonly TranscriptItem[],
  summaries: readonly SummaryItem[],
): number {
  return summaries.length - interleave(transcript, summaries).placed;
}
