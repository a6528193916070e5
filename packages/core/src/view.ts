import { END_OF_CONVERSATION, type Conversation, type TimelineEntry } from "@callboard/contracts";
import { formatDuration, parseDuration } from "./duration.js";
import { isOpen, type ExpansionStore } from "./expansionStore.js";
import { countPendingSummaries, mergeTimeline } from "./timeline.js";

export interface UtteranceView {
  kind: "utterance";
  key: string;
  channel: string;
  text: string;
  startLabel: string;
  endLabel: string;
}

export interface SummaryView {
  kind: "summary";
  key: string;
  lines: string[];
  pointLabel: string;
  isFinal: boolean;
}

export type TimelineEntryView = UtteranceView | SummaryView;

export interface ConversationCardView {
  id: string;
  sessionId: string;
  title: string;
  active: boolean;
  expanded: boolean;
  utteranceCount: number;
  summaryCount: number;
  pendingSummaryCount: number;
  entries: TimelineEntryView[];
}

export interface DashboardView {
  cards: ConversationCardView[];
  activeCount: number;
  anyActive: boolean;
}

export interface DashboardActions {
  toggle(id: string): void;
}

/**
 * A surface the dashboard draws on. Every call replaces whatever the
 * previous call drew; implementations never patch an earlier tree.
 */
export interface DashboardRenderer {
  render(view: DashboardView, actions: DashboardActions): void;
}

export function conversationTitle(conversation: Pick<Conversation, "id" | "session_id">): string {
  return `Conversation ${conversation.id} (session ${conversation.session_id})`;
}

export function splitSummaryLines(text: string): string[] {
  return text.split(/\r?\n/);
}

function toEntryView(entry: TimelineEntry, position: number): TimelineEntryView {
  if (entry.kind === "utterance") {
    return {
      kind: "utterance",
      key: `utterance-${position}`,
      channel: entry.item.channel,
      text: entry.item.text,
      startLabel: formatDuration(parseDuration(entry.item.start)),
      endLabel: formatDuration(parseDuration(entry.item.end)),
    };
  }
  return {
    kind: "summary",
    key: `summary-${position}`,
    lines: splitSummaryLines(entry.item.text),
    pointLabel: formatDuration(parseDuration(entry.item.transcription_end)),
    isFinal: entry.item.transcription_end.trim() === END_OF_CONVERSATION,
  };
}

export function anyConversationActive(conversations: readonly Conversation[]): boolean {
  return conversations.some((conversation) => conversation.active);
}

export function buildDashboardView(conversations: readonly Conversation[], store: ExpansionStore): DashboardView {
  const cards = conversations.map((conversation): ConversationCardView => {
    const entries = mergeTimeline(conversation.transcript, conversation.summary);
    return {
      id: conversation.id,
      sessionId: conversation.session_id,
      title: conversationTitle(conversation),
      active: conversation.active,
      expanded: isOpen(store, conversation),
      utteranceCount: conversation.transcript.length,
      summaryCount: conversation.summary.length,
      pendingSummaryCount: countPendingSummaries(conversation.transcript, conversation.summary),
      entries: entries.map(toEntryView),
    };
  });
  const activeCount = cards.filter((card) => card.active).length;
  return { cards, activeCount, anyActive: activeCount > 0 };
}
