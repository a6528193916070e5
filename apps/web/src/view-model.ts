import type { ConversationCardView, DashboardView, TimelineEntryView } from "@callboard/core/dashboard";

function sanitizeToken(value: string): string {
  return value.toLowerCase().replace(/[^a-z0-9_-]/g, "");
}

export function channelClass(channel: string): string {
  const token = sanitizeToken(channel);
  return token ? `channel channel-${token}` : "channel";
}

export function entryClass(entry: TimelineEntryView): string {
  if (entry.kind === "utterance") {
    return `entry entry-utterance ${channelClass(entry.channel)}`;
  }
  return entry.isFinal ? "entry entry-summary entry-summary-final" : "entry entry-summary";
}

export function cardClass(card: Pick<ConversationCardView, "active" | "expanded">): string {
  return [
    "conversation-card",
    card.active ? "is-live" : "is-ended",
    card.expanded ? "is-expanded" : "is-collapsed",
  ].join(" ");
}

export function domIdForConversation(id: string): string {
  return `conversation-${id.replace(/[^a-zA-Z0-9_-]/g, "-")}`;
}

export function pluralize(count: number, singular: string, plural = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : plural}`;
}

export function headerStatus(view: Pick<DashboardView, "cards" | "activeCount">): string {
  return `${pluralize(view.cards.length, "conversation")} · ${view.activeCount} live`;
}

export function cardCounts(card: Pick<ConversationCardView, "utteranceCount" | "summaryCount">): string {
  return `${pluralize(card.utteranceCount, "utterance")} · ${pluralize(card.summaryCount, "summary", "summaries")}`;
}

export function summaryHeading(entry: Extract<TimelineEntryView, { kind: "summary" }>): string {
  return entry.isFinal ? "Final summary" : `Summary at ${entry.pointLabel}`;
}
