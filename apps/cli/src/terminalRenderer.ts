import type { ConversationCardView, DashboardActions, DashboardRenderer, DashboardView, TimelineEntryView } from "@callboard/core";

const CLEAR_SCREEN = "\u001b[2J\u001b[H";
const KEY_HINT = "keys 1-9 expand or collapse a conversation, ctrl-c quits";

export interface TerminalOutput {
  write(chunk: string): unknown;
}

function plural(count: number, singular: string, pluralForm = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : pluralForm}`;
}

function entryLines(entry: TimelineEntryView): string[] {
  if (entry.kind === "utterance") {
    return [`    ${entry.startLabel}-${entry.endLabel}  ch${entry.channel}  ${entry.text}`];
  }
  const heading = entry.isFinal ? "    final summary:" : `    summary @ ${entry.pointLabel}:`;
  return [heading, ...entry.lines.map((line) => `      ${line}`)];
}

function cardLines(card: ConversationCardView, index: number): string[] {
  const label = `${index + 1}. ${card.title}`;
  if (!card.expanded) {
    return [`[+] ${label}  ${plural(card.utteranceCount, "utterance")}, ${plural(card.summaryCount, "summary", "summaries")}`];
  }
  const lines = [`[-] ${label}${card.active ? "  live" : ""}`];
  if (card.entries.length === 0) {
    lines.push("    (no utterances yet)");
  }
  for (const entry of card.entries) {
    lines.push(...entryLines(entry));
  }
  if (card.pendingSummaryCount > 0) {
    lines.push(`    ${plural(card.pendingSummaryCount, "summary", "summaries")} pending`);
  }
  return lines;
}

export function renderTerminalLines(view: DashboardView): string[] {
  const lines = [`Callboard: ${plural(view.cards.length, "conversation")}, ${view.activeCount} active`];
  if (view.cards.length === 0) {
    lines.push("", "no conversations yet");
    return lines;
  }
  view.cards.forEach((card, index) => {
    lines.push("", ...cardLines(card, index));
  });
  return lines;
}

/** Redraws the whole screen on every render; digits toggle the numbered cards. */
export class TerminalRenderer implements DashboardRenderer {
  private readonly output: TerminalOutput;
  private view: DashboardView | null = null;
  private actions: DashboardActions | null = null;

  constructor(output: TerminalOutput) {
    this.output = output;
  }

  render(view: DashboardView, actions: DashboardActions): void {
    this.view = view;
    this.actions = actions;
    this.output.write(`${CLEAR_SCREEN}${renderTerminalLines(view).join("\n")}\n\n${KEY_HINT}\n`);
  }

  handleKey(key: string | undefined): boolean {
    if (!key || !/^[1-9]$/.test(key)) return false;
    const card = this.view?.cards[Number(key) - 1];
    if (!card || !this.actions) return false;
    this.actions.toggle(card.id);
    return true;
  }
}
