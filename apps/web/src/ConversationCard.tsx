import { Fragment } from "react";
import type { ConversationCardView, TimelineEntryView } from "@callboard/core/dashboard";
import { cardClass, cardCounts, domIdForConversation, entryClass, pluralize, summaryHeading } from "./view-model.js";

interface TimelineEntryItemProps {
  entry: TimelineEntryView;
}

function TimelineEntryItem({ entry }: TimelineEntryItemProps) {
  if (entry.kind === "utterance") {
    return (
      <li className={entryClass(entry)}>
        <span className="entry-time mono">{`${entry.startLabel}-${entry.endLabel}`}</span>
        <span className="entry-channel mono">{`ch ${entry.channel}`}</span>
        <p className="entry-text">{entry.text}</p>
      </li>
    );
  }
  return (
    <li className={entryClass(entry)}>
      <span className="entry-heading">{summaryHeading(entry)}</span>
      <p className="entry-text">
        {entry.lines.map((line, index) => (
          <Fragment key={index}>
            {index > 0 && <br />}
            {line}
          </Fragment>
        ))}
      </p>
    </li>
  );
}

export interface ConversationCardProps {
  card: ConversationCardView;
  onToggle(id: string): void;
}

export function ConversationCard({ card, onToggle }: ConversationCardProps) {
  const domId = domIdForConversation(card.id);
  const timelineId = `${domId}-timeline`;

  return (
    <article id={domId} className={cardClass(card)}>
      <button
        type="button"
        className="card-head"
        aria-expanded={card.expanded}
        aria-controls={timelineId}
        onClick={() => onToggle(card.id)}
      >
        <span className="card-title">{card.title}</span>
        {card.active && <span className="live-badge mono">live</span>}
        <span className="card-counts mono">{cardCounts(card)}</span>
      </button>
      {card.expanded && (
        <ol id={timelineId} className="timeline">
          {card.entries.length === 0 && <li className="empty">No utterances yet</li>}
          {card.entries.map((entry) => (
            <TimelineEntryItem key={entry.key} entry={entry} />
          ))}
        </ol>
      )}
      {card.expanded && card.pendingSummaryCount > 0 && (
        <p className="pending mono">{`${pluralize(card.pendingSummaryCount, "summary", "summaries")} waiting for the transcript`}</p>
      )}
    </article>
  );
}
