import type { DashboardActions, DashboardView } from "@callboard/core/dashboard";
import { ConversationCard } from "./ConversationCard.js";
import { headerStatus } from "./view-model.js";

export interface AppProps {
  view: DashboardView;
  actions: DashboardActions;
  /** Bumped on every render; keys the list so it is rebuilt rather than patched. */
  generation: number;
}

export function App({ view, actions, generation }: AppProps) {
  return (
    <main className="shell">
      <header className="hero">
        <h1 className="hero-title">Callboard</h1>
        <div className={`hero-status mono ${view.anyActive ? "status-live" : "status-idle"}`}>{headerStatus(view)}</div>
      </header>
      <section key={generation} className="conversation-list" aria-label="Conversations">
        {view.cards.length === 0 && <div className="empty">No conversations</div>}
        {view.cards.map((card) => (
          <ConversationCard key={card.id} card={card} onToggle={actions.toggle} />
        ))}
      </section>
    </main>
  );
}
