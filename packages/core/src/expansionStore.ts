import type { Conversation } from "@callboard/contracts";

export class ExpansionStore {
  private readonly expanded = new Set<string>();

  isExpanded(id: string): boolean {
    return this.expanded.has(id);
  }

  toggle(id: string): void {
    if (this.expanded.has(id)) {
      this.expanded.delete(id);
      return;
    }
    this.expanded.add(id);
  }

  expandedIds(): string[] {
    return Array.from(this.expanded);
  }
}

// Active conversations stay open; the stored choice applies once they end.
export function isOpen(store: ExpansionStore, conversation: Pick<Conversation, "id" | "active">): boolean {
  return store.isExpanded(conversation.id) || conversation.active;
}
