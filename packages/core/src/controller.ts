import type { Conversation, ConversationsResponse } from "@callboard/contracts";
import type { FetchConversationsOptions } from "./client.js";
import { ExpansionStore } from "./expansionStore.js";
import { consoleLogger, type Logger } from "./logger.js";
import { AdaptiveScheduler, type IntervalTimers, type PollIntervals } from "./scheduler.js";
import { asErrorMessage } from "./utils.js";
import { buildDashboardView, type DashboardActions, type DashboardRenderer, type DashboardView } from "./view.js";

export type PollerState = "idle" | "scheduled" | "running";

export interface ConversationSource {
  fetchConversations(options?: FetchConversationsOptions): Promise<ConversationsResponse>;
}

export interface DashboardControllerOptions {
  source: ConversationSource;
  renderer: DashboardRenderer;
  intervals: PollIntervals;
  timers?: IntervalTimers;
  logger?: Logger;
}

/**
 * One live dashboard: polls the conversations endpoint, renders the merged
 * timelines and keeps the poll cadence in step with conversation activity.
 *
 * Every fetch is tagged with a tick number. Only the response to the most
 * recently issued tick is applied, so a slow response never overwrites a
 * newer one.
 */
export class DashboardController {
  readonly store = new ExpansionStore();
  readonly scheduler: AdaptiveScheduler;
  private readonly source: ConversationSource;
  private readonly renderer: DashboardRenderer;
  private readonly logger: Logger;
  private readonly actions: DashboardActions = { toggle: (id) => this.toggle(id) };
  private conversations: Conversation[] = [];
  private lastView: DashboardView | null = null;
  private issuedTick = 0;
  private appliedTick = 0;
  private inFlight = 0;

  constructor(options: DashboardControllerOptions) {
    this.source = options.source;
    this.renderer = options.renderer;
    this.logger = options.logger ?? consoleLogger;
    this.scheduler = new AdaptiveScheduler(options.intervals, options.timers);
  }

  get state(): PollerState {
    if (!this.scheduler.isRunning) return "idle";
    return this.inFlight > 0 ? "running" : "scheduled";
  }

  get view(): DashboardView | null {
    return this.lastView;
  }

  get lastAppliedTick(): number {
    return this.appliedTick;
  }

  async start(): Promise<void> {
    if (this.scheduler.isRunning) return;
    this.scheduler.start(this.scheduler.desiredInterval(true), () => {
      void this.tick();
    });
    await this.tick();
  }

  stop(): void {
    this.scheduler.stop();
    // Responses still in flight belong to a stopped dashboard.
    this.issuedTick += 1;
  }

  async tick(): Promise<void> {
    this.issuedTick += 1;
    const tick = this.issuedTick;
    this.inFlight += 1;
    try {
      const response = await this.source.fetchConversations();
      if (tick !== this.issuedTick) {
        this.logger.debug(`poll tick ${tick} superseded by tick ${this.issuedTick}; response dropped`);
        return;
      }
      this.apply(tick, response.conversations);
    } catch (error) {
      this.logger.warn(`poll tick ${tick} failed: ${asErrorMessage(error)}`);
    } finally {
      this.inFlight -= 1;
    }
  }

  toggle(id: string): void {
    this.store.toggle(id);
    if (this.lastView) {
      this.renderCurrent();
    }
  }

  private apply(tick: number, conversations: Conversation[]): void {
    this.conversations = conversations;
    this.appliedTick = tick;
    const view = this.renderCurrent();
    this.scheduler.applyIfChanged(this.scheduler.desiredInterval(view.anyActive));
  }

  private renderCurrent(): DashboardView {
    const view = buildDashboardView(this.conversations, this.store);
    this.lastView = view;
    this.renderer.render(view, this.actions);
    return view;
  }
}
