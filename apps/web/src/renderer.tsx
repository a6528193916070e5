import { createRoot, type Root } from "react-dom/client";
import type { DashboardActions, DashboardRenderer, DashboardView } from "@callboard/core/dashboard";
import { App } from "./App.js";

export class ReactDashboardRenderer implements DashboardRenderer {
  private readonly root: Root;
  private generation = 0;

  constructor(container: Element) {
    this.root = createRoot(container);
  }

  get renderCount(): number {
    return this.generation;
  }

  render(view: DashboardView, actions: DashboardActions): void {
    this.generation += 1;
    this.root.render(<App view={view} actions={actions} generation={this.generation} />);
  }

  unmount(): void {
    this.root.unmount();
  }
}
