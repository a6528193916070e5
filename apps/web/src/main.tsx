import {
  apiKeyFromSearch,
  ConversationsClient,
  DashboardController,
  DEFAULT_ACTIVE_INTERVAL_MS,
  DEFAULT_IDLE_INTERVAL_MS,
} from "@callboard/core/dashboard";
import { ReactDashboardRenderer } from "./renderer.js";
import "./styles.css";

const container = document.getElementById("root");
if (!container) {
  throw new Error("viewer page has no #root element");
}

const controller = new DashboardController({
  source: new ConversationsClient({
    baseUrl: window.location.origin,
    apiKey: apiKeyFromSearch(window.location.search),
  }),
  renderer: new ReactDashboardRenderer(container),
  intervals: {
    activeIntervalMs: DEFAULT_ACTIVE_INTERVAL_MS,
    idleIntervalMs: DEFAULT_IDLE_INTERVAL_MS,
  },
});

void controller.start();
