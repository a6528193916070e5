export const END_OF_CONVERSATION = "end";

export interface TranscriptItem {
  channel: string;
  text: string;
  start?: string;
  end?: string;
}

export interface SummaryItem {
  text: string;
  transcription_end: string;
}

export interface Conversation {
  id: string;
  session_id: string;
  active: boolean;
  transcript: TranscriptItem[];
  summary: SummaryItem[];
  ani?: string;
  ani_name?: string;
  dnis?: string;
  position?: string;
  rtt?: string[];
}

export interface ConversationsResponse {
  count: number;
  conversations: Conversation[];
}

export interface ApiErrorBody {
  error: {
    code: string;
    message: string;
  };
}

export interface HealthCheckResponse {
  status: "healthy" | "unhealthy";
  error?: ApiErrorBody["error"];
}

export type TimelineEntry =
  | { kind: "utterance"; item: TranscriptItem }
  | { kind: "summary"; item: SummaryItem };

export type ServerLogLevel = "silent" | "error" | "warn" | "info" | "debug";

export interface DashboardConfig {
  baseUrl: string;
  apiKey: string;
  activeIntervalMs: number;
  idleIntervalMs: number;
}

export interface ServerConfig {
  host: string;
  port: number;
  apiKey: string;
  logLevel: ServerLogLevel;
}

export interface AppConfig {
  dashboard: DashboardConfig;
  server: ServerConfig;
}
