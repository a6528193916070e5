import type { Conversation, ConversationsResponse, SummaryItem, TranscriptItem } from "@callboard/contracts";
import { ApiRequestError, PayloadError } from "./errors.js";
import { asArray, asErrorMessage, asOptionalString, asRecord, asString, isPlainObject, toFiniteNumber } from "./utils.js";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface ConversationsClientOptions {
  baseUrl: string;
  apiKey: string;
  fetch?: FetchLike;
}

export interface FetchConversationsOptions {
  active?: boolean;
  signal?: AbortSignal;
}

const OPTIONAL_METADATA_KEYS = ["ani", "ani_name", "dnis", "position"] as const;

function parseTranscriptItem(value: unknown, where: string): TranscriptItem {
  if (!isPlainObject(value)) {
    throw new PayloadError(`${where} is not an object`);
  }
  const item: TranscriptItem = {
    channel: asString(value.channel),
    text: asString(value.text),
  };
  const start = asOptionalString(value.start);
  const end = asOptionalString(value.end);
  if (start !== undefined) item.start = start;
  if (end !== undefined) item.end = end;
  return item;
}

function parseSummaryItem(value: unknown, where: string): SummaryItem {
  if (!isPlainObject(value)) {
    throw new PayloadError(`${where} is not an object`);
  }
  return {
    text: asString(value.text),
    transcription_end: asString(value.transcription_end),
  };
}

export function parseConversation(value: unknown, where = "conversation"): Conversation {
  if (!isPlainObject(value)) {
    throw new PayloadError(`${where} is not an object`);
  }
  const id = asString(value.id).trim();
  if (!id) {
    throw new PayloadError(`${where} has no id`);
  }
  if (value.transcript !== undefined && value.transcript !== null && !Array.isArray(value.transcript)) {
    throw new PayloadError(`${where}.transcript is not a list`);
  }
  if (value.summary !== undefined && value.summary !== null && !Array.isArray(value.summary)) {
    throw new PayloadError(`${where}.summary is not a list`);
  }

  const conversation: Conversation = {
    id,
    session_id: asString(value.session_id),
    active: value.active === true,
    transcript: asArray(value.transcript).map((item, index) => parseTranscriptItem(item, `${where}.transcript[${index}]`)),
    summary: asArray(value.summary).map((item, index) => parseSummaryItem(item, `${where}.summary[${index}]`)),
  };
  for (const key of OPTIONAL_METADATA_KEYS) {
    const metadata = value[key];
    if (typeof metadata === "string") conversation[key] = metadata;
  }
  if (Array.isArray(value.rtt)) {
    conversation.rtt = value.rtt.map(asString);
  }
  return conversation;
}

export function parseConversationsResponse(body: unknown): ConversationsResponse {
  if (!isPlainObject(body) || !Array.isArray(body.conversations)) {
    throw new PayloadError("response has no conversations list");
  }
  const conversations = body.conversations.map((value, index) => parseConversation(value, `conversations[${index}]`));
  return {
    count: toFiniteNumber(body.count) ?? conversations.length,
    conversations,
  };
}

export function apiKeyFromSearch(search: string): string {
  return new URLSearchParams(search).get("key") ?? "";
}

async function readErrorMessage(response: Response): Promise<string> {
  try {
    const body: unknown = await response.json();
    return asString(asRecord(asRecord(body).error).message);
  } catch {
    return "";
  }
}

export class ConversationsClient {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: ConversationsClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/g, "");
    this.apiKey = options.apiKey;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  conversationsUrl(options: Pick<FetchConversationsOptions, "active"> = {}): string {
    const params = new URLSearchParams();
    if (this.apiKey) params.set("key", this.apiKey);
    if (options.active !== undefined) params.set("active", String(options.active));
    const query = params.toString();
    return `${this.baseUrl}/api/conversations${query ? `?${query}` : ""}`;
  }

  conversationUrl(id: string): string {
    const params = new URLSearchParams();
    if (this.apiKey) params.set("key", this.apiKey);
    const query = params.toString();
    return `${this.baseUrl}/api/conversation/${encodeURIComponent(id)}${query ? `?${query}` : ""}`;
  }

  async fetchConversations(options: FetchConversationsOptions = {}): Promise<ConversationsResponse> {
    const body = await this.getJson(this.conversationsUrl(options), options.signal);
    return parseConversationsResponse(body);
  }

  async fetchConversation(id: string, signal?: AbortSignal): Promise<Conversation> {
    const body = await this.getJson(this.conversationUrl(id), signal);
    return parseConversation(body);
  }

  private async getJson(url: string, signal?: AbortSignal): Promise<unknown> {
    const init: RequestInit = { cache: "no-store", headers: { accept: "application/json" } };
    if (signal) init.signal = signal;

    let response: Response;
    try {
      response = await this.fetchImpl(url, init);
    } catch (error) {
      throw new ApiRequestError(`request failed: ${asErrorMessage(error)}`, "network");
    }

    if (!response.ok) {
      const message = await readErrorMessage(response);
      throw new ApiRequestError(
        message ? `HTTP ${response.status}: ${message}` : `HTTP ${response.status}`,
        "http",
        response.status,
      );
    }

    try {
      const body: unknown = await response.json();
      return body;
    } catch (error) {
      throw new PayloadError(`response is not JSON: ${asErrorMessage(error)}`);
    }
  }
}
