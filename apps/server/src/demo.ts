import { readFile } from "node:fs/promises";
import path from "node:path";
import type { Conversation } from "@callboard/contracts";
import { asErrorMessage, mergeTimeline, parseConversation, PayloadError } from "@callboard/core";
import type { ConversationStore } from "./store.js";

export const DEFAULT_DEMO_STEP_MS = 1_500;

export interface PlayDemoOptions {
  stepMs?: number;
}

export interface DemoPlayback {
  done: Promise<void>;
  stop(): void;
}

/** Reads a scripted conversation: the same JSON shape the read API serves. */
export async function loadDemoScript(filePath: string): Promise<Conversation> {
  const raw = await readFile(filePath, "utf8");
  let body: unknown;
  try {
    body = JSON.parse(raw);
  } catch (error) {
    throw new PayloadError(`demo script ${filePath} is not JSON: ${asErrorMessage(error)}`);
  }
  return parseConversation(body, `demo script ${path.basename(filePath)}`);
}

/**
 * Replays a finished conversation into the store as if it were happening
 * live: one utterance or summary per step, in timeline order, then the
 * conversation is marked inactive.
 */
export function playDemo(store: ConversationStore, script: Conversation, options: PlayDemoOptions = {}): DemoPlayback {
  const stepMs = Math.max(0, options.stepMs ?? DEFAULT_DEMO_STEP_MS);
  const steps = mergeTimeline(script.transcript, script.summary);
  let stopped = false;
  let cancelWait: (() => void) | null = null;

  const wait = (ms: number) =>
    new Promise<void>((resolve) => {
      const handle = setTimeout(() => {
        cancelWait = null;
        resolve();
      }, ms);
      cancelWait = () => {
        clearTimeout(handle);
        resolve();
      };
    });

  const run = async () => {
    await store.set({ ...script, active: true, transcript: [], summary: [] });
    for (const step of steps) {
      await wait(stepMs);
      if (stopped) return;
      if (step.kind === "utterance") {
        await store.appendTranscript(script.id, step.item);
      } else {
        await store.appendSummary(script.id, step.item);
      }
    }
    await store.setActive(script.id, false);
  };

  return {
    done: run(),
    stop() {
      stopped = true;
      const cancel = cancelWait;
      cancelWait = null;
      cancel?.();
    },
  };
}
