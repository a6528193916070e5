import { END_OF_CONVERSATION } from "@callboard/contracts";

const ISO_TIME_DURATION = /^P?T?(?:(\d+(?:\.\d+)?)H)?(?:(\d+(?:\.\d+)?)M)?(?:(\d+(?:\.\d+)?)S)?$/i;
const UNIT_MARKERS = /[PTS]/gi;

function partSeconds(value: string | undefined, unitSeconds: number): number {
  return value === undefined ? 0 : Number(value) * unitSeconds;
}

/**
 * Seconds into the conversation for a backend timestamp such as `PT12.50S`.
 * The `"end"` sentinel sorts after everything else. Anything unreadable
 * counts as the start of the conversation.
 */
export function parseDuration(value: unknown): number {
  if (typeof value !== "string") return 0;
  const trimmed = value.trim();
  if (trimmed === END_OF_CONVERSATION) return Number.POSITIVE_INFINITY;
  if (!trimmed) return 0;

  const match = trimmed.match(ISO_TIME_DURATION);
  if (match && (match[1] !== undefined || match[2] !== undefined || match[3] !== undefined)) {
    return partSeconds(match[1], 3_600) + partSeconds(match[2], 60) + partSeconds(match[3], 1);
  }

  const parsed = Number.parseFloat(trimmed.replace(UNIT_MARKERS, ""));
  return Number.isFinite(parsed) ? parsed : 0;
}

export function formatDuration(seconds: number): string {
  if (seconds === Number.POSITIVE_INFINITY) return END_OF_CONVERSATION;
  if (!Number.isFinite(seconds) || seconds < 0) return "0:00";
  const whole = Math.floor(seconds);
  const hours = Math.floor(whole / 3_600);
  const minutes = Math.floor((whole % 3_600) / 60);
  const secs = String(whole % 60).padStart(2, "0");
  if (hours > 0) return `${hours}:${String(minutes).padStart(2, "0")}:${secs}`;
  return `${minutes}:${secs}`;
}
