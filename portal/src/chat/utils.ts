const DAY_MS = 24 * 60 * 60 * 1000;

const WEEKDAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];
const MONTHS = [
  "Jan",
  "Feb",
  "Mar",
  "Apr",
  "May",
  "Jun",
  "Jul",
  "Aug",
  "Sep",
  "Oct",
  "Nov",
  "Dec",
];

export const THINKING_PHRASES = [
  "Thinking",
  "Pondering",
  "Mulling it over",
  "Connecting the dots",
  "Gathering thoughts",
  "Working on it",
  "Considering",
  "Piecing it together",
  "Reflecting",
  "Drafting a reply",
];

/** The draft as typed, or `null` when it holds nothing but whitespace. */
export function outgoingMessage(draft: string): string | null {
  return draft.trim().length > 0 ? draft : null;
}

export function pickThinkingPhrase(random: () => number = Math.random): string {
  const index = Math.min(
    THINKING_PHRASES.length - 1,
    Math.floor(random() * THINKING_PHRASES.length),
  );
  return THINKING_PHRASES[index] ?? "Thinking";
}

/**
 * Sidebar label in local time: `HH:MM` today, `Yesterday`, a weekday within
 * the last week, otherwise month and day.
 */
export function formatConversationDate(value: string, now: Date = new Date()): string {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    return "";
  }

  const days = Math.round((startOfDay(now) - startOfDay(date)) / DAY_MS);
  if (days <= 0) {
    return `${pad(date.getHours())}:${pad(date.getMinutes())}`;
  }
  if (days === 1) {
    return "Yesterday";
  }
  if (days < 7) {
    return WEEKDAYS[date.getDay()] ?? "";
  }
  return `${MONTHS[date.getMonth()] ?? ""} ${date.getDate()}`;
}

function startOfDay(date: Date): number {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate()).getTime();
}

function pad(value: number): string {
  return value.toString().padStart(2, "0");
}
