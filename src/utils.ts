export const sleep = (ms: number) => new Promise<void>((res) => setTimeout(res, ms));

/** Parses a scraped count such as " 1,024 "; anything that is not a whole number is unknown. */
export function parseSeatCount(text: string | null | undefined): number | null {
  if (text == null) return null;
  const cleaned = text.trim().replace(/,/g, "");
  if (!/^[+-]?\d+$/.test(cleaned)) return null;
  return parseInt(cleaned, 10);
}

export function normalizeText(s: string | null | undefined): string {
  return (s ?? "").replace(/\s+/g, " ").trim();
}

export function formatUtcTime(date: Date): string {
  return date.toISOString().slice(11, 19);
}

/**
 * Wraps an async task so that calls made while it is still running are
 * skipped. Resolves to `undefined` for a skipped call.
 */
export function exclusive<T>(task: () => Promise<T>, onSkip?: () => void): () => Promise<T | undefined> {
  let running = false;
  return async () => {
    if (running) {
      onSkip?.();
      return undefined;
    }
    running = true;
    try {
      return await task();
    } finally {
      running = false;
    }
  };
}
