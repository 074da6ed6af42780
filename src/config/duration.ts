const DURATION_PATTERN = /^([0-9]+)\s*(ms|s|m|h|d)$/;

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
};

/** Largest delay `setTimeout` honours; anything above fires after 1ms. */
export const MAX_DURATION_MS = 2_147_483_647;

function parseUnbounded(raw: string | number): number | null {
  if (typeof raw === "number") {
    return Number.isInteger(raw) && raw > 0 ? raw : null;
  }
  const value = raw.trim().toLowerCase();
  if (!value) {
    return null;
  }
  if (/^[0-9]+$/.test(value)) {
    const ms = Number(value);
    return ms > 0 ? ms : null;
  }
  const match = DURATION_PATTERN.exec(value);
  if (!match) {
    return null;
  }
  const amount = Number(match[1]);
  if (!Number.isFinite(amount) || amount <= 0) {
    return null;
  }
  return amount * (UNIT_MS[match[2] ?? ""] ?? 0);
}

/** Returns why `raw` is not a usable duration, or null when it is. */
export function durationIssue(raw: string | number): string | null {
  const ms = parseUnbounded(raw);
  if (ms === null) {
    return "Expected a positive duration like 30s, 5m or 250ms";
  }
  if (ms > MAX_DURATION_MS) {
    return `Duration must not exceed ${MAX_DURATION_MS}ms (about 24.8 days)`;
  }
  return null;
}

/** Parses "30s", "5m", "250ms" and the like; bare numbers are milliseconds. */
export function parseDurationMs(raw: string | number): number | null {
  const ms = parseUnbounded(raw);
  return ms !== null && ms <= MAX_DURATION_MS ? ms : null;
}
