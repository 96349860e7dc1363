/** Routing cost used for "infinite"/unreachable; every cost is capped here. */
export const MAX_LINK_COST = 99.99;

/**
 * Read a loosely-typed numeric field. Absent, empty or malformed values are
 * unknown (`null`), never zero.
 */
export function toNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  if (trimmed === "") return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

export function toInteger(value: unknown): number | null {
  const parsed = toNumber(value);
  return parsed !== null && Number.isInteger(parsed) ? parsed : null;
}

/**
 * Link quality as a percentage. Fractions (0–1) are scaled; values already in
 * (1, 100] are taken as percent; anything else is unknown.
 */
export function toPercent(value: unknown): number | null {
  const parsed = toNumber(value);
  if (parsed === null || parsed < 0) return null;
  if (parsed <= 1) return Math.round(parsed * 10_000) / 100;
  if (parsed <= 100) return parsed;
  return null;
}

/** Routing cost in [0, 99.99]; "INFINITE" and anything larger is capped. */
export function toLinkCost(value: unknown): number | null {
  if (typeof value === "string" && value.trim().toUpperCase() === "INFINITE") return MAX_LINK_COST;
  const parsed = toNumber(value);
  if (parsed === null || parsed < 0) return null;
  return Math.min(parsed, MAX_LINK_COST);
}

/** Boolean flags arrive as booleans, "true"/"false" strings or 0/1. */
export function toFlag(value: unknown): boolean | null {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value !== 0;
  if (typeof value === "string") {
    const lowered = value.trim().toLowerCase();
    if (lowered === "true" || lowered === "1" || lowered === "yes") return true;
    if (lowered === "false" || lowered === "0" || lowered === "no") return false;
  }
  return null;
}

const UPTIME_PATTERN = /^(?:(\d+) days?, )?(\d+):(\d{2}):(\d{2})/;

/** "3 days, 04:05:06" → seconds. Unparseable or empty strings are unknown. */
export function parseUptime(upTime: string): number | null {
  const match = UPTIME_PATTERN.exec(upTime.trim());
  if (!match) return null;
  const days = match[1] ? Number(match[1]) : 0;
  return 86_400 * days + 3_600 * Number(match[2]) + 60 * Number(match[3]) + Number(match[4]);
}

const ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " ",
  deg: "°",
};

/** Node descriptions are stored HTML-escaped by the firmware's setup page. */
export function unescapeHtml(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (whole, entity: string) => {
    if (entity[0] === "#") {
      const code = entity[1] === "x" || entity[1] === "X" ? Number.parseInt(entity.slice(2), 16) : Number(entity.slice(1));
      return Number.isFinite(code) && code <= 0x10ffff ? String.fromCodePoint(code) : whole;
    }
    return ENTITIES[entity.toLowerCase()] ?? whole;
  });
}
