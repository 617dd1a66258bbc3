const USERNAME_PATTERN = /^[a-z0-9._]{2,24}$/;

export function normalizeUsername(raw: string | null | undefined): string {
  if (!raw) return "";
  return raw.trim().replace(/^@+/, "").trim().toLowerCase();
}

export function isValidUsername(username: string): boolean {
  return USERNAME_PATTERN.test(username);
}

/**
 * Returns the canonical identifier for a username, or null when it does not
 * satisfy the username grammar.
 */
export function toIdentifier(raw: string | null | undefined): string | null {
  const normalized = normalizeUsername(raw);
  return isValidUsername(normalized) ? normalized : null;
}

const MULTIPLIERS: Record<string, number> = {
  K: 1_000,
  M: 1_000_000,
  B: 1_000_000_000,
};

/** Parses compact counters such as "18.5K", "166 K", "1,5M" or "1,234". */
export function parseCount(text: string | null | undefined): number | null {
  if (!text) return null;

  const cleaned = text.replace(/\u00a0/g, " ").trim().toUpperCase();
  if (!cleaned) return null;

  const suffixed = cleaned.match(/^(\d+(?:[.,]\d+)?)\s?([KMB])$/);
  if (suffixed) {
    const base = Number.parseFloat((suffixed[1] ?? "").replace(",", "."));
    const multiplier = MULTIPLIERS[suffixed[2] ?? ""] ?? 1;
    return Number.isFinite(base) ? Math.round(base * multiplier) : null;
  }

  const plain = cleaned.replace(/[\s,]/g, "");
  if (!/^\d+(?:\.\d+)?$/.test(plain)) return null;
  return Math.round(Number.parseFloat(plain));
}

export function stripCounterLabel(text: string, labels: readonly string[]): string {
  let result = text.toLowerCase();
  for (const label of labels) {
    result = result.replace(label.toLowerCase(), "");
  }
  return result.trim();
}

export function hasHashtag(description: string, tag: string): boolean {
  const normalizedTag = tag.trim().replace(/^#/, "").toLowerCase();
  if (!normalizedTag) return false;
  return description.toLowerCase().includes(`#${normalizedTag}`);
}
