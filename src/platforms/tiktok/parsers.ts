import { normalizeUsername, parseCount, stripCounterLabel } from "../../core/normalize";
import type { Bounds } from "../../domain/targets";
import type { ScreenElement } from "../screen";

const COUNTER_LABELS = ["followers", "follower", "following", "likes", "like"];

/** "1.2K Followers" -> 1200; bare counters pass straight through. */
export function parseCounterText(text: string | null): number | null {
  if (!text) return null;
  return parseCount(stripCounterLabel(text, COUNTER_LABELS));
}

/** Authors render as "@name" or "name · 3d ago"; keep only the handle. */
export function parseAuthor(text: string | null): string {
  if (!text) return "";
  const [handle = ""] = normalizeUsername(text).split(/[\s·•]+/);
  return handle;
}

export const ROW_STATUS_LABELS = ["Follow", "Follow back", "Following", "Friends", "Requested"] as const;
export type RowStatus = (typeof ROW_STATUS_LABELS)[number];

export function parseRowStatus(text: string | null): RowStatus | null {
  const trimmed = text?.trim() ?? "";
  return ROW_STATUS_LABELS.find((label) => label.toLowerCase() === trimmed.toLowerCase()) ?? null;
}

/** Labels that mean the account already follows us back or is followed. */
export function isFriendStatus(label: string | null): boolean {
  return label === "Friends" || label === "Following";
}

function overlapsVertically(a: Bounds, b: Bounds): boolean {
  return a.top < b.bottom && a.bottom > b.top;
}

export interface ListRow {
  username: string;
  displayName: string;
  status: RowStatus | null;
  bounds: Bounds;
  buttonBounds: Bounds | null;
}

/**
 * Pairs each row's username with the status button and display name sharing
 * its vertical band, in on-screen order.
 */
export function pairListRows(
  usernames: readonly ScreenElement[],
  buttons: readonly ScreenElement[],
  displayNames: readonly ScreenElement[] = []
): ListRow[] {
  return [...usernames]
    .sort((a, b) => a.bounds.top - b.bounds.top)
    .map((element) => {
      const button = buttons.find((candidate) => overlapsVertically(candidate.bounds, element.bounds));
      const name = displayNames.find((candidate) => overlapsVertically(candidate.bounds, element.bounds));
      return {
        username: normalizeUsername(element.text),
        displayName: name?.text.trim() ?? "",
        status: parseRowStatus(button?.text ?? null),
        bounds: element.bounds,
        buttonBounds: button?.bounds ?? null,
      };
    });
}
