export type RecoveryPhase = "monitoring" | "soft_recovery" | "hard_recovery" | "failed";

export const ALLOWED_TRANSITIONS: ReadonlyMap<RecoveryPhase, RecoveryPhase[]> = new Map([
  ["monitoring", ["soft_recovery", "hard_recovery"]],
  ["soft_recovery", ["monitoring", "hard_recovery"]],
  ["hard_recovery", ["monitoring", "failed"]],
  ["failed", []],
]);

export function canTransition(from: RecoveryPhase, to: RecoveryPhase): boolean {
  const allowed = ALLOWED_TRANSITIONS.get(from);
  return allowed?.includes(to) ?? false;
}

export function validateTransition(from: RecoveryPhase, to: RecoveryPhase): void {
  if (!canTransition(from, to)) {
    const allowed = ALLOWED_TRANSITIONS.get(from);
    throw new Error(
      `Invalid recovery transition: ${from} -> ${to}. Allowed: ${allowed && allowed.length > 0 ? allowed.join(", ") : "none"}`
    );
  }
}
