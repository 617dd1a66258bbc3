/**
 * Scroll attempts to spend looking for unseen targets, given how many were
 * already visited and, when known, how many the list holds.
 */
export function smartScrollBudget(alreadyVisited: number, totalKnown: number | null): number {
  const visited = Math.max(0, alreadyVisited);

  if (totalKnown !== null && totalKnown > 0) {
    const ratio = visited / totalKnown;
    if (ratio >= 0.9) return 5;
    if (ratio >= 0.7) return 10;
    if (ratio >= 0.5) return 15;
    return 20;
  }

  if (visited < 50) return 15;
  if (visited < 100) return 10;
  return 5;
}
