/**
 * Group records by round number, preserving their order within each round
 */
export function groupByRound<T extends { round_num: number }>(
  records: readonly T[],
): Map<number, T[]> {
  const groups = new Map<number, T[]>();

  for (const record of records) {
    const existing = groups.get(record.round_num);
    if (existing) {
      existing.push(record);
    } else {
      groups.set(record.round_num, [record]);
    }
  }

  return groups;
}

/**
 * Chronological order for kills: tick, then emission order
 */
export function compareKills(
  a: { tick: number; kill_id: number },
  b: { tick: number; kill_id: number },
): number {
  return a.tick - b.tick || a.kill_id - b.kill_id;
}
