export interface RankEdge {
  from: string;
  to: string;
}

/**
 * Longest-path layering: a node without predecessors sits on rank 0, every
 * other node one rank below its deepest predecessor. Self edges are ignored.
 *
 * A predecessor that is still being ranked (a cycle) counts as rank 0.
 */
export function assignRanks(nodes: readonly string[], edges: readonly RankEdge[]): Map<string, number> {
  const preds = new Map<string, string[]>();
  for (const id of nodes) preds.set(id, []);
  for (const e of edges) {
    if (e.from === e.to) continue;
    const list = preds.get(e.to);
    if (list) list.push(e.from);
    else preds.set(e.to, [e.from]);
    if (!preds.has(e.from)) preds.set(e.from, []);
  }

  const ranks = new Map<string, number>();
  const inProgress = new Set<string>();

  const rankOf = (id: string): number => {
    const known = ranks.get(id);
    if (known !== undefined) return known;
    if (inProgress.has(id)) return 0;
    inProgress.add(id);
    let rank = 0;
    for (const p of preds.get(id) ?? []) {
      rank = Math.max(rank, rankOf(p) + 1);
    }
    inProgress.delete(id);
    ranks.set(id, rank);
    return rank;
  };

  for (const id of preds.keys()) rankOf(id);
  return ranks;
}

/** Group ids by rank, keeping `order` within each rank. */
export function groupByRank(order: readonly string[], ranks: Map<string, number>): string[][] {
  const groups: string[][] = [];
  for (const id of order) {
    const r = ranks.get(id) ?? 0;
    while (groups.length <= r) groups.push([]);
    groups[r].push(id);
  }
  return groups.filter((g) => g.length > 0);
}
