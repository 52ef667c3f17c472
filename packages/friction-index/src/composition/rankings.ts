/**
 * Rank helpers for AFI values (higher AFI = worse = rank 1)
 */

interface TieBlock {
  /** Values strictly greater than this one */
  readonly above: number;
  /** Values equal to this one, itself included */
  readonly tied: number;
}

function tieBlocks(values: readonly number[]): Map<number, TieBlock> {
  const sorted = [...values].sort((a, b) => b - a);
  const blocks = new Map<number, TieBlock>();
  let i = 0;
  while (i < sorted.length) {
    let j = i;
    while (j < sorted.length && sorted[j] === sorted[i]) j++;
    blocks.set(sorted[i], { above: i, tied: j - i });
    i = j;
  }
  return blocks;
}

/**
 * Descending competition ranks: ties share the lowest rank ("1, 2, 2, 4")
 */
export function competitionRanks(values: readonly number[]): number[] {
  const blocks = tieBlocks(values);
  return values.map((value) => (blocks.get(value)?.above ?? 0) + 1);
}

/**
 * Descending percentile ranks in (0, 100]; tied values get the average of
 * the positions they span
 */
export function percentileRanks(values: readonly number[]): number[] {
  if (values.length === 0) return [];
  const blocks = tieBlocks(values);
  return values.map((value) => {
    const block = blocks.get(value) ?? { above: 0, tied: 1 };
    const averagePosition = block.above + (block.tied + 1) / 2;
    return (averagePosition / values.length) * 100;
  });
}

/**
 * Competition ranks computed separately inside each group
 */
export function groupedCompetitionRanks(
  values: readonly number[],
  groups: readonly string[]
): number[] {
  const members = new Map<string, number[]>();
  groups.forEach((group, i) => {
    const list = members.get(group);
    if (list) list.push(i);
    else members.set(group, [i]);
  });

  const ranks = new Array<number>(values.length).fill(0);
  for (const indices of members.values()) {
    const groupRanks = competitionRanks(indices.map((i) => values[i]));
    indices.forEach((index, k) => {
      ranks[index] = groupRanks[k];
    });
  }
  return ranks;
}
