import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { Rank } from '../schemas/taxon.js';

const rankListSchema = z.object({
  ranks: z.array(z.string()).min(1),
});

const RANKS_FILE = new URL('../../data/ncbi-ranks.json', import.meta.url);

/**
 * The rank labels the NCBI Taxonomy uses, read once from data/ncbi-ranks.json
 */
export const NCBI_RANKS: ReadonlySet<Rank> = new Set(
  rankListSchema.parse(JSON.parse(readFileSync(RANKS_FILE, 'utf8'))).ranks
);

export const NO_RANK: Rank = 'no rank';

export function isKnownRank(rank: Rank): boolean {
  return NCBI_RANKS.has(rank);
}

/**
 * Interns rank labels so that millions of nodes share one string per label,
 * and gives each label a stable small integer for the snapshot encoding.
 */
export class RankTable {
  private readonly refs = new Map<Rank, number>();
  private readonly labels: Rank[] = [];
  private readonly unrecognized = new Set<Rank>();

  constructor(labels: Iterable<Rank> = []) {
    for (const label of labels) {
      this.intern(label);
    }
  }

  /**
   * Return the shared instance of `label`, registering it on first sight
   */
  intern(label: Rank): Rank {
    return this.labels[this.refOf(label)] ?? label;
  }

  refOf(label: Rank): number {
    const existing = this.refs.get(label);
    if (existing !== undefined) return existing;

    const ref = this.labels.length;
    this.refs.set(label, ref);
    this.labels.push(label);
    if (!isKnownRank(label)) {
      this.unrecognized.add(label);
    }
    return ref;
  }

  labelOf(ref: number): Rank | undefined {
    return this.labels[ref];
  }

  /**
   * Labels in registration order, index = ref
   */
  toArray(): Rank[] {
    return [...this.labels];
  }

  /**
   * Registered labels that are not NCBI ranks, in first-seen order
   */
  unrecognizedRanks(): Rank[] {
    return [...this.unrecognized];
  }

  get size(): number {
    return this.labels.length;
  }
}
