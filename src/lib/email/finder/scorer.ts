/**
 * Candidate Merger / Scorer
 *
 * Folds every RawCandidate found for one person into a ranked list, one
 * entry per address. Deterministic: the same multiset of candidates always
 * produces the same ordered output, whatever order it arrives in.
 */

import { SCORING } from '../../constants';
import { splitAddress } from './extractor';
import type { RawCandidate, ScoredCandidate, SourceKind } from './types';

export function baseScore(source: SourceKind): number {
  return SCORING.BASE[source];
}

// Plain code-unit order; localeCompare would depend on the runtime's locale
function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Which raw candidate represents an address: best source, then the
 * shallowest page, then the lowest source url (bio text has none).
 */
function compareRepresentatives(a: RawCandidate, b: RawCandidate): number {
  const bySource = baseScore(b.source) - baseScore(a.source);
  if (bySource !== 0) return bySource;

  const byDepth = a.foundAtDepth - b.foundAtDepth;
  if (byDepth !== 0) return byDepth;

  if (a.sourceUrl === b.sourceUrl) return 0;
  if (a.sourceUrl === undefined) return -1;
  if (b.sourceUrl === undefined) return 1;
  return compareStrings(a.sourceUrl, b.sourceUrl);
}

/**
 * Ranking order: score, then shorter local-part, then the address itself
 */
export function compareScored(
  a: Pick<ScoredCandidate, 'score' | 'address'>,
  b: Pick<ScoredCandidate, 'score' | 'address'>
): number {
  const byScore = b.score - a.score;
  if (byScore !== 0) return byScore;

  const byLocalLength = splitAddress(a.address).localPart.length - splitAddress(b.address).localPart.length;
  if (byLocalLength !== 0) return byLocalLength;

  return compareStrings(a.address, b.address);
}

/**
 * Merge and rank candidates for one user.
 *
 * Score = base score of the best source (bio 3, profile link 2, deep link 1)
 * + 1 once the address was seen from two or more kinds of source.
 * Nothing is dropped: every distinct address appears exactly once.
 */
export function mergeCandidates(candidates: readonly RawCandidate[]): ScoredCandidate[] {
  const byAddress = new Map<string, RawCandidate[]>();
  for (const candidate of candidates) {
    const group = byAddress.get(candidate.address);
    if (group) {
      group.push(candidate);
    } else {
      byAddress.set(candidate.address, [candidate]);
    }
  }

  const scored: Omit<ScoredCandidate, 'rank'>[] = [];

  for (const group of byAddress.values()) {
    const [representative] = [...group].sort(compareRepresentatives);
    const sources = [...new Set(group.map(c => c.source))]
      .sort((a, b) => baseScore(b) - baseScore(a));
    const corroboration = sources.length > 1 ? SCORING.CORROBORATION_BONUS : 0;

    scored.push({
      ...representative,
      score: baseScore(representative.source) + corroboration,
      sources,
    });
  }

  return scored
    .sort(compareScored)
    .map((candidate, index) => ({ ...candidate, rank: index + 1 }));
}
