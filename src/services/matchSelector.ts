import type { ItemOrigin, ReleaseCandidate } from '../types/Release';
import type { TrackedShow } from '../types/Show';
import { NoCandidateError } from '../utils/errors';

export type SelectionCriterion =
  | 'only'
  | 'group'
  | 'preference'
  | 'resolution'
  | 'source'
  | 'seeders'
  | 'firstSeen'
  | 'contentId';

export interface Selection {
  candidate: ReleaseCandidate;
  confidence: number;
  deferred: boolean;
  decidedBy: SelectionCriterion;
}

export interface SelectorOptions {
  sourcePriority: ItemOrigin[];
  confidenceThreshold: number;
}

export const CRITERION_CONFIDENCE: Record<SelectionCriterion, number> = {
  only: 1,
  group: 1,
  preference: 0.95,
  resolution: 0.9,
  source: 0.75,
  seeders: 0.6,
  firstSeen: 0.5,
  contentId: 0.25,
};

const DEFAULT_OPTIONS: SelectorOptions = {
  sourcePriority: ['rss', 'scrape'],
  confidenceThreshold: 0,
};

type Comparator = (a: ReleaseCandidate, b: ReleaseCandidate) => number;

function sourceRank(origin: ItemOrigin, priority: ItemOrigin[]): number {
  const index = priority.indexOf(origin);
  return index === -1 ? priority.length : index;
}

function criteria(show: TrackedShow, options: SelectorOptions): Array<[SelectionCriterion, Comparator]> {
  const preferred = show.preferredGroup?.trim().toLowerCase() || '';
  const groupRank = (c: ReleaseCandidate) => (preferred && c.group.toLowerCase() === preferred ? 0 : 1);

  return [
    ['group', (a, b) => groupRank(a) - groupRank(b)],
    ['preference', (a, b) => (b.preference ?? 0) - (a.preference ?? 0)],
    ['resolution', (a, b) => b.resolutionValue - a.resolutionValue],
    ['source', (a, b) => sourceRank(a.origin, options.sourcePriority) - sourceRank(b.origin, options.sourcePriority)],
    ['seeders', (a, b) => b.seeders - a.seeders],
    ['firstSeen', (a, b) => a.seenIndex - b.seenIndex],
    ['contentId', (a, b) => (a.contentId < b.contentId ? -1 : a.contentId > b.contentId ? 1 : 0)],
  ];
}

/**
 * Picks one release among the accepted candidates for a single episode.
 * Confidence is that of the first criterion separating the top two.
 */
export function select(
  candidates: ReleaseCandidate[],
  show: TrackedShow,
  options: SelectorOptions = DEFAULT_OPTIONS
): Selection {
  if (candidates.length === 0) {
    throw new NoCandidateError(`No accepted release for ${show.title}`);
  }

  const ordered = criteria(show, options);
  const ranked = [...candidates].sort((a, b) => {
    for (const [, compare] of ordered) {
      const result = compare(a, b);
      if (result !== 0) return result;
    }
    return 0;
  });

  const [best, runnerUp] = ranked;
  let decidedBy: SelectionCriterion = 'only';
  if (runnerUp) {
    const separating = ordered.find(([, compare]) => compare(best, runnerUp) !== 0);
    // Identical candidates (same content id) fall through to the last criterion
    decidedBy = separating ? separating[0] : 'contentId';
  }

  const confidence = CRITERION_CONFIDENCE[decidedBy];
  return {
    candidate: best,
    confidence,
    deferred: confidence < options.confidenceThreshold,
    decidedBy,
  };
}
