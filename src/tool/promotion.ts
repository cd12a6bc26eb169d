/**
 * Documented-result promotion
 *
 * Presentation-only re-rank: when the top hit has no README, a close
 * runner-up that has one is shown as the primary result instead.
 */

import type { PromotionOptions, SearchHit } from "@/types";
import { PROMOTION } from "@/constants";
import type { ReadmeFetcher } from "./readmeFetcher";

export interface PromotedResult {
  primary: SearchHit;
  readme: string | null;
  /** Remaining hits in rank order, primary excluded */
  rest: SearchHit[];
}

/**
 * Pick the primary hit and fetch its README.
 *
 * Candidates after the first are only considered within `window` and when
 * their score is at least `minScoreRatio` of the top score. `hits` must be in
 * descending score order. READMEs are
 * fetched one candidate at a time, stopping at the first found.
 */
export async function promoteDocumented(
  hits: readonly SearchHit[],
  fetchReadme: ReadmeFetcher,
  options: PromotionOptions = PROMOTION,
): Promise<PromotedResult | null> {
  if (hits.length === 0) {
    return null;
  }

  const [top] = hits;
  const topReadme = await fetchReadme(top.entry.url);
  if (topReadme !== null) {
    return { primary: top, readme: topReadme, rest: hits.slice(1) };
  }

  const threshold = top.score * options.minScoreRatio;
  const window = Math.min(hits.length, Math.max(1, options.window));

  for (let index = 1; index < window; index++) {
    const candidate = hits[index];
    // Hits are ranked, so no later candidate can reach the threshold
    if (candidate.score < threshold) {
      break;
    }
    const readme = await fetchReadme(candidate.entry.url);
    if (readme !== null) {
      return {
        primary: candidate,
        readme,
        rest: hits.filter((_, position) => position !== index),
      };
    }
  }

  return { primary: top, readme: null, rest: hits.slice(1) };
}
