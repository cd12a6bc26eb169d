/**
 * Keyword ranking used when no embedding model is available
 *
 * Scoring (all comparisons lowercased):
 * - exact name match, else query contained in name
 * - query contained in description
 * - per query word present among name words / description words
 * - fuzzy: for query words of 3+ chars, partial overlap with name and
 *   description words of 3+ chars
 * - category bonus, only when something else matched
 */

import type { LexicalWeights, SearchHit, ServerEntry } from "@/types";
import { LEXICAL_WEIGHTS } from "@/constants";

function splitWords(text: string): Set<string> {
  return new Set(text.split(/\s+/).filter((word) => word.length > 0));
}

function fuzzyMatches(
  queryWord: string,
  words: ReadonlySet<string>,
  minLength: number,
): number {
  let matches = 0;
  for (const word of words) {
    if (word.length >= minLength && (queryWord.includes(word) || word.includes(queryWord))) {
      matches++;
    }
  }
  return matches;
}

/**
 * Score one entry against a query; 0 means no match
 */
export function scoreEntry(
  query: string,
  entry: ServerEntry,
  weights: LexicalWeights = LEXICAL_WEIGHTS,
): number {
  const q = query.toLowerCase().trim();
  if (!q) {
    return 0;
  }
  const name = entry.name.toLowerCase();
  const description = entry.description.toLowerCase();

  let score = 0;

  if (q === name) {
    score += weights.exactName;
  } else if (name.includes(q)) {
    score += weights.nameSubstring;
  }

  if (description.includes(q)) {
    score += weights.descriptionSubstring;
  }

  const queryWords = splitWords(q);
  const nameWords = splitWords(name);
  const descriptionWords = splitWords(description);

  for (const word of queryWords) {
    if (nameWords.has(word)) {
      score += weights.nameWord;
    }
    if (descriptionWords.has(word)) {
      score += weights.descriptionWord;
    }
  }

  for (const word of queryWords) {
    if (word.length < weights.fuzzyMinLength) {
      continue;
    }
    score += weights.fuzzyName * fuzzyMatches(word, nameWords, weights.fuzzyMinLength);
    score +=
      weights.fuzzyDescription * fuzzyMatches(word, descriptionWords, weights.fuzzyMinLength);
  }

  // Categories come from remote headings; only own keys count as bonuses
  if (score > 0 && Object.hasOwn(weights.categoryBonus, entry.category)) {
    score += weights.categoryBonus[entry.category];
  }

  return score;
}

/**
 * Rank entries by lexical score; zero scores are dropped, ties keep catalog order
 */
export function lexicalSearch(
  query: string,
  entries: readonly ServerEntry[],
  topK: number,
  weights: LexicalWeights = LEXICAL_WEIGHTS,
): SearchHit[] {
  const hits: Array<SearchHit & { index: number }> = [];
  entries.forEach((entry, index) => {
    const score = scoreEntry(query, entry, weights);
    if (score > 0) {
      hits.push({ entry, score, index });
    }
  });

  return hits
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .slice(0, Math.max(0, topK))
    .map(({ entry, score }) => ({ entry, score }));
}
