/**
 * Search constants and tunables
 */

import type { LexicalWeights } from "@/types";

export const DEFAULT_TOP_K = 20;

/**
 * Semantic hits below this cosine similarity are dropped by the database
 */
export const MIN_SIMILARITY = 0.1;

export const LEXICAL_WEIGHTS: LexicalWeights = {
  exactName: 100,
  nameSubstring: 50,
  descriptionSubstring: 30,
  nameWord: 20,
  descriptionWord: 10,
  fuzzyName: 5,
  fuzzyDescription: 2,
  fuzzyMinLength: 3,
  categoryBonus: {
    reference: 5,
    official: 3,
  },
};
