/**
 * Query tool result types
 */

export interface ServerDetails {
  name: string;
  description: string;
  url: string;
  category: string;
  source: string;
  readme: string | null;
}

export type FindServerResult =
  | { status: "found"; server: ServerDetails; alternatives: ServerDetails[] }
  | { status: "not_found"; message: string; suggestions: string[] }
  | { status: "error"; message: string };

export interface PromotionOptions {
  /** Number of top candidates inspected, primary included */
  window: number;
  /** Minimum candidate score as a fraction of the top score */
  minScoreRatio: number;
}

export interface FindServerInput {
  description: string;
  exampleQuestion?: string;
}
