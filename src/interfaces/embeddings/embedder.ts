/**
 * Embedder Interface
 */

/**
 * A loaded embedding model handle
 */
export interface Embedder {
  /**
   * Model identifier; must match the model a matrix was built with
   */
  readonly modelName: string;

  /**
   * Length of every vector this model returns
   */
  readonly dimensions: number;

  /**
   * Embed texts, one vector per input in input order
   */
  embed(texts: readonly string[]): Promise<number[][]>;
}

/**
 * Resolves the model handle on first use. Rejects when the model cannot be
 * reached; callers switch to lexical search.
 */
export type EmbedderLoader = () => Promise<Embedder>;
