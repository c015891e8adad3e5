export interface EmbeddingProvider {
  /** Model identifier, recorded in logs. */
  readonly model: string;

  embed(text: string): Promise<number[]>;

  /**
   * One vector per input, in input order. Either every text is embedded
   * or the call rejects; items are never dropped.
   */
  embedBatch(texts: readonly string[]): Promise<number[][]>;
}
