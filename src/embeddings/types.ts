export type EmbeddingProvider = {
  name: string;
  dimension: number;
  embed: (texts: string[]) => Promise<number[][]>;
};
