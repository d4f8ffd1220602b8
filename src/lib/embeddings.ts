import OpenAI from 'openai';

// Query-side embeddings. Stored chunks were embedded upstream with the same
// model and dimension count; a mismatch makes pgvector reject the query.

export type Embedder = (text: string) => Promise<number[]>;

let client: OpenAI | undefined;

function getClient(): OpenAI {
  if (!client) {
    client = new OpenAI();
  }
  return client;
}

export function createOpenAIEmbedder(options: { model: string; dimensions: number }): Embedder {
  return async (text: string) => {
    const response = await getClient().embeddings.create({
      model: options.model,
      input: text,
      dimensions: options.dimensions,
    });
    const embedding = response.data[0]?.embedding;
    if (!embedding) {
      throw new Error(`Embedding response contained no vectors (model ${options.model})`);
    }
    return embedding;
  };
}

/** pgvector literal: '[0.1,0.2,...]' */
export function toVectorLiteral(embedding: readonly number[]): string {
  return `[${embedding.join(',')}]`;
}
