// Wires the production collaborators (Postgres, OpenAI embeddings, Anthropic) into the pipeline.

import { complete } from './anthropic';
import type { ExtractionConfig } from './config';
import { DocumentStatusStore } from './document-status';
import { createOpenAIEmbedder } from './embeddings';
import { ExtractionChain } from './extraction/extraction-chain';
import { processDocument, type DocumentRunSummary, type PipelineDeps } from './pipeline';
import { PgRepository } from './repository';
import { FilteredRetriever } from './retrieval/filtered-retriever';
import { PgVectorStore } from './retrieval/vector-store';
import { handleTask, type Delivery, type TaskOutcome } from './task-handler';
import { IndicatorValidator, loadRangeTable } from './validators';

export interface ExtractionWorker {
  deps: PipelineDeps;
  process(documentKey: string): Promise<DocumentRunSummary>;
  handle(body: string, delivery: Delivery): Promise<TaskOutcome>;
}

export async function createExtractionWorker(config: ExtractionConfig): Promise<ExtractionWorker> {
  const repository = new PgRepository();
  const retriever = new FilteredRetriever(createOpenAIEmbedder(config.embedding), new PgVectorStore());

  const deps: PipelineDeps = {
    repository,
    statusStore: new DocumentStatusStore(repository),
    validator: new IndicatorValidator(
      config.numericRangesPath ? loadRangeTable(config.numericRangesPath) : loadRangeTable()
    ),
    catalog: await repository.loadIndicatorCatalog(),
    pillarWeights: config.pillarWeights,
    createChain: (companyName, reportYear) =>
      new ExtractionChain(companyName, reportYear, { retriever, complete }, {
        k: config.retrieval.k,
        distanceThreshold: config.retrieval.distanceThreshold,
        model: config.model.name,
        temperature: config.model.temperature,
        maxTokens: config.model.maxTokens,
        retryPolicy: config.retry,
      }),
  };

  const run = (documentKey: string) => processDocument(documentKey, deps);

  return {
    deps,
    process: run,
    handle: (body, delivery) =>
      handleTask(body, delivery, {
        repository,
        process: run,
        maxDeliveryAttempts: config.delivery.maxDeliveryAttempts,
        maxEmbeddingChecks: config.delivery.maxEmbeddingChecks,
      }),
  };
}
