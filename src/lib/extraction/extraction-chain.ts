// Extraction chain: retrieve → prompt → model → structured result, for one indicator
// of one company/year. Retrieval and the model call are retried independently.

import type { CompletionFn } from '../anthropic';
import {
  buildExtractionPrompt,
  buildSearchQuery,
  EXTRACTION_SYSTEM_PROMPT,
} from '../prompts/extraction-prompt';
import type { FilteredRetriever } from '../retrieval/filtered-retriever';
import { DEFAULT_RETRY_POLICY, withRetry, type RetryOptions, type RetryPolicy } from '../retry';
import type { ExtractionResult, IndicatorDefinition } from '../types';
import { parseIndicatorOutput } from './output-schema';

export interface ExtractionChainOptions {
  k?: number;
  distanceThreshold?: number;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  retryPolicy?: RetryPolicy;
  retryOptions?: RetryOptions;
}

export interface ExtractionChainDeps {
  retriever: FilteredRetriever;
  complete: CompletionFn;
}

export class ExtractionChain {
  private readonly k: number;
  private readonly retryPolicy: RetryPolicy;
  private readonly retryOptions: RetryOptions;

  constructor(
    readonly companyName: string,
    readonly reportYear: number,
    private readonly deps: ExtractionChainDeps,
    private readonly options: ExtractionChainOptions = {}
  ) {
    this.k = options.k ?? 10;
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.retryOptions = { logPrefix: '[ExtractionChain]', ...options.retryOptions };
  }

  async extract(definition: IndicatorDefinition): Promise<ExtractionResult> {
    const query = buildSearchQuery(definition);

    const chunks = await withRetry(
      `retrieval for ${definition.code}`,
      () => this.deps.retriever.retrieve(this.companyName, this.reportYear, query, this.k, {
        distanceThreshold: this.options.distanceThreshold,
      }),
      this.retryPolicy,
      this.retryOptions
    );

    const prompt = buildExtractionPrompt({
      companyName: this.companyName,
      reportYear: this.reportYear,
      definition,
      chunks,
    });

    // Parsing sits inside the retried call: a malformed answer is worth asking again
    const output = await withRetry(
      `model call for ${definition.code}`,
      async () => {
        const response = await this.deps.complete(EXTRACTION_SYSTEM_PROMPT, prompt, {
          model: this.options.model,
          temperature: this.options.temperature ?? 0.1,
          maxTokens: this.options.maxTokens,
        });
        return parseIndicatorOutput(response);
      },
      this.retryPolicy,
      this.retryOptions
    );

    if (output.indicator_code !== definition.code) {
      console.warn(
        `[ExtractionChain] Model answered for ${output.indicator_code} while extracting ${definition.code}; keeping ${definition.code}`
      );
    }

    return {
      indicatorCode: definition.code,
      value: output.value,
      numericValue: output.numeric_value,
      unit: output.unit || definition.unit || '',
      confidence: output.confidence,
      sourcePages: output.source_pages,
      retrievedChunks: chunks,
    };
  }
}
