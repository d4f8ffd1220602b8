// Batch extraction across the nine BRSR attribute groups.
// One indicator's failure is logged and skipped; the rest of the batch still runs.

import type { IndicatorCatalog } from '../catalog';
import { parseDocumentKey } from '../document-key';
import { CompanyNotFoundError, errorMessage } from '../errors';
import { STATUS } from '../progress';
import type { ExtractionRepository } from '../repository';
import type { ExtractedIndicator, ExtractionResult, IndicatorDefinition } from '../types';

export interface IndicatorExtractor {
  extract(definition: IndicatorDefinition): Promise<ExtractionResult>;
}

export type ChainFactory = (companyName: string, reportYear: number) => IndicatorExtractor;

export interface ExtractionFailure {
  indicatorCode: string;
  attributeNumber: number;
  error: string;
}

export interface BatchExtractionResult {
  companyId: number;
  companyName: string;
  reportYear: number;
  indicators: ExtractedIndicator[];
  failures: ExtractionFailure[];
  attempted: number;
}

export class BatchExtractor {
  constructor(
    private readonly catalog: IndicatorCatalog,
    private readonly repository: Pick<ExtractionRepository, 'resolveCompanyId' | 'findChunkIdsForPages'>,
    private readonly createChain: ChainFactory,
    private readonly now: () => Date = () => new Date()
  ) {}

  async extractAll(
    documentKey: string,
    indicatorSet?: readonly IndicatorDefinition[]
  ): Promise<ExtractedIndicator[]> {
    const result = await this.run(documentKey, indicatorSet);
    return result.indicators;
  }

  /** Same as extractAll, with the failure list kept for reporting. */
  async run(
    documentKey: string,
    indicatorSet?: readonly IndicatorDefinition[]
  ): Promise<BatchExtractionResult> {
    const { companyName, reportYear } = parseDocumentKey(documentKey);

    const companyId = await this.repository.resolveCompanyId(companyName);
    if (companyId === null) {
      throw new CompanyNotFoundError(companyName);
    }

    const groups = this.catalog.groupByAttribute(indicatorSet);
    const attempted = groups.reduce((sum, [, defs]) => sum + defs.length, 0);
    console.log(
      `[BatchExtractor] ${documentKey}: ${attempted} indicators across ${groups.length} attribute groups ` +
      `(company_id=${companyId}, year=${reportYear})`
    );

    const chain = this.createChain(companyName, reportYear);
    const indicators: ExtractedIndicator[] = [];
    const failures: ExtractionFailure[] = [];

    for (const [step, [attribute, definitions]] of groups.entries()) {
      STATUS.attributeStarted(attribute, step + 1, groups.length, definitions.length);
      let succeeded = 0;

      for (const definition of definitions) {
        try {
          const extraction = await chain.extract(definition);
          const sourceChunkIds = await this.resolveChunkIds(companyName, reportYear, extraction);
          indicators.push({
            documentKey,
            companyId,
            reportYear,
            indicatorCode: definition.code,
            extractedValue: extraction.value,
            numericValue: extraction.numericValue,
            confidence: extraction.confidence,
            validationStatus: 'pending',
            sourcePages: extraction.sourcePages,
            sourceChunkIds,
            extractedAt: this.now(),
          });
          succeeded++;
          STATUS.indicatorExtracted(definition.code, extraction.confidence);
        } catch (err) {
          const message = errorMessage(err);
          console.error(
            `[BatchExtractor] Failed ${definition.code} (attribute ${attribute}): ${message}`
          );
          failures.push({ indicatorCode: definition.code, attributeNumber: attribute, error: message });
          STATUS.indicatorFailed(definition.code, attribute, message);
        }
      }

      console.log(`[BatchExtractor] Attribute ${attribute}: ${succeeded}/${definitions.length} extracted`);
    }

    console.log(`[BatchExtractor] ${documentKey}: ${indicators.length}/${attempted} indicators extracted`);
    if (failures.length > 0) {
      console.warn(
        `[BatchExtractor] ${failures.length} failed: ${failures.map(f => f.indicatorCode).join(', ')}`
      );
    }
    STATUS.extractionComplete(indicators.length, attempted);

    return { companyId, companyName, reportYear, indicators, failures, attempted };
  }

  private async resolveChunkIds(
    companyName: string,
    reportYear: number,
    extraction: ExtractionResult
  ): Promise<number[]> {
    try {
      return await this.repository.findChunkIdsForPages(companyName, reportYear, extraction.sourcePages);
    } catch (err) {
      console.warn(
        `[BatchExtractor] Could not resolve chunk ids for ${extraction.indicatorCode} ` +
        `pages [${extraction.sourcePages.join(', ')}]: ${errorMessage(err)}`
      );
      return [];
    }
  }
}
