// Prompts for BRSR indicator extraction

import type { IndicatorDefinition, RetrievedChunk } from '../types';

export const EXTRACTION_SYSTEM_PROMPT =
  'You are an expert ESG analyst extracting quantitative and qualitative indicators from ' +
  'Business Responsibility and Sustainability Reports (BRSR). You answer with a single JSON object and nothing else.';

export const NO_CONTEXT_MESSAGE = 'No relevant context found in the document.';

const PILLAR_NAMES = { E: 'Environmental', S: 'Social', G: 'Governance' } as const;

export function buildSearchQuery(definition: IndicatorDefinition): string {
  return [definition.name, definition.description, definition.unit ?? '']
    .map(part => part.trim())
    .filter(Boolean)
    .join(' ');
}

export function formatContext(chunks: readonly RetrievedChunk[]): string {
  if (chunks.length === 0) return NO_CONTEXT_MESSAGE;
  return chunks
    .map(c => `[Page ${c.pageNumber}, Chunk ${c.chunkIndex}]\n${c.text}`)
    .join('\n\n---\n\n');
}

export interface ExtractionPromptInput {
  companyName: string;
  reportYear: number;
  definition: IndicatorDefinition;
  chunks: readonly RetrievedChunk[];
}

export function buildExtractionPrompt({ companyName, reportYear, definition, chunks }: ExtractionPromptInput): string {
  return `COMPANY: ${companyName}
REPORT YEAR: ${reportYear}

INDICATOR TO EXTRACT:
- Code: ${definition.code}
- Name: ${definition.name}
- Description: ${definition.description}
- Expected Unit: ${definition.unit ?? 'N/A'}
- Pillar: ${PILLAR_NAMES[definition.pillar]} (${definition.pillar})

DOCUMENT CONTEXT:

${formatContext(chunks)}

---

INSTRUCTIONS:
1. Locate the value of this indicator in the context above. Use only the context.
2. Report the value as written (value) and, when the indicator is numeric, as a plain number
   without thousands separators or units (numeric_value). Use null for qualitative answers.
3. Report the unit the document uses.
4. Assign a confidence score:
   - 1.0: value is stated explicitly
   - 0.8-0.9: value found, minor interpretation needed
   - 0.6-0.7: value found, moderate interpretation needed
   - 0.4-0.5: value inferred from related figures
   - 0.0-0.3: value not found or very uncertain
5. List EVERY page number you drew the value from (source_pages).
6. If the value is not in the context, return value "Not Found", numeric_value null,
   confidence 0.0 and an empty source_pages list.

OUTPUT FORMAT (JSON only, no prose):
{
  "indicator_code": "${definition.code}",
  "value": "<value as written in the report>",
  "numeric_value": <number or null>,
  "unit": "<unit>",
  "confidence": <0.0-1.0>,
  "source_pages": [<page numbers>]
}`;
}
