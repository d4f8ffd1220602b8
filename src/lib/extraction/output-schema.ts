// Structured model output for one indicator.
// Everything the model returns passes through this schema before it reaches the pipeline.

import { z } from 'zod';
import { ModelOutputError } from '../errors';

export const indicatorOutputSchema = z.object({
  indicator_code: z.string().describe('Indicator code being extracted'),
  value: z.string().trim().min(1).describe('Value as written in the report'),
  numeric_value: z.number().finite().nullable().default(null)
    .describe('Numeric value without separators or units, null for qualitative answers'),
  unit: z.string().default('').describe('Unit used by the report'),
  confidence: z.number().min(0).max(1).describe('Extraction confidence between 0.0 and 1.0'),
  source_pages: z.array(z.number().int().positive()).default([])
    .describe('Every page the value was drawn from'),
});

export type IndicatorOutput = z.infer<typeof indicatorOutputSchema>;

function extractJsonObject(response: string): string | null {
  const fenced = response.match(/```(?:json)?\s*([\s\S]*?)```/);
  const body = fenced ? fenced[1] : response;
  const jsonMatch = body.match(/\{[\s\S]*\}/);
  return jsonMatch ? jsonMatch[0] : null;
}

export function parseIndicatorOutput(response: string): IndicatorOutput {
  const json = extractJsonObject(response);
  if (!json) {
    throw new ModelOutputError('Model response contained no JSON object', response);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new ModelOutputError('Model response was not valid JSON', response, err);
  }

  const parsed = indicatorOutputSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(i => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new ModelOutputError(`Model output failed schema validation: ${issues}`, response);
  }

  // Pages are kept in first-seen order without repeats
  return { ...parsed.data, source_pages: [...new Set(parsed.data.source_pages)] };
}
