import { z } from 'zod';
import { buildVcExtractionInput, buildVcExtractionPrompt } from '@vc-scout/ai-prompts';
import { NO_INFO, toList, type VcRecord } from '@vc-scout/shared';
import { ExtractionError, describeError } from '../middleware/error-handler.js';
import type { StructuredModel } from './ai.service.js';

const listField = z.union([z.string(), z.array(z.string())]);

const modelAnswerSchema = z.object({
  vc_name: z.string().trim().min(1, 'vc_name is empty'),
  contacts: listField,
  industries: listField,
  investment_rounds: listField,
});

export type ModelAnswer = z.infer<typeof modelAnswerSchema>;

function toRecordList(value: string | string[]): string[] {
  const list = toList(value);
  return list.length === 0 ? [NO_INFO] : list;
}

/**
 * Coerce a validated model answer into a VcRecord: scalars become
 * one-element lists, each field on its own.
 */
export function normalizeVcRecord(answer: ModelAnswer): VcRecord {
  return {
    vc_name: answer.vc_name,
    contacts: toRecordList(answer.contacts),
    industries: toRecordList(answer.industries),
    investment_rounds: toRecordList(answer.investment_rounds),
  };
}

/**
 * Extract JSON from AI response
 */
export function extractJson(text: string): unknown {
  const jsonMatch = text.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    throw new Error('No JSON found in response');
  }
  return JSON.parse(jsonMatch[0]);
}

export class VcExtractorService {
  constructor(private model: StructuredModel) {}

  async extract(pageText: string): Promise<VcRecord> {
    let text: string;
    try {
      text = await this.model.generateJson(buildVcExtractionPrompt(), buildVcExtractionInput(pageText));
    } catch (error) {
      console.error('[AI] Extraction call failed:', describeError(error));
      throw new ExtractionError({ reason: describeError(error) });
    }

    let parsed: unknown;
    try {
      parsed = extractJson(text);
    } catch (error) {
      console.error('[AI] Failed to parse extraction response:', text);
      throw new ExtractionError({ reason: describeError(error) });
    }

    const result = modelAnswerSchema.safeParse(parsed);
    if (!result.success) {
      console.error('[AI] Extraction response has the wrong shape:', text);
      throw new ExtractionError({ issues: result.error.flatten().fieldErrors });
    }

    return normalizeVcRecord(result.data);
  }
}
