/**
 * LLM-assisted field extraction for categorized documents.
 *
 * The model's JSON answer is validated with zod and then passes the same
 * range checks as rule-based extraction. Any failure yields null so the
 * caller falls back to the rules.
 */

import { z } from 'zod';
import type { RecordFields } from '../../contracts/types.js';
import type { LLMProvider } from '../llm/LLMProvider.js';
import { extractJsonPayload } from '../llm/LLMProvider.js';
import { createChildLogger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errorHandling.js';
import { DEFAULT_TIMEOUTS, withTimeout } from '../../utils/withTimeout.js';
import { sanitizeFields } from './FieldExtractor.js';

const logger = createChildLogger({ component: 'AssistedExtractor' });

const MAX_PROMPT_TEXT = 8000;

const nullableNumber = z.number().nullable().optional();
const nullableString = z.string().nullable().optional();

export const assistedFieldsSchema = z.object({
    isProgramme: z.boolean(),
    ageMin: nullableNumber,
    ageMax: nullableNumber,
    education: z.enum(['phd', 'masters', 'bachelors', 'diploma', 'secondary']).nullable().optional(),
    experienceYears: nullableNumber,
    fee: nullableString,
    processingTime: nullableString,
    language: nullableString,
});

export type AssistedFields = z.infer<typeof assistedFieldsSchema>;

function buildPrompt(title: string, text: string, topic: string, category: string): string {
    return `Extract the requirements of the immigration programme described on this page.

Topic: ${topic}
Detected category: ${category}
Title: ${title}

Content:
${text.slice(0, MAX_PROMPT_TEXT)}

Answer with JSON only, using null for anything the page does not state:
{
  "isProgramme": true,
  "ageMin": null,
  "ageMax": null,
  "education": "phd|masters|bachelors|diploma|secondary or null",
  "experienceYears": null,
  "fee": "application fee with currency symbol, e.g. \\"$100\\", or null",
  "processingTime": "e.g. \\"4-6 weeks\\" or null",
  "language": "e.g. \\"IELTS 6.5\\" or null"
}

Set "isProgramme" to false if the page does not describe a specific programme. Do not guess.`;
}

function withoutNulls(fields: AssistedFields): Partial<Record<keyof RecordFields, unknown>> {
    return {
        ageMin: fields.ageMin ?? undefined,
        ageMax: fields.ageMax ?? undefined,
        education: fields.education ?? undefined,
        experienceYears: fields.experienceYears ?? undefined,
        fee: fields.fee ?? undefined,
        processingTime: fields.processingTime ?? undefined,
        language: fields.language ?? undefined,
    };
}

export class AssistedExtractor {
    constructor(
        private readonly provider: LLMProvider,
        private readonly timeoutMs: number = DEFAULT_TIMEOUTS.EXTRACTION
    ) {}

    async isAvailable(): Promise<boolean> {
        return this.provider.isAvailable();
    }

    /**
     * @returns validated fields, or null when the model call or its output is unusable
     */
    async extract(title: string, text: string, topic: string, category: string): Promise<RecordFields | null> {
        try {
            const response = await withTimeout(
                this.provider.generate([{ role: 'user', content: buildPrompt(title, text, topic, category) }], {
                    temperature: 0,
                    maxTokens: 500,
                    json: true,
                }),
                this.timeoutMs,
                'Assisted extraction'
            );

            const parsed = assistedFieldsSchema.safeParse(JSON.parse(extractJsonPayload(response.content)));
            if (!parsed.success) {
                logger.warn({ title, issues: parsed.error.issues.length }, 'Assisted extraction returned an invalid shape');
                return null;
            }
            if (!parsed.data.isProgramme) {
                logger.debug({ title }, 'Model reports no programme on page');
                return null;
            }
            return sanitizeFields(withoutNulls(parsed.data));
        } catch (error) {
            logger.warn({ title, error: errorMessage(error) }, 'Assisted extraction failed, using rule-based fields');
            return null;
        }
    }
}
