export type RelevanceDecision =
    | { accepted: true; score: number; matchedRequired: string[] }
    | { accepted: false; reason: 'too-short' | 'no-required-keyword' };

export interface RelevancePolicyOptions {
    requiredKeywords: string[];
    optionalKeywords: string[];
    minContentLength: number;
}

/**
 * Keyword gate for fetched pages.
 *
 * A page is accepted when its text contains at least one required keyword
 * (case-insensitive substring). Optional keywords only raise the score.
 */
export class RelevancePolicy {
    private readonly required: string[];
    private readonly optional: string[];
    private readonly minContentLength: number;

    constructor(options: RelevancePolicyOptions) {
        this.required = options.requiredKeywords.map(keyword => keyword.toLowerCase()).filter(Boolean);
        this.optional = options.optionalKeywords.map(keyword => keyword.toLowerCase()).filter(Boolean);
        this.minContentLength = options.minContentLength;
    }

    evaluate(text: string): RelevanceDecision {
        if (text.trim().length < this.minContentLength) {
            return { accepted: false, reason: 'too-short' };
        }

        const lower = text.toLowerCase();
        const matchedRequired = this.required.filter(keyword => lower.includes(keyword));
        if (matchedRequired.length === 0) {
            return { accepted: false, reason: 'no-required-keyword' };
        }

        const matchedOptional = this.optional.filter(keyword => lower.includes(keyword)).length;
        const score = this.optional.length > 0 ? matchedOptional / this.optional.length : 0;
        return { accepted: true, score, matchedRequired };
    }
}
