/**
 * Keyword-density classification of fetched documents.
 *
 * Each category scores the number of distinct keywords found (whole-word,
 * case-insensitive) in title + text. The best category wins; ties go to the
 * category declared first.
 */

import { defaultExtractionConfig, type ClassificationConfig } from '../../config/extraction/extractionConfig.js';
import { containsPhrase } from '../../utils/textTerms.js';

export type ClassificationResult =
    | { kind: 'categorized'; category: string; matchedKeywords: string[]; scores: Record<string, number> }
    | { kind: 'general'; matchedKeywords: string[]; scores: Record<string, number> }
    | { kind: 'none'; scores: Record<string, number> };

export class DocumentClassifier {
    constructor(private readonly config: ClassificationConfig = defaultExtractionConfig.classification) {}

    classify(title: string, text: string): ClassificationResult {
        const combinedText = `${title}\n${text}`;
        const scores: Record<string, number> = {};

        let best: { category: string; matched: string[] } | null = null;
        for (const category of this.config.categories) {
            const matched = category.keywords.filter(keyword => containsPhrase(combinedText, keyword));
            scores[category.name] = matched.length;
            // Strictly greater keeps the earlier category on ties
            if (!best || matched.length > best.matched.length) {
                best = { category: category.name, matched };
            }
        }

        if (best && best.matched.length >= this.config.minCategoryMatches) {
            return { kind: 'categorized', category: best.category, matchedKeywords: best.matched, scores };
        }

        const generalMatched = this.config.generalKeywords.filter(keyword => containsPhrase(combinedText, keyword));
        scores.general = generalMatched.length;
        if (generalMatched.length >= this.config.minGeneralMatches) {
            return { kind: 'general', matchedKeywords: generalMatched, scores };
        }

        return { kind: 'none', scores };
    }
}
