import categoryKeywords from './categoryKeywords.json';

export interface CategoryKeywordSet {
  name: string;
  keywords: string[];
}

export interface ClassificationConfig {
  /** Category sets in declaration order; the order breaks score ties */
  categories: CategoryKeywordSet[];
  generalKeywords: string[];
  minCategoryMatches: number;
  minGeneralMatches: number;
}

export interface ExtractionConfig {
  classification: ClassificationConfig;
  summaryMaxLength: number;
  maxKeyPoints: number;
  /** Documents with less text are skipped without classification */
  minTextLength: number;
}

export const defaultExtractionConfig: ExtractionConfig = {
  classification: {
    categories: categoryKeywords.categories,
    generalKeywords: categoryKeywords.general,
    minCategoryMatches: 2,
    minGeneralMatches: 2,
  },
  summaryMaxLength: 300,
  maxKeyPoints: 5,
  minTextLength: 100,
};

