/**
 * Pipeline Contract Types
 *
 * Shapes shared by the crawl frontier, the versioned content store, the
 * extraction engine and the retrieval engine.
 */

export type FetchStrategyName = 'lightweight' | 'rendering';

/**
 * Attachment link discovered on a page (PDF forms, guides)
 */
export interface Attachment {
  type: string; // file extension without the dot, e.g. 'pdf'
  url: string;
  title: string;
}

/**
 * Document as produced by the frontier, before the store assigns a version
 */
export interface DocumentInput {
  url: string; // normalized
  topic: string;
  title: string;
  text: string;
  raw: string;
  links: string[];
  breadcrumbs: string[];
  attachments: Attachment[];
  depth: number;
  fetchedAt: Date;
  contentHash: string;
  fetchStrategy: FetchStrategyName;
  relevanceScore: number; // optional-keyword boost, never a gate
}

/**
 * One stored version of a fetched page
 */
export interface StoredDocument extends DocumentInput {
  version: number;
  isLatest: boolean;
}

export type RecordKind = 'categorized' | 'general';

export type EducationLevel = 'phd' | 'masters' | 'bachelors' | 'diploma' | 'secondary';

/**
 * Typed requirement fields of a categorized entity
 */
export interface RecordFields {
  ageMin?: number;
  ageMax?: number;
  education?: EducationLevel;
  experienceYears?: number;
  fee?: string;
  processingTime?: string;
  language?: string;
  summary?: string; // general records
  keyPoints?: string[]; // general records
}

export type RecordFieldName = keyof RecordFields;

/**
 * Record as produced by the extraction engine, before versioning
 */
export interface RecordInput {
  key: string; // normalized entity name + topic, stable across versions
  kind: RecordKind;
  name: string;
  topic: string;
  category: string;
  fields: RecordFields;
  sourceUrls: string[];
}

/**
 * One stored version of a structured record
 */
export interface StoredRecord extends RecordInput {
  version: number;
  isLatest: boolean;
  createdAt: Date;
}

/**
 * Counts reported by one crawl invocation for one topic
 */
export interface CrawlSummary {
  topic: string;
  fetched: number;
  accepted: number;
  rejected: number;
  errored: number;
  cancelled: boolean;
}

/**
 * Counts reported by one extraction pass over a topic
 */
export interface ExtractionSummary {
  topic: string;
  processed: number;
  extracted: number;
  skipped: number;
  errored: number;
  recordsWritten: number;
}

export type ProvenanceType = 'categorized-record' | 'general-record' | 'document-excerpt';

export type RankingStageName = 'keyword' | 'semantic' | 'rerank';

export interface ContextItem {
  provenance: ProvenanceType;
  title: string;
  topic: string;
  category?: string;
  score: number;
  sourceUrls: string[];
  record?: StoredRecord;
  excerpt?: string;
}

export interface Citation {
  sourceUrl: string;
  provenanceType: ProvenanceType;
}

/**
 * Ordered, citation-tagged payload handed to the answer generator
 */
export interface ContextBundle {
  query: string;
  items: ContextItem[];
  text: string;
  citations: Citation[];
  stagesApplied: RankingStageName[];
}

export interface StoreStats {
  documents: number;
  latestDocuments: number;
  records: number;
  latestRecords: number;
  topics: string[];
}
