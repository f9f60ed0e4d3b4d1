/**
 * Extraction Engine
 *
 * Turns the latest documents of a topic into versioned records: classify,
 * extract fields (rules, optionally preceded by the LLM), merge per entity key.
 */

import type {
    DocumentInput,
    ExtractionSummary,
    RecordFields,
    RecordKind,
    RecordInput,
} from '../../contracts/types.js';
import { defaultExtractionConfig, type ExtractionConfig } from '../../config/extraction/extractionConfig.js';
import { createChildLogger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errorHandling.js';
import { StoreConflictError } from '../../types/errors.js';
import type { ContentStore } from '../content/ContentStore.js';
import type { AssistedExtractor } from './AssistedExtractor.js';
import { DocumentClassifier } from './DocumentClassifier.js';
import { buildEntityKey, entityName } from './entityKey.js';
import { extractFields } from './FieldExtractor.js';
import { buildSummary, extractKeyPoints } from './generalContent.js';
import { mergeRecord } from './recordMerge.js';

const logger = createChildLogger({ component: 'ExtractionEngine' });

export const GENERAL_CATEGORY = 'general';

export interface ExtractedEntity {
    key: string;
    kind: RecordKind;
    name: string;
    topic: string;
    category: string;
    fields: RecordFields;
    sourceUrl: string;
}

export type FieldAssistant = Pick<AssistedExtractor, 'isAvailable' | 'extract'>;

export interface ExtractionEngineDeps {
    store: ContentStore;
    assisted?: FieldAssistant | null;
    config?: ExtractionConfig;
}

type ExtractableDocument = Pick<DocumentInput, 'url' | 'topic' | 'title' | 'text' | 'raw'>;

export class ExtractionEngine {
    private readonly store: ContentStore;
    private readonly config: ExtractionConfig;
    private readonly classifier: DocumentClassifier;
    private readonly assisted: FieldAssistant | null;
    private assistedAvailable: Promise<boolean> | null = null;

    constructor(deps: ExtractionEngineDeps) {
        this.store = deps.store;
        this.config = deps.config ?? defaultExtractionConfig;
        this.classifier = new DocumentClassifier(this.config.classification);
        this.assisted = deps.assisted ?? null;
    }

    private useAssisted(): Promise<boolean> {
        if (!this.assisted) {
            return Promise.resolve(false);
        }
        if (!this.assistedAvailable) {
            this.assistedAvailable = this.assisted.isAvailable().catch(() => false);
        }
        return this.assistedAvailable;
    }

    /**
     * Classify one document and extract its entity, or null for low-confidence pages
     */
    async classifyAndExtract(document: ExtractableDocument): Promise<ExtractedEntity | null> {
        if (document.text.trim().length < this.config.minTextLength) {
            logger.debug({ url: document.url }, 'Document too short to extract');
            return null;
        }

        const classification = this.classifier.classify(document.title, document.text);
        if (classification.kind === 'none') {
            logger.debug({ url: document.url, scores: classification.scores }, 'Low-confidence classification, skipping');
            return null;
        }

        const name = entityName(document.title);
        const key = buildEntityKey(name, document.topic);

        if (classification.kind === 'general') {
            const summary = buildSummary(document.text, this.config.summaryMaxLength);
            const keyPoints = extractKeyPoints(document.raw, document.text, this.config.maxKeyPoints, summary);
            return {
                key,
                kind: 'general',
                name,
                topic: document.topic,
                category: GENERAL_CATEGORY,
                fields: keyPoints.length > 0 ? { summary, keyPoints } : { summary },
                sourceUrl: document.url,
            };
        }

        const ruleFields = extractFields(document.text);
        let fields = ruleFields;
        if (this.assisted && (await this.useAssisted())) {
            const assistedFields = await this.assisted.extract(
                document.title,
                document.text,
                document.topic,
                classification.category
            );
            if (assistedFields) {
                fields = { ...ruleFields, ...assistedFields };
            }
        }

        return {
            key,
            kind: 'categorized',
            name,
            topic: document.topic,
            category: classification.category,
            fields,
            sourceUrl: document.url,
        };
    }

    /**
     * Fold one extracted entity into its record; writes a version only on change
     *
     * @returns true when a new record version was written
     */
    async mergeEntity(entity: ExtractedEntity): Promise<boolean> {
        const current = await this.store.getCurrentRecord(entity.key);
        const incoming: RecordInput = {
            key: entity.key,
            kind: entity.kind,
            name: entity.name,
            topic: entity.topic,
            category: entity.category,
            fields: entity.fields,
            sourceUrls: [entity.sourceUrl],
        };

        const { record, changed } = mergeRecord(current, incoming);
        if (!changed) {
            return false;
        }
        await this.store.putRecord(record, { expectedVersion: current ? current.version : 0 });
        return true;
    }

    /**
     * Extract every latest document of a topic, oldest fetch first
     */
    async extractTopic(topic: string): Promise<ExtractionSummary> {
        const documents = await this.store.getLatestDocuments(topic);
        documents.sort((a, b) => a.fetchedAt.getTime() - b.fetchedAt.getTime() || a.url.localeCompare(b.url));

        const summary: ExtractionSummary = { topic, processed: 0, extracted: 0, skipped: 0, errored: 0, recordsWritten: 0 };

        for (const document of documents) {
            summary.processed++;
            try {
                const entity = await this.classifyAndExtract(document);
                if (!entity) {
                    summary.skipped++;
                    continue;
                }
                summary.extracted++;
                if (await this.mergeEntity(entity)) {
                    summary.recordsWritten++;
                }
            } catch (error) {
                // A lost version flip would drop the merged record; the caller decides
                if (error instanceof StoreConflictError) {
                    logger.error({ url: document.url, topic, error: error.message }, 'Record version conflict');
                    throw error;
                }
                summary.errored++;
                logger.warn({ url: document.url, topic, error: errorMessage(error) }, 'Extraction failed for document');
            }
        }

        logger.info(summary, 'Extraction finished');
        return summary;
    }
}
