/**
 * Run the configured seed topics through crawl and extraction once.
 *
 * Usage: npm run ingest -- [--topic canada] [--topic australia] [--seeds path/to/seeds.json]
 */

import { getEnv } from '../config/env.js';
import { loadSeedConfig } from '../config/seeds.js';
import { initializeServices } from '../config/serviceInitialization.js';

export interface IngestArgs {
    topics: string[];
    seedsFile?: string;
}

export function parseIngestArgs(args: string[]): IngestArgs {
    const parsed: IngestArgs = { topics: [] };
    for (let i = 0; i < args.length; i++) {
        const arg = args[i] ?? '';
        const [flag, inlineValue] = arg.split('=', 2);
        const value = inlineValue ?? args[i + 1];
        if (flag === '--topic' || flag === '--seeds') {
            if (value === undefined || value.startsWith('--')) {
                throw new Error(`Missing value for ${flag}`);
            }
            if (inlineValue === undefined) i++;
            if (flag === '--topic') parsed.topics.push(value);
            else parsed.seedsFile = value;
        } else {
            throw new Error(`Unknown argument: ${arg}`);
        }
    }
    return parsed;
}

async function ingest(): Promise<void> {
    const args = parseIngestArgs(process.argv.slice(2));
    const seedsFile = args.seedsFile ?? getEnv().SEEDS_FILE;

    console.log(`🔄 Loading seeds from ${seedsFile}...`);
    const seeds = await loadSeedConfig(seedsFile);

    const services = await initializeServices();
    try {
        const result = await services.orchestrator.run(seeds, { topics: args.topics });

        console.log('\n📊 Crawl:');
        for (const summary of result.crawl) {
            console.log(
                `   ${summary.topic.padEnd(15)} fetched=${summary.fetched} accepted=${summary.accepted} ` +
                `rejected=${summary.rejected} errored=${summary.errored}${summary.cancelled ? ' (cancelled)' : ''}`
            );
        }
        console.log('\n📋 Extraction:');
        for (const summary of result.extraction) {
            console.log(
                `   ${summary.topic.padEnd(15)} processed=${summary.processed} extracted=${summary.extracted} ` +
                `skipped=${summary.skipped} errored=${summary.errored} written=${summary.recordsWritten}`
            );
        }
        console.log('\n✅ Ingestion finished');
    } finally {
        await services.close();
    }
}

if (require.main === module) {
    ingest().catch((error: unknown) => {
        console.error('❌ Ingestion failed:', error instanceof Error ? error.message : error);
        process.exit(1);
    });
}
