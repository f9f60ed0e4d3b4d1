import { readFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { BadRequestError } from '../types/errors.js';
import { logger } from '../utils/logger.js';
import { scraperConfig } from './scraperConfig.js';

export const crawlPolicySchema = z.object({
    maxDepth: z.number().int().min(0).max(10).default(scraperConfig.maxDepth),
    maxDocsPerTopic: z.number().int().min(1).default(scraperConfig.maxDocsPerTopic),
    requiredKeywords: z.array(z.string().min(1)).min(1, 'At least one required keyword is needed'),
    optionalKeywords: z.array(z.string().min(1)).default([]),
    excludePatterns: z.array(z.string().min(1)).default([]),
    fetchStrategy: z.enum(['lightweight', 'rendering']).default('lightweight'),
});

export const seedEntrySchema = z.object({
    topic: z.string().trim().min(1, 'Topic is required'),
    seedUrls: z.array(z.string().url()).min(1, 'At least one seed URL is required'),
    crawlPolicy: crawlPolicySchema,
});

export const seedConfigSchema = z.array(seedEntrySchema).superRefine((entries, ctx) => {
    const seen = new Set<string>();
    entries.forEach((entry, index) => {
        const topic = entry.topic.toLowerCase();
        if (seen.has(topic)) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: `Duplicate topic '${entry.topic}'`,
                path: [index, 'topic'],
            });
        }
        seen.add(topic);
    });
});

export type CrawlPolicy = z.infer<typeof crawlPolicySchema>;
export type SeedEntry = z.infer<typeof seedEntrySchema>;
export type SeedConfig = z.infer<typeof seedConfigSchema>;

/**
 * Validate an already-parsed seed document
 *
 * @throws {BadRequestError} listing every invalid path
 */
export function parseSeedConfig(input: unknown): SeedConfig {
    const result = seedConfigSchema.safeParse(input);
    if (!result.success) {
        const details = result.error.issues.map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message,
        }));
        throw new BadRequestError('Invalid seed configuration', { details });
    }
    return result.data;
}

/**
 * Read and validate the seed file (relative paths resolve against the working directory)
 */
export async function loadSeedConfig(filePath: string): Promise<SeedConfig> {
    const resolved = path.resolve(process.cwd(), filePath);
    const content = await readFile(resolved, 'utf-8');

    let parsed: unknown;
    try {
        parsed = JSON.parse(content);
    } catch (error) {
        throw new BadRequestError(`Seed file is not valid JSON: ${resolved}`, {
            cause: error instanceof Error ? error.message : String(error),
        });
    }

    const config = parseSeedConfig(parsed);
    logger.info({ file: resolved, topics: config.map(entry => entry.topic) }, 'Loaded seed configuration');
    return config;
}
