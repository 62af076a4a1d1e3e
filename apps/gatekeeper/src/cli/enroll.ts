/**
 * Owner enrollment
 *
 * Reads a raw 16-bit little-endian mono PCM recording of the owner, extracts
 * an embedding and writes the encrypted voiceprint to the configured path.
 *
 *   voicegate-enroll --input owner.pcm [--sample-rate 16000] [--owner alice] [--out owner.voiceprint.json]
 */

import '../env.js';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { parseArgs } from 'node:util';
import type { Voiceprint } from '@voicegate/shared';
import { loadConfig } from '../config.js';
import { createLogger, type Logger } from '../lib/logger.js';
import { framesFromPcm } from '../voice/audio.js';
import { HashEmbeddingExtractor, type EmbeddingExtractor } from '../voice/embedding.js';
import { VoiceprintStore } from '../voice/voiceprint-store.js';

export interface EnrollOptions {
    input: string;
    output: string;
    ownerId: string;
    sampleRate: number;
    key: string | undefined;
}

export async function enrollFromPcm(
    options: EnrollOptions,
    logger: Logger,
    extractor: EmbeddingExtractor = new HashEmbeddingExtractor({ minDurationMs: 1000 })
): Promise<Voiceprint> {
    const pcm = await readFile(options.input);
    const frames = framesFromPcm(pcm, options.sampleRate);
    const embedding = await extractor.extract(frames, options.sampleRate);

    const store = new VoiceprintStore(logger);
    const voiceprint = await store.enrollToFile(options.output, options.ownerId, embedding, options.key);
    logger.info(
        { ownerId: options.ownerId, output: options.output, frames: frames.length, dimensions: embedding.length },
        'Owner enrolled'
    );
    return voiceprint;
}

async function main(argv: string[]): Promise<void> {
    const { values } = parseArgs({
        args: argv,
        options: {
            input: { type: 'string', short: 'i' },
            out: { type: 'string', short: 'o' },
            owner: { type: 'string' },
            'sample-rate': { type: 'string', default: '16000' },
        },
    });

    const config = loadConfig();
    const logger = createLogger({ level: config.logLevel, pretty: true });
    if (!values.input) {
        logger.error('Missing --input <file.pcm>');
        process.exitCode = 1;
        return;
    }

    const sampleRate = Number(values['sample-rate']);
    if (!Number.isInteger(sampleRate) || sampleRate <= 0) {
        logger.error({ sampleRate: values['sample-rate'] }, 'Invalid --sample-rate');
        process.exitCode = 1;
        return;
    }

    await enrollFromPcm(
        {
            input: values.input,
            output: values.out ?? config.voiceprintPath,
            ownerId: values.owner ?? config.ownerId,
            sampleRate,
            key: config.voiceKey,
        },
        logger
    );
}

const invokedDirectly = process.argv[1] !== undefined && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url);

if (invokedDirectly) {
    main(process.argv.slice(2)).catch((error: unknown) => {
        console.error(error instanceof Error ? error.message : error);
        process.exit(1);
    });
}
