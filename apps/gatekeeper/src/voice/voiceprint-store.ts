/**
 * Encrypted-at-rest storage of the enrolled owner embedding.
 *
 * Artifacts are AES-256-GCM encrypted under a key stretched from the
 * operator secret with scrypt. Only a fingerprint of the secret is
 * persisted (an HMAC under its own scrypt stretch), which lets `load` tell "wrong key" (re-enroll) apart from
 * "damaged file". There is no fallback to an older key: after a rotation,
 * every artifact enrolled under the previous secret fails with KeyMismatch.
 */

import { createCipheriv, createDecipheriv, createHmac, randomBytes, scryptSync } from 'node:crypto';
import { access, mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { EmbeddingVector, EnrolledVoiceprint, Voiceprint } from '@voicegate/shared';
import {
    KeyMismatchError,
    MissingKeyError,
    NotEnrolledError,
    VoiceprintCorruptError,
} from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';

const FINGERPRINT_LABEL = 'voicegate:voiceprint-fingerprint:v1';
const FINGERPRINT_SALT = 'voicegate:voiceprint-fingerprint-salt:v1';
const CIPHER = 'aes-256-gcm';

const VoiceprintSchema = z.object({
    version: z.literal(1),
    ownerId: z.string().min(1),
    ciphertext: z.string().min(1),
    salt: z.string().min(1),
    iv: z.string().min(1),
    authTag: z.string().min(1),
    keyFingerprint: z.string().min(1),
    createdAt: z.string().min(1),
});

const EmbeddingSchema = z.array(z.number().finite()).min(1);

export type VoiceKey = string | undefined | null;

function requireKey(key: VoiceKey, operation: string): string {
    if (typeof key !== 'string' || key.length === 0) {
        throw new MissingKeyError(operation);
    }
    return key;
}

/** Guessing the secret from a fingerprint costs one scrypt per candidate. */
export function fingerprintKey(key: string): string {
    const stretched = scryptSync(key, FINGERPRINT_SALT, 32);
    return createHmac('sha256', stretched).update(FINGERPRINT_LABEL).digest('hex').slice(0, 32);
}

function deriveKey(key: string, salt: Buffer): Buffer {
    return scryptSync(key, salt, 32);
}

function additionalData(ownerId: string, keyFingerprint: string): Buffer {
    return Buffer.from(`${ownerId}\u0000${keyFingerprint}`, 'utf8');
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class VoiceprintStore {
    constructor(private readonly logger?: Logger) {}

    enroll(
        ownerId: string,
        embedding: EmbeddingVector,
        key: VoiceKey,
        createdAt: Date = new Date()
    ): Voiceprint {
        const secret = requireKey(key, 'enroll a voiceprint');
        const parsed = EmbeddingSchema.safeParse(embedding);
        if (!parsed.success) {
            throw new RangeError('Cannot enroll an empty or non-finite embedding');
        }

        const keyFingerprint = fingerprintKey(secret);
        const salt = randomBytes(16);
        const iv = randomBytes(12);
        const cipher = createCipheriv(CIPHER, deriveKey(secret, salt), iv);
        cipher.setAAD(additionalData(ownerId, keyFingerprint));
        const ciphertext = Buffer.concat([
            cipher.update(JSON.stringify(parsed.data), 'utf8'),
            cipher.final(),
        ]);

        return {
            version: 1,
            ownerId,
            ciphertext: ciphertext.toString('base64'),
            salt: salt.toString('base64'),
            iv: iv.toString('base64'),
            authTag: cipher.getAuthTag().toString('base64'),
            keyFingerprint,
            createdAt: createdAt.toISOString(),
        };
    }

    /**
     * Decrypt an artifact. `source` only labels errors.
     */
    decrypt(voiceprint: Voiceprint, key: VoiceKey, source = '<memory>'): EnrolledVoiceprint {
        const secret = requireKey(key, 'load a voiceprint');
        if (voiceprint.keyFingerprint !== fingerprintKey(secret)) {
            throw new KeyMismatchError(source);
        }

        let plaintext: string;
        try {
            const decipher = createDecipheriv(
                CIPHER,
                deriveKey(secret, Buffer.from(voiceprint.salt, 'base64')),
                Buffer.from(voiceprint.iv, 'base64')
            );
            decipher.setAAD(additionalData(voiceprint.ownerId, voiceprint.keyFingerprint));
            decipher.setAuthTag(Buffer.from(voiceprint.authTag, 'base64'));
            plaintext = Buffer.concat([
                decipher.update(Buffer.from(voiceprint.ciphertext, 'base64')),
                decipher.final(),
            ]).toString('utf8');
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new VoiceprintCorruptError(source, `authentication failed (${reason})`);
        }

        let decoded: unknown;
        try {
            decoded = JSON.parse(plaintext);
        } catch {
            throw new VoiceprintCorruptError(source, 'embedding payload is not JSON');
        }
        const embedding = EmbeddingSchema.safeParse(decoded);
        if (!embedding.success) {
            throw new VoiceprintCorruptError(source, 'embedding payload is not a numeric vector');
        }

        return {
            ownerId: voiceprint.ownerId,
            embedding: embedding.data,
            keyFingerprint: voiceprint.keyFingerprint,
        };
    }

    async save(filePath: string, voiceprint: Voiceprint): Promise<void> {
        await mkdir(path.dirname(filePath), { recursive: true });
        await writeFile(filePath, `${JSON.stringify(voiceprint, null, 2)}\n`, { mode: 0o600 });
        this.logger?.info(
            { path: filePath, ownerId: voiceprint.ownerId, keyFingerprint: voiceprint.keyFingerprint },
            'Voiceprint saved'
        );
    }

    async enrollToFile(
        filePath: string,
        ownerId: string,
        embedding: EmbeddingVector,
        key: VoiceKey
    ): Promise<Voiceprint> {
        const voiceprint = this.enroll(ownerId, embedding, key);
        await this.save(filePath, voiceprint);
        return voiceprint;
    }

    async read(filePath: string): Promise<Voiceprint> {
        let raw: string;
        try {
            raw = await readFile(filePath, 'utf8');
        } catch (error) {
            if (isMissingFile(error)) throw new NotEnrolledError(filePath);
            throw error;
        }

        let json: unknown;
        try {
            json = JSON.parse(raw);
        } catch {
            throw new VoiceprintCorruptError(filePath, 'artifact is not JSON');
        }
        const parsed = VoiceprintSchema.safeParse(json);
        if (!parsed.success) {
            throw new VoiceprintCorruptError(
                filePath,
                parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
            );
        }
        return parsed.data;
    }

    async load(filePath: string, key: VoiceKey): Promise<EnrolledVoiceprint> {
        requireKey(key, 'load a voiceprint');
        const voiceprint = await this.read(filePath);
        return this.decrypt(voiceprint, key, filePath);
    }

    async exists(filePath: string): Promise<boolean> {
        try {
            await access(filePath);
            return true;
        } catch (error) {
            if (isMissingFile(error)) return false;
            throw error;
        }
    }
}
