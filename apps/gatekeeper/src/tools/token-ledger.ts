import { randomUUID } from 'node:crypto';
import type { VerificationToken } from '@voicegate/shared';

export type TokenCheck =
    | { valid: true; token: VerificationToken }
    | { valid: false; reason: 'missing' | 'unknown' | 'expired' | 'owner_mismatch' };

/**
 * Issues short-lived verification tokens and consumes each at most once.
 * A token is only honoured if this ledger issued it and has not seen it
 * consumed; a copied or forged token object is rejected as unknown.
 */
export class TokenLedger {
    private live = new Map<string, VerificationToken>();

    constructor(
        private readonly ttlMs: number,
        private readonly now: () => number = Date.now
    ) {
        if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
            throw new RangeError('Token TTL must be a positive number of milliseconds');
        }
    }

    issue(ownerId: string): VerificationToken {
        this.sweep();
        const token: VerificationToken = Object.freeze({
            id: randomUUID(),
            ownerId,
            issuedAt: this.now(),
            ttlMs: this.ttlMs,
        });
        this.live.set(token.id, token);
        return token;
    }

    /**
     * Invalidates the token whatever the outcome, then reports whether it was
     * usable by `expectedOwnerId`.
     */
    consume(token: VerificationToken | null | undefined, expectedOwnerId: string): TokenCheck {
        if (!token) return { valid: false, reason: 'missing' };

        const issued = this.live.get(token.id);
        this.live.delete(token.id);

        if (!issued || issued.ownerId !== token.ownerId || issued.issuedAt !== token.issuedAt) {
            return { valid: false, reason: 'unknown' };
        }
        if (this.now() - issued.issuedAt >= issued.ttlMs) {
            return { valid: false, reason: 'expired' };
        }
        if (issued.ownerId !== expectedOwnerId) {
            return { valid: false, reason: 'owner_mismatch' };
        }
        return { valid: true, token: issued };
    }

    revokeAll(): void {
        this.live.clear();
    }

    get outstanding(): number {
        return this.live.size;
    }

    private sweep(): void {
        const now = this.now();
        for (const [id, token] of this.live) {
            if (now - token.issuedAt >= token.ttlMs) {
                this.live.delete(id);
            }
        }
    }
}
