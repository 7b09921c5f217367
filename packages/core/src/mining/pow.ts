import type { Block } from '../schemas/ledger.js';
import { calculateBlockHash, difficultyPrefix } from './hash.js';

export const DEFAULT_RECHECK_INTERVAL = 512;

export interface PoWSearchOptions {
    /** Leading zero bits required (multiple of 4) */
    difficulty: number;
    /** Returns the ledger's current head digest */
    isStale: () => Promise<string>;
    /** Nonces between staleness checks (default: 512) */
    interval?: number;
    signal?: AbortSignal;
}

export type PoWSearchResult =
    | { found: true; block: Block; hash: string; attempts: number }
    | { found: false; reason: 'stale' | 'aborted'; attempts: number; head?: string };

/**
 * Proof-of-work search over ascending nonces.
 *
 * Hashing runs synchronously between checks; every `interval` nonces the
 * search awaits the staleness check and gives up as soon as the head no
 * longer matches the template's prev_hash. A solution is only reported
 * after one more check confirms the head has not moved.
 */
export async function searchNonce(template: Block, options: PoWSearchOptions): Promise<PoWSearchResult> {
    const interval = options.interval ?? DEFAULT_RECHECK_INTERVAL;
    if (!Number.isInteger(interval) || interval < 1) {
        throw new RangeError(`recheck interval must be a positive integer, got ${interval}`);
    }
    const prefix = difficultyPrefix(options.difficulty);
    const baseHead = template.prev_hash;
    const header: Block = { ...template };

    for (let nonce = 0; ; nonce++) {
        if (nonce > 0 && nonce % interval === 0) {
            if (options.signal?.aborted) {
                return { found: false, reason: 'aborted', attempts: nonce };
            }
            const head = await options.isStale();
            if (head !== baseHead) {
                return { found: false, reason: 'stale', attempts: nonce, head };
            }
        }

        header.nonce = nonce;
        const hash = calculateBlockHash(header);

        if (hash.startsWith(prefix)) {
            const head = await options.isStale();
            if (head !== baseHead) {
                return { found: false, reason: 'stale', attempts: nonce + 1, head };
            }
            return {
                found: true,
                block: { ...header }, // Return copy
                hash,
                attempts: nonce + 1
            };
        }
    }
}
