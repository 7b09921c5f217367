import { createHash } from 'crypto';
import type { Block } from '../schemas/ledger.js';

/**
 * Canonical JSON encoding.
 *
 * Keys are sorted at every depth, separators are compact, and every
 * character from DEL upwards is written as a \uXXXX escape. The ledger
 * service hashes blocks in exactly this form, so any byte of difference
 * here means a different digest on the other side.
 */
export function canonicalize(value: unknown): string {
    return encode(value, new Set<object>());
}

function encode(value: unknown, seen: Set<object>): string {
    if (value === null) return 'null';
    if (typeof value === 'boolean') return value ? 'true' : 'false';
    if (typeof value === 'string') return encodeString(value);
    if (typeof value === 'number') {
        if (!Number.isFinite(value)) {
            throw new TypeError(`cannot canonicalize non-finite number ${value}`);
        }
        return JSON.stringify(value);
    }
    if (typeof value !== 'object') {
        throw new TypeError(`cannot canonicalize value of type ${typeof value}`);
    }

    if (seen.has(value)) {
        throw new TypeError('cannot canonicalize circular structure');
    }
    seen.add(value);

    let out: string;
    if (Array.isArray(value)) {
        const items: unknown[] = value;
        out = '[' + items.map(item => item === undefined ? 'null' : encode(item, seen)).join(',') + ']';
    } else {
        const entries = Object.entries(value)
            .filter(([, v]) => v !== undefined)
            .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
        out = '{' + entries.map(([k, v]) => `${encodeString(k)}:${encode(v, seen)}`).join(',') + '}';
    }

    seen.delete(value);
    return out;
}

function encodeString(s: string): string {
    return JSON.stringify(s).replace(
        /[\u007f-\uffff]/g,
        ch => '\\u' + ch.charCodeAt(0).toString(16).padStart(4, '0')
    );
}

/**
 * Serializes a block for hashing
 */
export function serializeBlock(block: Block): string {
    return canonicalize(block);
}

export function sha256Hex(data: string): string {
    return createHash('sha256').update(data, 'utf8').digest('hex');
}

/**
 * Digest of a block: SHA256 of its canonical serialization, lowercase hex.
 */
export function calculateBlockHash(block: Block): string {
    return sha256Hex(serializeBlock(block));
}

/**
 * Hex prefix a digest needs at the given difficulty
 * @param bits Leading zero bits, a multiple of 4
 */
export function difficultyPrefix(bits: number): string {
    if (!Number.isInteger(bits) || bits < 0 || bits % 4 !== 0) {
        throw new RangeError(`difficulty must be a non-negative multiple of 4, got ${bits}`);
    }
    return '0'.repeat(bits / 4);
}

/**
 * Checks if the hash meets the difficulty (leading hex zeros)
 * @param hash Hex string of the hash
 * @param bits Number of leading zero bits required
 */
export function checkDifficulty(hash: string, bits: number): boolean {
    return hash.startsWith(difficultyPrefix(bits));
}
