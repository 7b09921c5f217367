import type { Block, HeadSnapshot, PoolSnapshot, Transaction } from '../schemas/ledger.js';

/**
 * A block carrying a marker. The transaction list is typed empty so that a
 * marked block holding transactions cannot be built at all.
 */
export type MarkedBlock = Block & {
    txs: [];
    nice: string;
};

/**
 * True when the transaction moves value to or from the identity
 */
export function touchesIdentity(tx: Transaction, identity: string): boolean {
    return tx.src === identity || tx.dst === identity;
}

/**
 * A pool snapshot is safe to mark from only if no pending transaction
 * touches the identity.
 */
export function isPoolSafe(pool: PoolSnapshot, identity: string): boolean {
    return !pool.txs.some(tx => touchesIdentity(tx, identity));
}

/**
 * Creates an empty marked block template on top of the given parent
 */
export function createMarkedTemplate(parent: HeadSnapshot, identity: string): MarkedBlock {
    return {
        index: parent.block.index + 1,
        prev_hash: parent.hash,
        nonce: 0,
        txs: [],
        nice: identity
    };
}

/**
 * Genesis blocks have no parent digest
 */
export function isGenesis(block: Block): boolean {
    return block.prev_hash === undefined || block.prev_hash === null || block.prev_hash === '';
}
