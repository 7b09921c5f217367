/**
 * Confirmation Auditor
 *
 * Finds the block that mined a transaction (by its nonce) and how many
 * blocks have been built on top of it.
 */

import type { Block } from '../schemas/ledger.js';
import { Logger } from '../agent/logger.js';
import { ChainReader } from './chain.js';
import type { LedgerClient } from './ledger.js';

/**
 * `headIndex` is the larger of the head fetched first and the newest block
 * reached by the chain walk that follows it, so it may come from the later
 * read when the ledger advances in between.
 */
export type DepthReport =
  | { status: 'found'; nonce: string; blockIndex: number; headIndex: number; confirmations: number }
  | { status: 'not_found'; nonce: string; headIndex: number }
  /** Not in the blocks that could be fetched, but traversal stopped short of genesis */
  | { status: 'indeterminate'; nonce: string; headIndex: number; oldestIndex: number };

/**
 * Index of the first block (oldest first) holding a transaction with the
 * nonce, or null.
 */
export function findTransaction(blocks: Block[], nonce: string): number | null {
  for (const block of blocks) {
    if (block.txs.some(tx => tx.nonce === nonce)) {
      return block.index;
    }
  }
  return null;
}

export class ConfirmationAuditor {
  private ledger: LedgerClient;
  private chain: ChainReader;
  private logger: Logger;

  constructor(ledger: LedgerClient, logger: Logger = new Logger(), chain?: ChainReader) {
    this.ledger = ledger;
    this.logger = logger.child('audit');
    this.chain = chain ?? new ChainReader(ledger, logger);
  }

  async checkDepth(nonce: string): Promise<DepthReport> {
    const head = await this.ledger.getHead();
    const snapshot = await this.chain.reconstruct();

    // The head may have advanced between the two reads
    const newest = snapshot.blocks.length > 0 ? snapshot.blocks[snapshot.blocks.length - 1].index : head.block.index;
    const headIndex = Math.max(head.block.index, newest);

    const blockIndex = findTransaction(snapshot.blocks, nonce);
    if (blockIndex !== null) {
      const confirmations = headIndex - blockIndex;
      this.logger.debug(`nonce ${nonce} in block ${blockIndex}, head ${headIndex}`);
      return { status: 'found', nonce, blockIndex, headIndex, confirmations };
    }

    if (snapshot.truncated) {
      const oldestIndex = snapshot.blocks.length > 0 ? snapshot.blocks[0].index : headIndex;
      this.logger.warn(`nonce ${nonce} not in blocks ${oldestIndex}..${headIndex}; older blocks could not be fetched`);
      return { status: 'indeterminate', nonce, headIndex, oldestIndex };
    }

    return { status: 'not_found', nonce, headIndex };
  }
}
