/**
 * Chain Reader
 *
 * Rebuilds the chain from the ledger's head by following prev_hash links
 * back to genesis. Nothing is cached between calls; each reconstruction is
 * its own snapshot assembled from several uncoordinated reads.
 */

import type { Block } from '../schemas/ledger.js';
import { isGenesis } from '../mining/block.js';
import { Logger } from '../agent/logger.js';
import type { LedgerClient } from './ledger.js';
import { describeError } from '../util.js';

export interface ChainSnapshot {
  headHash: string;
  /** Oldest first */
  blocks: Block[];
  /** True when traversal stopped before reaching genesis */
  truncated: boolean;
}

export class ChainReader {
  private ledger: LedgerClient;
  private logger: Logger;

  constructor(ledger: LedgerClient, logger: Logger = new Logger()) {
    this.ledger = ledger;
    this.logger = logger.child('chain');
  }

  /**
   * Fetch the head, then walk backwards. A failed or empty fetch ends the
   * walk and the blocks gathered so far are returned. Only a failed head
   * fetch rejects.
   */
  async reconstruct(): Promise<ChainSnapshot> {
    const head = await this.ledger.getHead();
    const chain: Block[] = [head.block];
    const seen = new Set<string>([head.hash]);
    let truncated = false;

    let current = head.block;
    while (!isGenesis(current)) {
      const prevHash = current.prev_hash ?? '';
      if (seen.has(prevHash)) {
        this.logger.warn(`prev_hash cycle at ${prevHash.slice(0, 16)}..., stopping traversal`);
        truncated = true;
        break;
      }
      seen.add(prevHash);

      let block: Block | null;
      try {
        block = await this.ledger.getBlock(prevHash);
      } catch (err) {
        this.logger.debug(`fetch of ${prevHash.slice(0, 16)}... failed, truncating: ${describeError(err)}`);
        truncated = true;
        break;
      }
      if (!block) {
        this.logger.debug(`block ${prevHash.slice(0, 16)}... unknown, truncating`);
        truncated = true;
        break;
      }

      chain.push(block);
      current = block;
    }

    chain.reverse();
    this.logger.debug(`reconstructed ${chain.length} blocks${truncated ? ' (truncated)' : ''}`);
    return { headHash: head.hash, blocks: chain, truncated };
  }

  async reconstructChain(): Promise<Block[]> {
    return (await this.reconstruct()).blocks;
  }
}

/** Number of blocks marked with the identity */
export function countMarked(blocks: Block[], identity: string): number {
  return blocks.filter(b => b.nice === identity).length;
}

