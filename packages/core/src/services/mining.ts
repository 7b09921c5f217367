/**
 * Marker Mining Service
 *
 * Mines empty blocks carrying `nice = <identity>` until the chain holds the
 * requested number of them.
 *
 * Flow (one cycle):
 * 1. Snapshot the transaction pool -> refuse it if any pending tx touches the identity
 * 2. Fetch the parent the snapshot points at -> build an EMPTY marked template
 * 3. Search for a nonce, re-checking the head every `recheckInterval` nonces
 * 4. Submit -> on rejection back off and start over from a fresh snapshot
 * 5. On acceptance, rebuild the chain and recount marked blocks
 *
 * Events: 'pool_tainted', 'template', 'stale', 'rejected', 'accepted',
 * 'target_reached'.
 *
 * Nothing the remote ledger owns is ever locked. Correctness rests on
 * re-reading the head before anything is submitted.
 */

import { EventEmitter } from 'events';
import type { Block, PoolSnapshot } from '../schemas/ledger.js';
import { createMarkedTemplate, isPoolSafe } from '../mining/block.js';
import { searchNonce, DEFAULT_RECHECK_INTERVAL, type PoWSearchResult } from '../mining/pow.js';
import { difficultyPrefix } from '../mining/hash.js';
import { Logger } from '../agent/logger.js';
import { ChainReader, countMarked } from './chain.js';
import type { LedgerClient, SubmitResult } from './ledger.js';
import { delay, describeError } from '../util.js';

// Configuration
const TAINTED_DELAY_MS = 100;
const REJECT_BACKOFF_MS = 50;
const RETRY_DELAY_MS = 100;

export interface MiningOptions {
    /** Leading zero bits (multiple of 4) */
    difficulty: number;
    /** Nonces between head re-checks (default: 512) */
    recheckInterval?: number;
    /** Wait before re-snapshotting a pool that touches the identity */
    taintedDelayMs?: number;
    /** Wait after a rejected submission */
    rejectBackoffMs?: number;
    /** Wait after a transient network fault */
    retryDelayMs?: number;
}

export interface MiningReport {
    identity: string;
    target: number;
    count: number;
    reached: boolean;
    accepted: number;
    rejected: number;
    stale: number;
    tainted: number;
}

type CycleOutcome = 'accepted' | 'aborted';

export class MiningService extends EventEmitter {
    private ledger: LedgerClient;
    private chain: ChainReader;
    private logger: Logger;
    private difficulty: number;
    private recheckInterval: number;
    private taintedDelayMs: number;
    private rejectBackoffMs: number;
    private retryDelayMs: number;
    private controller: AbortController | null = null;
    private accepted = 0;
    private rejected = 0;
    private stale = 0;
    private tainted = 0;
    private lastCount = 0;

    constructor(ledger: LedgerClient, options: MiningOptions, logger: Logger = new Logger(), chain?: ChainReader) {
        super();
        // Throws early on a difficulty that is not a multiple of 4
        difficultyPrefix(options.difficulty);

        this.ledger = ledger;
        this.logger = logger.child('miner');
        this.chain = chain ?? new ChainReader(ledger, logger);
        this.difficulty = options.difficulty;
        this.recheckInterval = options.recheckInterval ?? DEFAULT_RECHECK_INTERVAL;
        this.taintedDelayMs = options.taintedDelayMs ?? TAINTED_DELAY_MS;
        this.rejectBackoffMs = options.rejectBackoffMs ?? REJECT_BACKOFF_MS;
        this.retryDelayMs = options.retryDelayMs ?? RETRY_DELAY_MS;
    }

    /**
     * Mine until `targetCount` blocks on the chain are marked with `identity`.
     * Resolves with reached=false only when cancelled via `signal` or stop().
     */
    async run(identity: string, targetCount: number, signal?: AbortSignal): Promise<MiningReport> {
        if (this.controller) {
            throw new Error('Mining is already running');
        }
        const controller = new AbortController();
        this.controller = controller;
        const forwardAbort = () => controller.abort(signal?.reason);
        if (signal?.aborted) {
            controller.abort(signal.reason);
        } else {
            signal?.addEventListener('abort', forwardAbort, { once: true });
        }

        try {
            return await this.mineUntil(identity, targetCount, controller.signal);
        } finally {
            signal?.removeEventListener('abort', forwardAbort);
            this.controller = null;
        }
    }

    /** Cancel a running `run()` at its next check boundary or delay */
    stop(): void {
        if (this.controller) {
            this.logger.info('Stopping miner...');
            this.controller.abort();
        }
    }

    isRunning(): boolean {
        return this.controller !== null;
    }

    /** Mining status for display */
    status(): Record<string, unknown> {
        return {
            is_mining: this.isRunning(),
            marked_count: this.lastCount,
            accepted: this.accepted,
            rejected: this.rejected,
            stale: this.stale,
            tainted: this.tainted,
            difficulty: this.difficulty,
            recheck_interval: this.recheckInterval,
        };
    }

    private async mineUntil(identity: string, targetCount: number, signal: AbortSignal): Promise<MiningReport> {
        let count = await this.countMarkedBlocks(identity, signal);
        if (count === null) {
            return this.report(identity, targetCount, this.lastCount);
        }
        this.logger.info(`current nice(${identity})=${count}; target=${targetCount}`);

        while (count < targetCount) {
            const outcome = await this.mineOne(identity, signal);
            if (outcome === 'aborted') break;

            const recount = await this.countMarkedBlocks(identity, signal);
            if (recount === null) break;
            count = recount;
            this.logger.success(`accepted empty block; nice(${identity}) count now ${count}`);
        }

        const report = this.report(identity, targetCount, count);
        if (report.reached) {
            this.logger.success(`target reached: nice(${identity})=${count}`);
            this.emit('target_reached', report);
        } else {
            this.logger.info(`stopped at nice(${identity})=${count} of ${targetCount}`);
        }
        return report;
    }

    /**
     * Repeat snapshot -> template -> search -> submit until one marked block
     * is accepted.
     */
    private async mineOne(identity: string, signal: AbortSignal): Promise<CycleOutcome> {
        while (!signal.aborted) {
            let pool: PoolSnapshot;
            try {
                pool = await this.ledger.getPool();
            } catch (err) {
                this.logger.warn(`pool snapshot failed: ${describeError(err)}`);
                if (!(await delay(this.retryDelayMs, signal))) break;
                continue;
            }

            if (!isPoolSafe(pool, identity)) {
                this.tainted++;
                this.emit('pool_tainted', pool);
                this.logger.debug(`pool at ${pool.hash.slice(0, 16)}... touches ${identity}, waiting for a clean snapshot`);
                if (!(await delay(this.taintedDelayMs, signal))) break;
                continue;
            }

            let parent: Block | null;
            try {
                parent = await this.ledger.getBlock(pool.hash);
            } catch (err) {
                this.logger.warn(`parent fetch failed: ${describeError(err)}`);
                if (!(await delay(this.retryDelayMs, signal))) break;
                continue;
            }
            if (!parent) {
                this.logger.warn(`parent ${pool.hash.slice(0, 16)}... unknown to the ledger`);
                if (!(await delay(this.retryDelayMs, signal))) break;
                continue;
            }

            const template = createMarkedTemplate({ hash: pool.hash, block: parent }, identity);
            this.emit('template', { template, pool });
            this.logger.debug(`mining index ${template.index} on ${pool.hash.slice(0, 16)}...`);

            let result: PoWSearchResult;
            try {
                result = await searchNonce(template, {
                    difficulty: this.difficulty,
                    interval: this.recheckInterval,
                    signal,
                    isStale: async () => (await this.ledger.getPool()).hash,
                });
            } catch (err) {
                this.logger.warn(`head re-check failed: ${describeError(err)}`);
                if (!(await delay(this.retryDelayMs, signal))) break;
                continue;
            }

            if (!result.found) {
                if (result.reason === 'aborted') break;
                this.stale++;
                this.emit('stale', { template, head: result.head, attempts: result.attempts });
                this.logger.debug(`head moved after ${result.attempts} nonces, restarting`);
                continue;
            }

            assertNoTransfer(result.block);
            const submitted: SubmitResult = await this.ledger.submitBlock(result.block);
            if (submitted.accepted) {
                this.accepted++;
                this.emit('accepted', { block: result.block, hash: result.hash });
                this.logger.debug(`block ${result.hash.slice(0, 16)}... accepted at index ${result.block.index}`);
                return 'accepted';
            }

            this.rejected++;
            this.emit('rejected', { block: result.block, result: submitted });
            this.logger.info(`rejected${submitted.status ? ` (${submitted.status})` : ''}; retrying...`);
            if (!(await delay(this.rejectBackoffMs, signal))) break;
        }
        return 'aborted';
    }

    /** Rebuild the chain and count; null once cancelled */
    private async countMarkedBlocks(identity: string, signal: AbortSignal): Promise<number | null> {
        while (!signal.aborted) {
            try {
                const snapshot = await this.chain.reconstruct();
                this.lastCount = countMarked(snapshot.blocks, identity);
                return this.lastCount;
            } catch (err) {
                this.logger.warn(`chain reconstruction failed: ${describeError(err)}`);
                if (!(await delay(this.retryDelayMs, signal))) break;
            }
        }
        return null;
    }

    private report(identity: string, target: number, count: number): MiningReport {
        return {
            identity,
            target,
            count,
            reached: count >= target,
            accepted: this.accepted,
            rejected: this.rejected,
            stale: this.stale,
            tainted: this.tainted,
        };
    }
}

/**
 * A marked block must never carry transactions
 */
export function assertNoTransfer(block: Block): void {
    if (typeof block.nice === 'string' && block.txs.length > 0) {
        throw new Error(`refusing to submit marked block ${block.index} carrying ${block.txs.length} transactions`);
    }
}
