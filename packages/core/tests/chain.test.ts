import { expect, use } from 'chai'
import chaiAsPromised from 'chai-as-promised'
import { ChainReader, countMarked } from '../src/services/chain.js'
import type { LedgerClient } from '../src/services/ledger.js'
import type { Block, HeadSnapshot, PoolSnapshot } from '../src/schemas/ledger.js'
import { MemoryLedger, quietLogger } from './utils/memoryLedger.js'
use(chaiAsPromised)

function chainOf(length: number): MemoryLedger {
    const ledger = new MemoryLedger()
    for (let i = 1; i < length; i++) ledger.append()
    return ledger
}

describe('ChainReader', () => {

    it('returns every block oldest first when all fetches succeed', async () => {
        const ledger = chainOf(6)
        const snapshot = await new ChainReader(ledger, quietLogger()).reconstruct()

        expect(snapshot.blocks.map(b => b.index)).to.deep.equal([0, 1, 2, 3, 4, 5])
        expect(snapshot.truncated).to.equal(false)
        expect(snapshot.headHash).to.equal(ledger.headHash)
    })

    it('links each block to the digest of the one before it', async () => {
        const ledger = chainOf(4)
        const blocks = await new ChainReader(ledger, quietLogger()).reconstructChain()

        for (let i = 1; i < blocks.length; i++) {
            expect(blocks[i].prev_hash).to.equal(ledger.hashAt(i - 1))
        }
    })

    it('returns only genesis for a one-block chain', async () => {
        const snapshot = await new ChainReader(new MemoryLedger(), quietLogger()).reconstruct()

        expect(snapshot.blocks.map(b => b.index)).to.deep.equal([0])
        expect(snapshot.truncated).to.equal(false)
    })

    it('truncates to the blocks above a failed fetch', async () => {
        const ledger = chainOf(6)
        ledger.failingHashes.add(ledger.hashAt(2))
        const snapshot = await new ChainReader(ledger, quietLogger()).reconstruct()

        expect(snapshot.blocks.map(b => b.index)).to.deep.equal([3, 4, 5])
        expect(snapshot.truncated).to.equal(true)
    })

    it('truncates when the ledger does not know a block', async () => {
        const ledger = chainOf(4)
        ledger.missingHashes.add(ledger.hashAt(0))
        const snapshot = await new ChainReader(ledger, quietLogger()).reconstruct()

        expect(snapshot.blocks.map(b => b.index)).to.deep.equal([1, 2, 3])
        expect(snapshot.truncated).to.equal(true)
    })

    it('logs the truncation at debug level', async () => {
        const lines: string[] = []
        const ledger = chainOf(3)
        ledger.failingHashes.add(ledger.hashAt(1))
        await new ChainReader(ledger, quietLogger(lines, true)).reconstruct()

        expect(lines).to.include(`[chain:debug] reconstructed 1 blocks (truncated)`)
    })

    it('rejects when the head itself cannot be fetched', async () => {
        const ledger = chainOf(3)
        ledger.headFailures = 1
        await expect(new ChainReader(ledger, quietLogger()).reconstruct()).to.be.rejectedWith('head unavailable')
    })

    it('stops on a prev_hash cycle without repeating blocks', async () => {
        const a: Block = { index: 1, prev_hash: 'B', nonce: 0, txs: [] }
        const b: Block = { index: 0, prev_hash: 'A', nonce: 0, txs: [] }
        const looping: LedgerClient = {
            getHead: async (): Promise<HeadSnapshot> => ({ hash: 'A', block: a }),
            getBlock: async (hash: string) => (hash === 'A' ? a : hash === 'B' ? b : null),
            getPool: async (): Promise<PoolSnapshot> => ({ hash: 'A', txs: [] }),
            submitBlock: async () => ({ accepted: false }),
        }
        const snapshot = await new ChainReader(looping, quietLogger()).reconstruct()

        expect(snapshot.blocks.map(blk => blk.index)).to.deep.equal([0, 1])
        expect(snapshot.truncated).to.equal(true)
    })

    describe('countMarked', () => {
        it('counts blocks whose marker equals the identity', () => {
            const blocks: Block[] = [
                { index: 0, nonce: 0, txs: [] },
                { index: 1, prev_hash: 'a', nonce: 0, txs: [], nice: 'x' },
                { index: 2, prev_hash: 'b', nonce: 0, txs: [], nice: 'y' },
                { index: 3, prev_hash: 'c', nonce: 0, txs: [], nice: 'x' },
            ]
            expect(countMarked(blocks, 'x')).to.equal(2)
            expect(countMarked(blocks, 'z')).to.equal(0)
        })
    })
})
