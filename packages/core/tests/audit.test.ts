import { expect } from 'chai'
import { ConfirmationAuditor, findTransaction } from '../src/services/audit.js'
import { HttpLedgerClient, type FetchLike } from '../src/services/ledger.js'
import type { Block } from '../src/schemas/ledger.js'
import { MemoryLedger, quietLogger } from './utils/memoryLedger.js'

const tx = (nonce: string) => ({ src: 'alice', dst: 'bob', nonce, amount: 1 })

// B0..B5 with the given transactions per index
function ledgerWith(txsByIndex: Record<number, string[]>): MemoryLedger {
    const ledger = new MemoryLedger()
    for (let i = 1; i <= 5; i++) {
        ledger.append({ txs: (txsByIndex[i] ?? []).map(tx) })
    }
    return ledger
}

describe('ConfirmationAuditor', () => {

    it('reports the block index, head index and confirmations', async () => {
        const ledger = ledgerWith({ 1: ['a0'], 2: ['n0', 'n1'], 4: ['n9'] })
        const report = await new ConfirmationAuditor(ledger, quietLogger()).checkDepth('n1')

        expect(report).to.deep.equal({ status: 'found', nonce: 'n1', blockIndex: 2, headIndex: 5, confirmations: 3 })
    })

    it('reports zero confirmations for a tx in the head block', async () => {
        const ledger = ledgerWith({ 5: ['tip'] })
        const report = await new ConfirmationAuditor(ledger, quietLogger()).checkDepth('tip')

        expect(report).to.deep.equal({ status: 'found', nonce: 'tip', blockIndex: 5, headIndex: 5, confirmations: 0 })
    })

    it('reports not found for a nonce in no block', async () => {
        const ledger = ledgerWith({ 2: ['n1'] })
        const report = await new ConfirmationAuditor(ledger, quietLogger()).checkDepth('missing')

        expect(report).to.deep.equal({ status: 'not_found', nonce: 'missing', headIndex: 5 })
    })

    it('takes the earliest block when a nonce appears twice', async () => {
        const ledger = ledgerWith({ 1: ['dup'], 4: ['dup'] })
        const report = await new ConfirmationAuditor(ledger, quietLogger()).checkDepth('dup')

        expect(report).to.deep.equal({ status: 'found', nonce: 'dup', blockIndex: 1, headIndex: 5, confirmations: 4 })
    })

    it('is indeterminate when the nonce is absent from a truncated chain', async () => {
        const ledger = ledgerWith({ 1: ['old'] })
        ledger.failingHashes.add(ledger.hashAt(1))
        const report = await new ConfirmationAuditor(ledger, quietLogger()).checkDepth('old')

        expect(report).to.deep.equal({ status: 'indeterminate', nonce: 'old', headIndex: 5, oldestIndex: 2 })
    })

    it('still finds a nonce in the part of a truncated chain that was fetched', async () => {
        const ledger = ledgerWith({ 3: ['n3'] })
        ledger.failingHashes.add(ledger.hashAt(1))
        const report = await new ConfirmationAuditor(ledger, quietLogger()).checkDepth('n3')

        expect(report).to.deep.equal({ status: 'found', nonce: 'n3', blockIndex: 3, headIndex: 5, confirmations: 2 })
    })

    it('counts from the newest block seen when the head advances between reads', async () => {
        const ledger = ledgerWith({ 2: ['n1'] })
        ledger.onHeadRead = reads => {
            if (reads === 2) ledger.append()
        }
        const report = await new ConfirmationAuditor(ledger, quietLogger()).checkDepth('n1')

        expect(report).to.deep.equal({ status: 'found', nonce: 'n1', blockIndex: 2, headIndex: 6, confirmations: 4 })
    })

    it('reads blocks with null markers and null transaction nonces over HTTP', async () => {
        const routes: Record<string, unknown> = {
            'http://ledger.test/block': {
                hash: 'h1',
                block: { index: 1, prev_hash: 'h0', nonce: 3, txs: [], nice: null },
            },
            'http://ledger.test/block?hash=h0': {
                block: { index: 0, prev_hash: null, nonce: 0, txs: [tx('n0'), { src: null, dst: 'bob', nonce: null }] },
            },
        }
        const fetch: FetchLike = async url => new Response(JSON.stringify(routes[url] ?? {}), { status: 200 })
        const ledger = new HttpLedgerClient({ baseUrl: 'http://ledger.test', fetch })
        const report = await new ConfirmationAuditor(ledger, quietLogger()).checkDepth('n0')

        expect(report).to.deep.equal({ status: 'found', nonce: 'n0', blockIndex: 0, headIndex: 1, confirmations: 1 })
    })

    describe('findTransaction', () => {
        const blocks: Block[] = [
            { index: 0, nonce: 0, txs: [] },
            { index: 1, prev_hash: 'a', nonce: 0, txs: [tx('p'), tx('q')] },
            { index: 2, prev_hash: 'b', nonce: 0, txs: [{ src: 'c', dst: 'd' }] },
        ]

        it('returns the index of the containing block', () => {
            expect(findTransaction(blocks, 'q')).to.equal(1)
        })

        it('returns null when absent', () => {
            expect(findTransaction(blocks, 'r')).to.equal(null)
        })
    })
})
