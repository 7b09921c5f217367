import { expect } from 'chai'
import { parseArgs, formatDepthReport } from '../src/agent/args.js'

describe('CLI arguments', () => {

    describe('parseArgs', () => {
        it('splits the command from its options', () => {
            expect(parseArgs(['mine', '--who', 'hacker', '--target', '10'])).to.deep.equal({
                command: 'mine',
                options: { who: 'hacker', target: '10' },
            })
        })

        it('treats an option without a value as a flag', () => {
            expect(parseArgs(['depth', '--verbose', '--nonce', 'abc'])).to.deep.equal({
                command: 'depth',
                options: { verbose: true, nonce: 'abc' },
            })
        })

        it('has no command for empty input', () => {
            expect(parseArgs([])).to.deep.equal({ command: undefined, options: {} })
        })
    })

    describe('formatDepthReport', () => {
        it('prints the depth of a mined transaction', () => {
            const out = formatDepthReport({ status: 'found', nonce: 'n1', blockIndex: 2, headIndex: 5, confirmations: 3 })
            expect(out).to.equal('nonce=n1\n  mined_in_block_index=2\n  head_index=5\n  confirmations=3')
        })

        it('prints the not-found line', () => {
            const out = formatDepthReport({ status: 'not_found', nonce: 'n1', headIndex: 5 })
            expect(out).to.equal('nonce=n1 not found in mined blocks (may still be queued/expired)')
        })

        it('says when the chain could not be read back far enough', () => {
            const out = formatDepthReport({ status: 'indeterminate', nonce: 'n1', headIndex: 5, oldestIndex: 2 })
            expect(out).to.equal('nonce=n1 not found in blocks 2..5; older blocks could not be fetched, result indeterminate')
        })
    })
})
