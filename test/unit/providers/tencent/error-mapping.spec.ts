import * as assert from 'assert'
import { classifyTencentError, toProviderCallError } from '../../../../src/providers/tencent/error-mapping'
import { ProviderCallError } from '../../../../src/core/errors/provisioning'

class FakeSdkException extends Error {
    constructor(readonly code: string, message: string, readonly requestId?: string) {
        super(message)
    }
}

describe('Tencent error mapping', () => {

    const cases: Array<{ code: string, message: string, expected: string }> = [
        { code: 'ResourceInsufficient.SpecifiedInstanceType', message: 'no stock', expected: 'capacity-exhausted' },
        { code: 'ResourcesSoldOut.EipInsufficient', message: '', expected: 'capacity-exhausted' },
        { code: 'FailedOperation', message: '该可用区已售罄', expected: 'capacity-exhausted' },
        { code: 'InvalidZone.MismatchRegion', message: '', expected: 'invalid-zone' },
        { code: 'ResourceNotFound.InvalidVpc', message: '', expected: 'not-found' },
        { code: 'InvalidInstanceId.NotFound', message: '', expected: 'not-found' },
        { code: 'TradeError', message: 'insufficient balance', expected: 'other' },
        { code: 'AuthFailure.SignatureFailure', message: '', expected: 'other' },
    ]

    cases.forEach(({ code, message, expected }) => {
        it(`should classify ${code} as ${expected}`, () => {
            assert.strictEqual(classifyTencentError(code, message), expected)
        })
    })

    it('should wrap SDK exceptions with their code and request ID', () => {
        const sdkError = new FakeSdkException('InvalidZone.MismatchRegion', 'zone does not match', 'req-1')

        const error = toProviderCallError('RunInstances', sdkError)

        assert.strictEqual(error.kind, 'invalid-zone')
        assert.strictEqual(error.providerCode, 'InvalidZone.MismatchRegion')
        assert.strictEqual(error.context.requestId, 'req-1')
        assert.strictEqual(error.originalError, sdkError)
        assert.strictEqual(error.message, 'Provider call RunInstances failed (InvalidZone.MismatchRegion): zone does not match')
    })

    it('should classify errors without a code as other', () => {
        const error = toProviderCallError('CreateVpc', new Error('socket hang up'))
        assert.strictEqual(error.kind, 'other')
        assert.strictEqual(error.providerCode, 'Unknown')
    })

    it('should pass provider call errors through', () => {
        const existing = new ProviderCallError('not-found', { operation: 'DeleteVpc', providerCode: 'ResourceNotFound', providerMessage: 'gone' })
        assert.strictEqual(toProviderCallError('DeleteVpc', existing), existing)
    })
})
