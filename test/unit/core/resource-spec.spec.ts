import * as assert from 'assert'
import { expect } from 'chai'
import { defaultResourceSpec, parseResourceSpec } from '../../../src/core/spec/resource-spec'
import { InvalidResourceSpecError } from '../../../src/core/errors/provisioning'

describe('Resource specification', () => {

    it('should apply the default region and engine version', () => {
        const spec = parseResourceSpec({ database: { cpuCores: 1, memoryMb: 1000, storageGb: 25 } })

        assert.strictEqual(spec.region, 'ap-guangzhou')
        assert.strictEqual(spec.compute, undefined)
        assert.deepStrictEqual(spec.database, { cpuCores: 1, memoryMb: 1000, storageGb: 25, engineVersion: '8.0' })
    })

    it('should treat null as not requested', () => {
        const spec = parseResourceSpec({ region: 'r1', compute: null, database: null })
        assert.strictEqual(spec.compute, undefined)
        assert.strictEqual(spec.database, undefined)
    })

    it('should treat a null GPU class as CPU only', () => {
        const spec = parseResourceSpec({
            region: 'r1',
            compute: { cpuCores: 2, memoryGb: 4, diskGb: 50, gpuClass: null },
            database: null
        })
        assert.deepStrictEqual(spec.compute, { cpuCores: 2, memoryGb: 4, diskGb: 50, gpuClass: undefined })
    })

    it('should freeze the parsed spec', () => {
        const spec = defaultResourceSpec('ap-shanghai')
        assert.ok(Object.isFrozen(spec))
        assert.ok(Object.isFrozen(spec.compute))
        assert.deepStrictEqual(spec.compute, { cpuCores: 2, memoryGb: 4, diskGb: 50 })
    })

    const invalidCases: Array<{ reason: string, input: unknown, path: string }> = [
        { reason: 'disk below the minimum', input: { compute: { cpuCores: 2, memoryGb: 4, diskGb: 10 } }, path: 'compute.diskGb' },
        { reason: 'fractional CPU', input: { compute: { cpuCores: 1.5, memoryGb: 4, diskGb: 50 } }, path: 'compute.cpuCores' },
        { reason: 'unknown engine version', input: { database: { cpuCores: 1, memoryMb: 1000, storageGb: 25, engineVersion: '9.9' } }, path: 'database.engineVersion' },
        { reason: 'unknown field', input: { region: 'r1', extra: true }, path: '<root>' },
        { reason: 'malformed region', input: { region: 'AP Guangzhou' }, path: 'region' },
    ]

    invalidCases.forEach(({ reason, input, path }) => {
        it(`should reject ${reason}`, () => {
            try {
                parseResourceSpec(input)
                assert.fail('should have thrown')
            } catch (error) {
                expect(error).to.be.instanceOf(InvalidResourceSpecError)
                if (error instanceof InvalidResourceSpecError) {
                    const issues = error.context.issues
                    assert.ok(Array.isArray(issues))
                    assert.ok(issues.some(i => String(i).startsWith(`${path}:`)), `issues: ${issues.join('; ')}`)
                }
            }
        })
    })
})
