import { assert, softAssert } from '../assert'
import { InvalidArgumentError } from '../errors'
import { ServiceRegistry } from '../../services/serviceRegistry'

describe('assert', () => {
    const mockLog = {
        crash: jest.fn(),
        error: jest.fn(),
        warn: jest.fn(),
    }

    beforeEach(() => {
        jest.clearAllMocks()
        ServiceRegistry.clear()
    })

    afterEach(() => {
        ServiceRegistry.clear()
    })

    describe('assert - success cases', () => {
        it('should not throw when value is truthy', () => {
            expect(() => assert('valid', 'msg')).not.toThrow()
            expect(() => assert(1, 'msg')).not.toThrow()
            expect(() => assert(true, 'msg')).not.toThrow()
        })

        it('should not throw for falsy values that are not null, undefined or false', () => {
            expect(() => assert('', 'msg')).not.toThrow()
            expect(() => assert(0, 'msg')).not.toThrow()
        })
    })

    describe('assert - failure cases', () => {
        it('should throw InvalidArgumentError when value is null and no registry is active', () => {
            expect(() => assert(null, 'expected error')).toThrow(InvalidArgumentError)
            expect(() => assert(null, 'expected error')).toThrow(/expected error/)
        })

        it('should throw when value is undefined', () => {
            expect(() => assert(undefined, 'msg')).toThrow(InvalidArgumentError)
        })

        it('should throw when condition is false', () => {
            expect(() => assert(false, 'condition failed')).toThrow(/condition failed/)
        })

        it('should call log.crash with an InvalidArgumentError when a registry is active', () => {
            mockLog.crash.mockImplementation((_message: string, _data: unknown, error: Error) => {
                throw error
            })
            ServiceRegistry.setCurrent({ log: mockLog } as unknown as ServiceRegistry)

            expect(() => assert(null, 'crash message')).toThrow(InvalidArgumentError)
            expect(mockLog.crash).toHaveBeenCalledWith('crash message', undefined, expect.any(InvalidArgumentError))
        })
    })

    describe('softAssert', () => {
        it('should return true when value is valid', () => {
            expect(softAssert('x', 'msg')).toBe(true)
            expect(softAssert(1, 'msg')).toBe(true)
        })

        it('should return false and warn when value is null', () => {
            ServiceRegistry.setCurrent({ log: mockLog } as unknown as ServiceRegistry)
            expect(softAssert(null, 'msg')).toBe(false)
            expect(mockLog.warn).toHaveBeenCalledWith('msg')
        })

        it('should use error level when specified', () => {
            ServiceRegistry.setCurrent({ log: mockLog } as unknown as ServiceRegistry)
            softAssert(null, 'error msg', 'error')
            expect(mockLog.error).toHaveBeenCalledWith('error msg')
        })

        it('should fall back to console.warn without a registry', () => {
            const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined)
            expect(softAssert(false, 'no registry')).toBe(false)
            expect(warn).toHaveBeenCalledWith(expect.stringMatching(/no registry$/))
            warn.mockRestore()
        })
    })
})
