import { ConnectorError } from '@sailpoint/connector-sdk'
import { ServiceRegistry } from '../serviceRegistry'
import { LogService } from '../logService'
import { AdditiveAttributeMerger, firstMerge } from '../mergeService'
import { SimpleUsernameAttributeProvider } from '../usernameService'
import { resolveConfig } from '../../data/config'
import { AttributeMap } from '../../model/person'

jest.mock('../logService')

describe('ServiceRegistry', () => {
    afterEach(() => {
        ServiceRegistry.clear()
    })

    it('should build the services from the configuration', () => {
        const registry = new ServiceRegistry(
            resolveConfig({ usernameAttribute: 'uid', attributeMerge: 'list', distinctValues: true })
        )

        expect(registry.usernames.getUsernameAttribute()).toBe('uid')
        const merged = registry.merger.mergeAttributes(
            new Map([['groups', ['eng']]]),
            new Map([['groups', ['eng', 'ops']]])
        )
        expect(merged.get('groups')).toEqual(['eng', 'ops'])
    })

    it('should use the configured merge strategy', () => {
        const registry = new ServiceRegistry(resolveConfig({ attributeMerge: 'first' }))

        const merged = registry.merger.mergeAttributes(
            new Map([['mail', ['a@example.com']]]),
            new Map([['mail', ['b@example.com']]])
        )

        expect(merged.get('mail')).toEqual(['a@example.com'])
    })

    it('should prefer overrides to the defaults', () => {
        const log = new LogService({ spConnDebugLoggingEnabled: false })
        const usernames = new SimpleUsernameAttributeProvider('employeeNumber')
        const merger = new AdditiveAttributeMerger(firstMerge)

        const registry = new ServiceRegistry(resolveConfig({}), { log, usernames, merger })

        expect(registry.log).toBe(log)
        expect(registry.usernames).toBe(usernames)
        expect(registry.merger).toBe(merger)
    })

    it('should build the merger around an overridden strategy', () => {
        const mergeStrategy = jest.fn((toModify: AttributeMap) => toModify)
        const registry = new ServiceRegistry(resolveConfig({}), { mergeStrategy })

        registry.merger.mergeAttributes(new Map(), new Map())

        expect(mergeStrategy).toHaveBeenCalledTimes(1)
    })

    describe('current registry', () => {
        it('should throw when no registry is active', () => {
            expect(() => ServiceRegistry.getCurrent()).toThrow(ConnectorError)
            expect(ServiceRegistry.peekCurrent()).toBeUndefined()
        })

        it('should return the active registry until cleared', () => {
            const registry = new ServiceRegistry(resolveConfig({}))
            ServiceRegistry.setCurrent(registry)

            expect(ServiceRegistry.getCurrent()).toBe(registry)
            expect(ServiceRegistry.peekCurrent()).toBe(registry)

            ServiceRegistry.clear()
            expect(ServiceRegistry.peekCurrent()).toBeUndefined()
        })
    })
})
