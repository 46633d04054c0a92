import { LogService } from '../../logService'
import { SimpleUsernameAttributeProvider } from '../../usernameService'
import { InMemoryPersonAttributeSource } from '../inMemorySource'
import { attrs } from './helpers'

jest.mock('../../logService')

describe('InMemoryPersonAttributeSource', () => {
    let mockLog: jest.Mocked<LogService>
    let source: InMemoryPersonAttributeSource

    beforeEach(() => {
        mockLog = new LogService({ spConnDebugLoggingEnabled: false }) as jest.Mocked<LogService>
        source = InMemoryPersonAttributeSource.fromRecords(mockLog, {
            alice: { mail: 'alice@example.com', groups: ['eng', 'ops'] },
            bob: { mail: 'bob@example.com', phone: null },
        })
    })

    it('should find a person by username', async () => {
        const alice = await source.getPerson('alice')

        expect(alice?.name).toBe('alice')
        expect(alice?.attributes).toEqual(attrs({ mail: ['alice@example.com'], groups: ['eng', 'ops'] }))
    })

    it('should return undefined for unknown usernames', async () => {
        await expect(source.getPerson('carol')).resolves.toBeUndefined()
    })

    it('should return nothing for queries without a single username', async () => {
        await expect(source.getPeopleWithMultivaluedAttributes(attrs({ username: ['a*'] }))).resolves.toEqual(new Set())
        await expect(source.getPeopleWithMultivaluedAttributes(attrs({ mail: ['bob@example.com'] }))).resolves.toEqual(
            new Set()
        )
    })

    it('should answer single-valued queries', async () => {
        const people = await source.getPeople({ username: 'bob' })

        expect(people.size).toBe(1)
        expect(Array.from(people)[0].attributes.get('phone')).toBeNull()
    })

    it('should look users up through the configured username attribute', async () => {
        const byUid = InMemoryPersonAttributeSource.fromRecords(
            mockLog,
            { alice: { mail: 'alice@example.com' } },
            new SimpleUsernameAttributeProvider('uid')
        )

        await expect(byUid.getPerson('alice')).resolves.toMatchObject({ name: 'alice' })
        expect(byUid.getAvailableQueryAttributes()).toEqual(new Set(['uid']))
    })

    it('should report the attribute names it holds', () => {
        expect(source.getPossibleUserAttributeNames()).toEqual(new Set(['mail', 'groups', 'phone']))
        expect(source.getAvailableQueryAttributes()).toEqual(new Set(['username']))
    })
})
