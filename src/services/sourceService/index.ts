export { DefaultAttributeSource } from './defaultAttributeSource'
export { InMemoryPersonAttributeSource } from './inMemorySource'
export { MergingPersonAttributeSource } from './mergingSource'

export type { MergingSourceOptions } from './mergingSource'
export type { PersonAttributeSource } from './types'
