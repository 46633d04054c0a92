export { SimpleUsernameAttributeProvider } from './usernameAttributeProvider'
export type { UsernameAttributeProvider } from './usernameAttributeProvider'
