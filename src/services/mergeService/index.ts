// Re-export main service class
export { AdditiveAttributeMerger } from './attributeMerger'

export { createMergeStrategy, firstMerge, listMerge, replaceMerge } from './strategies'

// Re-export types
export type { MergePersonAttributes, MergeStrategyOptions } from './types'
