/**
 * @pcm2upd/core - shared types, errors and format detection
 */

export * from './errors'
export * from './format'
export * from './types'
