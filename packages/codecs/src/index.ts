/**
 * @pcm2upd/codecs - container readers and the UPD7759 encoder
 */

import type { AudioReader } from '@pcm2upd/core'
import { aiffReader } from './aiff'
import { auReader } from './au'
import { wavReader } from './wav'

export * from './aiff'
export * from './au'
export * from './upd7759'
export * from './wav'

/**
 * Every container the encoder can take input from
 */
export const readers: readonly AudioReader[] = [wavReader, aiffReader, auReader]

/**
 * Find the reader for a container
 */
export function findReader(data: Uint8Array): AudioReader | null {
	return readers.find((reader) => reader.detect(data)) ?? null
}
