/**
 * UPD7759 stream parser
 * Reads framing metadata; nibbles are not decoded back to PCM
 */

import { InvalidInputError } from '@pcm2upd/core'
import { sampleRateForMarker } from './encoder'
import { UPD7759_BLOCK_SIZE, type Upd7759Info } from './types'

/**
 * Check if data starts like a UPD7759 stream
 */
export function isUpd7759(data: Uint8Array): boolean {
	if (data.length === 0) return false
	return sampleRateForMarker(data[0]!) !== null
}

/**
 * Parse UPD7759 stream info, checking every block marker
 */
export function parseUpd7759Info(data: Uint8Array): Upd7759Info {
	if (data.length === 0) {
		throw new InvalidInputError('Invalid UPD7759: empty stream')
	}

	const marker = data[0]!
	const sampleRate = sampleRateForMarker(marker)
	if (sampleRate === null) {
		throw new InvalidInputError(`Invalid UPD7759: unknown frequency marker 0x${hex(marker)}`)
	}

	let blockCount = 1
	let packedBytes = 0
	let inBlock = 0

	for (let offset = 1; offset < data.length; offset++) {
		if (inBlock === UPD7759_BLOCK_SIZE) {
			const byte = data[offset]!
			if (byte !== marker) {
				throw new InvalidInputError(
					`Invalid UPD7759: expected marker 0x${hex(marker)} at offset ${offset}, found 0x${hex(byte)}`
				)
			}
			blockCount++
			inBlock = 0
			continue
		}

		packedBytes++
		inBlock++
	}

	const sampleCount = packedBytes * 2

	return {
		marker,
		sampleRate,
		blockCount,
		packedBytes,
		sampleCount,
		duration: sampleCount / sampleRate,
	}
}

function hex(byte: number): string {
	return byte.toString(16).padStart(2, '0')
}
