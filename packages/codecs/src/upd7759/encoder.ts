/**
 * UPD7759 encoder
 * Converts 16-bit PCM into the chip's 4-bit ADPCM stream
 */

import {
	AllocationError,
	ByteBuffer,
	InvalidSampleRateError,
	SinkWriteError,
	errorMessage,
	type ByteSink,
} from '@pcm2upd/core'
import { STATE_TRANSITION_TABLE, STEP_TABLE } from './tables'
import {
	FrequencyMarker,
	UPD7759_BLOCK_SIZE,
	UPD7759_MAX_STATE,
	type EncoderState,
	type Upd7759EncodeOptions,
	type Upd7759SampleRate,
} from './types'

/**
 * Create a fresh encoder state (index 0)
 */
export function createEncoderState(): EncoderState {
	return { index: 0 }
}

function clamp(value: number): number {
	if (value < 0) return 0
	if (value > UPD7759_MAX_STATE) return UPD7759_MAX_STATE
	return value
}

/**
 * Encode one sample to a nibble, advancing `state`
 *
 * Only bits 7..15 of the sample are used. Both table lookups are combined
 * by subtraction (transition - state, step - code).
 */
export function encodeSample(sample: number, state: EncoderState): number {
	// Top bits narrowed to a signed byte
	const shifted = ((sample >> 7) << 24) >> 24

	const current = clamp(state.index)
	const code = clamp(shifted)

	const next = clamp(STATE_TRANSITION_TABLE[code]! - current)
	const nibble = (STEP_TABLE[next]![code]! - code) & 0x0f

	state.index = next
	return nibble
}

/**
 * Encode a whole buffer to nibbles in one session
 */
export function encodeSamples(samples: ArrayLike<number>): Uint8Array {
	const state = createEncoderState()
	const nibbles = allocate(samples.length)
	for (let i = 0; i < samples.length; i++) {
		nibbles[i] = encodeSample(samples[i]!, state)
	}
	return nibbles
}

/**
 * Get the frequency marker for a sample rate
 */
export function resolveFrequencyMarker(sampleRate: number): number {
	switch (sampleRate) {
		case 5000:
			return FrequencyMarker.FIVE_KHZ
		case 6000:
			return FrequencyMarker.SIX_KHZ
		case 8000:
			return FrequencyMarker.EIGHT_KHZ
		default:
			throw new InvalidSampleRateError(sampleRate)
	}
}

/**
 * Get the sample rate signalled by a marker byte
 */
export function sampleRateForMarker(marker: number): Upd7759SampleRate | null {
	switch (marker) {
		case FrequencyMarker.FIVE_KHZ:
			return 5000
		case FrequencyMarker.SIX_KHZ:
			return 6000
		case FrequencyMarker.EIGHT_KHZ:
			return 8000
		default:
			return null
	}
}

/**
 * Encoded size in bytes for a sample count
 */
export function getUpd7759Size(sampleCount: number): number {
	const packedBytes = Math.ceil(sampleCount / 2)
	return packedBytes + 1 + Math.floor(packedBytes / UPD7759_BLOCK_SIZE)
}

/**
 * Encode samples and write the framed stream to `sink`
 *
 * Output starts with the frequency marker and repeats it after every
 * 256 packed bytes. Each byte holds two nibbles, first sample high.
 * An odd trailing nibble is written in the high half of a final byte.
 *
 * @returns Number of bytes written
 */
export function packUpd7759(samples: ArrayLike<number>, sampleRate: number, sink: ByteSink): number {
	const marker = resolveFrequencyMarker(sampleRate)

	let written = 0
	let packed = 0

	const emit = (byte: number): void => {
		try {
			sink.write(byte)
		} catch (err) {
			throw new SinkWriteError(`Failed to write output: ${errorMessage(err)}`, { cause: err })
		}
		written++
	}

	const emitPacked = (byte: number): void => {
		emit(byte)
		if (++packed === UPD7759_BLOCK_SIZE) {
			packed = 0
			emit(marker)
		}
	}

	emit(marker)

	const state = createEncoderState()
	let pending = 0
	let odd = false

	for (let i = 0; i < samples.length; i++) {
		const nibble = encodeSample(samples[i]!, state)

		if (odd) {
			emitPacked((pending << 4) | nibble)
		} else {
			pending = nibble
		}
		odd = !odd
	}

	if (odd) {
		emitPacked(pending << 4)
	}

	return written
}

/**
 * Encode samples to a UPD7759 stream
 */
export function encodeUpd7759(samples: ArrayLike<number>, options: Upd7759EncodeOptions): Uint8Array {
	// Reject before allocating
	resolveFrequencyMarker(options.sampleRate)
	const size = getUpd7759Size(samples.length)

	let sink: ByteBuffer
	try {
		sink = new ByteBuffer(size)
	} catch (err) {
		throw new AllocationError(`Cannot allocate ${size} byte output buffer`, { cause: err })
	}

	packUpd7759(samples, options.sampleRate, sink)
	return sink.toUint8Array()
}

function allocate(length: number): Uint8Array {
	try {
		return new Uint8Array(length)
	} catch (err) {
		throw new AllocationError(`Cannot allocate ${length} byte buffer`, { cause: err })
	}
}
