export type ErrorCode =
	| 'INVALID_INPUT'
	| 'INVALID_SAMPLE_RATE'
	| 'SINK_WRITE_FAILURE'
	| 'ALLOCATION_FAILURE'

/**
 * Base class for every failure raised by pcm2upd
 */
export abstract class CodecError extends Error {
	abstract readonly code: ErrorCode

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options)
		this.name = new.target.name
	}
}

/**
 * Source audio could not be read or does not match the encoder's requirements
 */
export class InvalidInputError extends CodecError {
	readonly code = 'INVALID_INPUT'
}

/**
 * No frequency marker exists for the requested sample rate
 */
export class InvalidSampleRateError extends CodecError {
	readonly code = 'INVALID_SAMPLE_RATE'

	constructor(readonly sampleRate: number) {
		super(`Unsupported sample rate: ${sampleRate} Hz (expected 5000, 6000 or 8000)`)
	}
}

export class SinkWriteError extends CodecError {
	readonly code = 'SINK_WRITE_FAILURE'
}

export class AllocationError extends CodecError {
	readonly code = 'ALLOCATION_FAILURE'
}

/**
 * Get a printable message from anything thrown
 */
export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err)
}
