/**
 * AU audio format types
 * Sun/NeXT audio format
 */

/** AU encoding types */
export const AuEncoding = {
	/** μ-law (8-bit) */
	MULAW: 1,
	/** 8-bit linear PCM */
	LINEAR_8: 2,
	/** 16-bit linear PCM */
	LINEAR_16: 3,
	/** 24-bit linear PCM */
	LINEAR_24: 4,
	/** 32-bit linear PCM */
	LINEAR_32: 5,
	/** 32-bit IEEE float */
	FLOAT: 6,
	/** 64-bit IEEE float */
	DOUBLE: 7,
	/** A-law (8-bit) */
	ALAW: 27,
} as const

/** Encoding field as stored; unknown values are treated as compressed */
export type AuEncodingType = number

/** AU file header */
export interface AuHeader {
	/** Data offset from file start */
	dataOffset: number
	/** Data size in bytes, clipped to what the file holds */
	dataSize: number
	/** Encoding type */
	encoding: AuEncodingType
	/** Sample rate in Hz */
	sampleRate: number
	/** Number of channels */
	numChannels: number
	/** Annotation/info string */
	annotation?: string
}

/** AU encode options */
export interface AuEncodeOptions {
	/** Sample rate (default: 8000) */
	sampleRate?: number
	/** Annotation string */
	annotation?: string
}

// AU magic number
export const AU_MAGIC = 0x2e736e64 // '.snd'

/** Data size value meaning "unknown, read to end of file" */
export const AU_UNKNOWN_SIZE = 0xffffffff
