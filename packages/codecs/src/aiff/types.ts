/**
 * AIFF audio format types
 * Audio Interchange File Format (Apple)
 */

/** AIFF file header */
export interface AiffHeader {
	/** File size */
	fileSize: number
	/** Is AIFF-C format */
	isAIFC: boolean
	/** Number of channels */
	numChannels: number
	/** Number of sample frames */
	numSampleFrames: number
	/** Bits per sample */
	sampleSize: number
	/** Sample rate in Hz */
	sampleRate: number
	/** Compression type (for AIFF-C) */
	compressionType?: string
	/** Sound data offset */
	dataOffset: number
	/** Sound data size, clipped to what the file holds */
	dataSize: number
	/** Block size */
	blockSize: number
}

/** AIFF encode options */
export interface AiffEncodeOptions {
	/** Sample rate (default: 8000) */
	sampleRate?: number
}

// IFF magic numbers (big-endian)
export const FORM_MAGIC = 0x464f524d // 'FORM'
export const AIFF_MAGIC = 0x41494646 // 'AIFF'
export const AIFC_MAGIC = 0x41494643 // 'AIFC'
export const COMM_MAGIC = 0x434f4d4d // 'COMM'
export const SSND_MAGIC = 0x53534e44 // 'SSND'

/** AIFF-C compression types holding plain integer PCM */
export const PCM_COMPRESSION_TYPES = ['NONE', 'twos', 'sowt'] as const

/** Little-endian integer PCM */
export const SOWT_COMPRESSION = 'sowt'
