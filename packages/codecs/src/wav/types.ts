/**
 * WAV audio format types
 * RIFF WAVE container with PCM audio data
 */

/** WAV audio format codes */
export const WavFormat = {
	/** Uncompressed PCM */
	PCM: 1,
	/** IEEE floating point */
	IEEE_FLOAT: 3,
	/** A-law encoded */
	ALAW: 6,
	/** μ-law encoded */
	MULAW: 7,
	/** Extensible format (real code in the sub-format GUID) */
	EXTENSIBLE: 0xfffe,
} as const

/** Format tag as stored; anything outside WavFormat is some compressed codec */
export type WavFormatCode = number

/** WAV file header (RIFF + fmt chunk) */
export interface WavHeader {
	/** File size (RIFF chunk size + 8) */
	fileSize: number
	/** Audio format code (sub-format for WAVE_FORMAT_EXTENSIBLE) */
	audioFormat: WavFormatCode
	/** Number of channels (1=mono, 2=stereo) */
	numChannels: number
	/** Sample rate in Hz */
	sampleRate: number
	/** Bytes per second */
	byteRate: number
	/** Block alignment (bytes per sample frame) */
	blockAlign: number
	/** Bits per sample */
	bitsPerSample: number
	/** Data chunk offset */
	dataOffset: number
	/** Data chunk size in bytes, clipped to what the file holds */
	dataSize: number
}

/** WAV encode options */
export interface WavEncodeOptions {
	/** Sample rate (default: 8000) */
	sampleRate?: number
	/** Bits per sample: 8 or 16 (default: 16) */
	bitsPerSample?: 8 | 16
}

// RIFF magic numbers
export const RIFF_MAGIC = 0x46464952 // 'RIFF'
export const WAVE_MAGIC = 0x45564157 // 'WAVE'
export const FMT_MAGIC = 0x20746d66 // 'fmt '
export const DATA_MAGIC = 0x61746164 // 'data'
