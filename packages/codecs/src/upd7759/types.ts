/**
 * UPD7759 stream types
 * 4-bit ADPCM speech data framed by periodic frequency markers
 */

/** Frequency marker bytes, one per supported sample rate */
export const FrequencyMarker = {
	/** Unset; never emitted */
	NONE: 0x00,
	/** 5 kHz */
	FIVE_KHZ: 0x5f,
	/** 6 kHz */
	SIX_KHZ: 0x59,
	/** 8 kHz */
	EIGHT_KHZ: 0x53,
} as const

export type FrequencyMarkerValue = (typeof FrequencyMarker)[keyof typeof FrequencyMarker]

/** Sample rates the chip can play back */
export type Upd7759SampleRate = 5000 | 6000 | 8000

export const UPD7759_SAMPLE_RATES: readonly Upd7759SampleRate[] = [5000, 6000, 8000]

/** Packed bytes between two frequency markers */
export const UPD7759_BLOCK_SIZE = 256

/** Upper bound of the adaptation state and of every nibble */
export const UPD7759_MAX_STATE = 15

/**
 * Per-session encoder state
 * `index` selects the step table row for the next sample
 */
export interface EncoderState {
	index: number
}

/** UPD7759 encode options */
export interface Upd7759EncodeOptions {
	/** Sample rate of the input, selects the frequency marker */
	sampleRate: number
}

/** UPD7759 stream info (metadata without decoding) */
export interface Upd7759Info {
	/** Frequency marker found at the start of every block */
	marker: number
	/** Sample rate signalled by the marker */
	sampleRate: Upd7759SampleRate
	/** Number of marker bytes in the stream */
	blockCount: number
	/** Number of packed nibble bytes */
	packedBytes: number
	/** Nibble count (the last one may be padding) */
	sampleCount: number
	/** Duration in seconds */
	duration: number
}
