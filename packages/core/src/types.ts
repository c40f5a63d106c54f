/**
 * Supported container formats
 */
export type AudioFormat = 'wav' | 'aiff' | 'au' | 'upd7759'

/**
 * How samples are stored inside a container
 */
export type SampleEncoding = 'pcm' | 'float' | 'mulaw' | 'alaw' | 'compressed'

/**
 * Stream properties read from a container header
 */
export interface AudioInfo {
	readonly format: AudioFormat
	readonly numChannels: number
	readonly sampleRate: number
	readonly bitsPerSample: number
	readonly encoding: SampleEncoding
	readonly duration: number // seconds
	readonly sampleCount: number // per channel
}

/**
 * Decoded 16-bit PCM audio
 * Samples are interleaved when numChannels > 1
 */
export interface PcmAudio {
	readonly info: AudioInfo
	readonly samples: Int16Array
}

/**
 * Container reader
 */
export interface AudioReader {
	readonly format: AudioFormat
	detect(data: Uint8Array): boolean
	getInfo(data: Uint8Array): AudioInfo
	decode(data: Uint8Array): PcmAudio
}

/**
 * Destination for encoded bytes
 */
export interface ByteSink {
	write(byte: number): void
}

/**
 * Growable in-memory sink
 */
export class ByteBuffer implements ByteSink {
	private data: Uint8Array
	private length = 0

	constructor(initialCapacity = 1024) {
		this.data = new Uint8Array(Math.max(1, initialCapacity))
	}

	write(byte: number): void {
		if (this.length === this.data.length) {
			const next = new Uint8Array(this.data.length * 2)
			next.set(this.data)
			this.data = next
		}
		this.data[this.length++] = byte & 0xff
	}

	get size(): number {
		return this.length
	}

	/**
	 * Copy of the bytes written so far
	 */
	toUint8Array(): Uint8Array {
		return this.data.slice(0, this.length)
	}
}
