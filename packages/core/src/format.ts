import type { AudioFormat } from './types'

/**
 * Magic bytes for format detection
 */
const MAGIC_BYTES: Record<string, { bytes: number[]; offset?: number }> = {
	riff: { bytes: [0x52, 0x49, 0x46, 0x46] }, // "RIFF"
	wave: { bytes: [0x57, 0x41, 0x56, 0x45], offset: 8 }, // "WAVE"
	form: { bytes: [0x46, 0x4f, 0x52, 0x4d] }, // "FORM"
	aiff: { bytes: [0x41, 0x49, 0x46, 0x46], offset: 8 }, // "AIFF"
	aifc: { bytes: [0x41, 0x49, 0x46, 0x43], offset: 8 }, // "AIFC"
	au: { bytes: [0x2e, 0x73, 0x6e, 0x64] }, // ".snd"
}

/**
 * UPD7759 frequency marker bytes (5, 6 and 8 kHz)
 */
const UPD7759_MARKERS: ReadonlySet<number> = new Set([0x5f, 0x59, 0x53])

const MIME_TYPES: Record<AudioFormat, string> = {
	wav: 'audio/wav',
	aiff: 'audio/aiff',
	au: 'audio/basic',
	upd7759: 'application/octet-stream',
}

const EXTENSIONS: Record<AudioFormat, string> = {
	wav: 'wav',
	aiff: 'aiff',
	au: 'au',
	upd7759: 'upd',
}

/**
 * Check if bytes match magic signature
 */
function matchMagic(data: Uint8Array, magic: { bytes: number[]; offset?: number }): boolean {
	const offset = magic.offset ?? 0
	if (data.length < offset + magic.bytes.length) return false

	for (let i = 0; i < magic.bytes.length; i++) {
		if (data[offset + i] !== magic.bytes[i]) return false
	}
	return true
}

/**
 * Detect format from binary data
 */
export function detectFormat(data: Uint8Array): AudioFormat | null {
	if (matchMagic(data, MAGIC_BYTES.riff!) && matchMagic(data, MAGIC_BYTES.wave!)) return 'wav'

	if (
		matchMagic(data, MAGIC_BYTES.form!) &&
		(matchMagic(data, MAGIC_BYTES.aiff!) || matchMagic(data, MAGIC_BYTES.aifc!))
	) {
		return 'aiff'
	}

	if (matchMagic(data, MAGIC_BYTES.au!) && data.length >= 24) return 'au'

	// Raw stream, identified only by its leading marker
	if (data.length > 0 && UPD7759_MARKERS.has(data[0]!)) return 'upd7759'

	return null
}

/**
 * Get file extension for format
 */
export function getExtension(format: AudioFormat): string {
	return EXTENSIONS[format]
}

/**
 * Get MIME type for format
 */
export function getMimeType(format: AudioFormat): string {
	return MIME_TYPES[format]
}
