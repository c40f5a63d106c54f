import { getExtension, getMimeType, type AudioInfo } from '../../core/src/index'
import type { Upd7759Info } from '../../codecs/src/index'

function row(label: string, value: string | number): string {
	return `${`${label}:`.padEnd(16)}${value}`
}

export function formatBytes(bytes: number): string {
	if (bytes < 1024) return `${bytes} B`
	if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`
	return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
}

/**
 * Stream report for a PCM container
 */
export function describeAudio(info: AudioInfo): string[] {
	return [
		row('Format', `${info.format} (${getMimeType(info.format)})`),
		row('Extension', `.${getExtension(info.format)}`),
		row('Frames', info.sampleCount),
		row('Sample Rate', info.sampleRate),
		row('Channels', info.numChannels),
		row('Bits', info.bitsPerSample),
		row('Encoding', info.encoding),
		row('Duration', `${info.duration.toFixed(3)}s`),
	]
}

/**
 * Stream report for an encoded UPD7759 stream
 */
export function describeUpd7759(info: Upd7759Info, size: number): string[] {
	return [
		row('Format', 'upd7759'),
		row('Extension', `.${getExtension('upd7759')}`),
		row('Size', formatBytes(size)),
		row('Marker', `0x${info.marker.toString(16).padStart(2, '0')}`),
		row('Sample Rate', info.sampleRate),
		row('Blocks', info.blockCount),
		row('Packed Bytes', info.packedBytes),
		row('Samples', info.sampleCount),
		row('Duration', `${info.duration.toFixed(3)}s`),
	]
}
