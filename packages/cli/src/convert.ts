import { readFileSync, writeFileSync } from 'node:fs'
import {
	AllocationError,
	InvalidInputError,
	SinkWriteError,
	detectFormat,
	errorMessage,
	type PcmAudio,
} from '../../core/src/index'
import { encodeUpd7759, findReader, validatePcmInput } from '../../codecs/src/index'

export interface ConvertJob {
	/** Input path, standard input when absent */
	input?: string
	/** Output path, standard output when absent */
	output?: string
	/** Stream read when there is no input path (defaults to process.stdin) */
	stdin?: AsyncIterable<Uint8Array | string>
	/** Stream written when there is no output path (defaults to process.stdout) */
	stdout?: NodeJS.WritableStream
}

export type ConvertResult =
	| { success: true; audio: PcmAudio; output: Uint8Array }
	| { success: false; error: string }

/**
 * Read all input bytes from a file or a stream
 */
export async function readInput(path?: string, stdin?: AsyncIterable<Uint8Array | string>): Promise<Uint8Array> {
	try {
		if (path !== undefined) {
			return new Uint8Array(readFileSync(path))
		}
		return await readStream(stdin ?? process.stdin)
	} catch (err) {
		if (err instanceof RangeError) {
			throw new AllocationError(`Cannot buffer input: ${err.message}`, { cause: err })
		}
		throw new InvalidInputError(`Cannot read ${path ?? 'standard input'}: ${errorMessage(err)}`, {
			cause: err,
		})
	}
}

/**
 * Write encoded bytes to a file or a stream
 * Resolves once the stream has accepted every byte
 */
export async function writeOutput(data: Uint8Array, path?: string, stdout?: NodeJS.WritableStream): Promise<void> {
	try {
		if (path !== undefined) {
			writeFileSync(path, data)
			return
		}
		await writeStream(stdout ?? process.stdout, data)
	} catch (err) {
		throw new SinkWriteError(`Cannot write ${path ?? 'standard output'}: ${errorMessage(err)}`, {
			cause: err,
		})
	}
}

async function readStream(stream: AsyncIterable<Uint8Array | string>): Promise<Uint8Array> {
	const chunks: Uint8Array[] = []
	for await (const chunk of stream) {
		chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk)
	}
	return new Uint8Array(Buffer.concat(chunks))
}

function writeStream(stream: NodeJS.WritableStream, data: Uint8Array): Promise<void> {
	return new Promise((resolve, reject) => {
		stream.once('error', reject)
		stream.write(data, (err) => {
			if (err) {
				// The listener stays to take the 'error' event that follows
				reject(err)
				return
			}
			stream.removeListener('error', reject)
			resolve()
		})
	})
}

/**
 * Detect, validate and decode a PCM container
 */
export function loadPcm(data: Uint8Array): PcmAudio {
	const reader = findReader(data)
	if (!reader) {
		const format = detectFormat(data)
		throw new InvalidInputError(
			format === 'upd7759' ? 'Input is already a UPD7759 stream' : 'Unknown audio format'
		)
	}

	validatePcmInput(reader.getInfo(data))
	return reader.decode(data)
}

/**
 * Encode container bytes to a UPD7759 stream
 */
export function convertToUpd(data: Uint8Array): { audio: PcmAudio; output: Uint8Array } {
	const audio = loadPcm(data)
	const output = encodeUpd7759(audio.samples, { sampleRate: audio.info.sampleRate })
	return { audio, output }
}

/**
 * Run one conversion; failures are returned, not thrown
 * Nothing is written unless encoding succeeded
 */
export async function convertFile(job: ConvertJob): Promise<ConvertResult> {
	try {
		const { audio, output } = convertToUpd(await readInput(job.input, job.stdin))
		await writeOutput(output, job.output, job.stdout)
		return { success: true, audio, output }
	} catch (err) {
		return { success: false, error: errorMessage(err) }
	}
}
