#!/usr/bin/env tsx
/**
 * pcm2upd CLI - encode 16-bit PCM audio to UPD7759 speech data
 */

import { InvalidInputError, errorMessage } from '../../core/src/index'
import { findReader, isUpd7759, parseUpd7759Info } from '../../codecs/src/index'
import { parseArgs, type CliOptions } from './args'
import { convertFile, readInput } from './convert'
import { describeAudio, describeUpd7759, formatBytes } from './report'

const VERSION = '0.1.0'

const HELP = `
pcm2upd - UPD7759 ADPCM encoder

USAGE:
  pcm2upd [-i <input>] [-o <output>]   Encode (stdin/stdout when omitted)
  pcm2upd <input> [output]             Same, with positional paths
  pcm2upd --info <file>                Show stream info

INPUT:
  WAV, AIFF or AU; mono, 16-bit PCM, sampled at 5000, 6000 or 8000 Hz

OPTIONS:
  -i, --input <path>    Input file ("-" for standard input)
  -o, --output <path>   Output file ("-" for standard output)
  -v, --verbose         Print the input stream report
  -q, --quiet           Suppress the -v report
  --info                Describe an audio file or UPD7759 stream
  -h, --help            Show this help
  -V, --version         Show version

EXAMPLES:
  pcm2upd -i hello.wav -o hello.upd
  pcm2upd -v < prompt.aiff > prompt.upd
  pcm2upd --info hello.upd
`

function fail(message: string): never {
	console.error(`Sorry :( -- ${message}`)
	process.exit(1)
}

async function showInfo(options: CliOptions): Promise<void> {
	const data = await readInput(options.input)
	const source = options.input ?? 'standard input'

	const reader = findReader(data)
	let lines: string[]
	if (reader) {
		lines = describeAudio(reader.getInfo(data))
	} else if (isUpd7759(data)) {
		lines = describeUpd7759(parseUpd7759Info(data), data.length)
	} else {
		throw new InvalidInputError('Unknown audio format')
	}

	console.log(`\nSource:         ${source}`)
	for (const line of lines) console.log(line)
	console.log()
}

async function encode(options: CliOptions): Promise<void> {
	// Reports go to stderr when stdout carries the stream
	const log = options.output === undefined ? console.error : console.log

	const result = await convertFile({ input: options.input, output: options.output })
	if (!result.success) {
		fail(result.error)
	}

	if (options.verbose && !options.quiet) {
		for (const line of describeAudio(result.audio.info)) log(line)
		log(`${'Output:'.padEnd(16)}${formatBytes(result.output.length)} -> ${options.output ?? 'standard output'}`)
	}
}

async function main(): Promise<void> {
	const options = parseArgs(process.argv.slice(2))

	if (options.help) {
		console.log(HELP)
		return
	}

	if (options.version) {
		console.log(`pcm2upd v${VERSION}`)
		return
	}

	if (options.info) {
		await showInfo(options)
		return
	}

	await encode(options)
}

main().catch((err: unknown) => {
	fail(errorMessage(err))
})
