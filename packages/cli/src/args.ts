import { InvalidInputError } from '../../core/src/index'

export interface CliOptions {
	// Paths (standard input/output when absent)
	input?: string
	output?: string

	// Flags
	verbose?: boolean
	quiet?: boolean

	// Commands
	info?: boolean
	help?: boolean
	version?: boolean
}

/**
 * Parse command-line arguments
 * Bare arguments fill input, then output, when -i/-o are not given
 */
export function parseArgs(args: string[]): CliOptions {
	const options: CliOptions = {}
	const positional: string[] = []

	let i = 0
	while (i < args.length) {
		const arg = args[i]!

		if (arg === '--help' || arg === '-h' || arg === '-?') {
			options.help = true
		} else if (arg === '--version' || arg === '-V') {
			options.version = true
		} else if (arg === '--info') {
			options.info = true
		} else if (arg === '--verbose' || arg === '-v') {
			options.verbose = true
		} else if (arg === '--quiet' || arg === '-q') {
			options.quiet = true
		} else if (arg === '--input' || arg === '-i') {
			options.input = requireValue(args, ++i, arg)
		} else if (arg === '--output' || arg === '-o') {
			options.output = requireValue(args, ++i, arg)
		} else if (arg === '-' || !arg.startsWith('-')) {
			positional.push(arg)
		} else {
			throw new InvalidInputError(`Unknown option: ${arg}`)
		}

		i++
	}

	for (const value of positional) {
		if (options.input === undefined) {
			options.input = value
		} else if (options.output === undefined) {
			options.output = value
		} else {
			throw new InvalidInputError(`Unexpected argument: ${value}`)
		}
	}

	// "-" selects the standard stream
	if (options.input === '-') delete options.input
	if (options.output === '-') delete options.output

	return options
}

function requireValue(args: string[], index: number, flag: string): string {
	const value = args[index]
	if (value === undefined || value === '') {
		throw new InvalidInputError(`Option ${flag} requires a path`)
	}
	return value
}
