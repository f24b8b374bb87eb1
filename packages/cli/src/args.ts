export interface CliOptions {
	quality?: number
	verbose?: boolean
	quiet?: boolean
	dryRun?: boolean
	help?: boolean
	version?: boolean
}

export const VERSION = '0.1.0'

export const HELP = `
lumaflip - Invert the lightness of icons, images and SVGs, keeping hue and saturation

USAGE:
  lumaflip <input-dir> <output-dir>   Invert every supported file under input-dir
  lumaflip                            Prompt for both directories

Files are written to the same relative path under output-dir.
Supported: .svg .ico .png .jpg .jpeg .bmp

OPTIONS:
  -q, --quality <1-100> JPEG re-encode quality (default 95)
  --dry-run             List what would be written without writing
  -v, --verbose         Print per-file diagnostics
  --quiet               Print errors only
  --help                Show this help
  --version             Show version
`

export function parseArgs(args: string[]): { inputs: string[]; options: CliOptions } {
	const inputs: string[] = []
	const options: CliOptions = {}

	let i = 0
	while (i < args.length) {
		const arg = args[i]!

		if (arg === '--help' || arg === '-?') {
			options.help = true
		} else if (arg === '--version' || arg === '-V') {
			options.version = true
		} else if (arg === '--verbose' || arg === '-v') {
			options.verbose = true
		} else if (arg === '--quiet') {
			options.quiet = true
		} else if (arg === '--dry-run') {
			options.dryRun = true
		} else if (arg === '--quality' || arg === '-q') {
			const value = args[++i]
			if (value === undefined) throw new Error(`Missing value for ${arg}`)
			options.quality = parseQuality(value)
		} else if (!arg.startsWith('-')) {
			inputs.push(arg)
		} else {
			throw new Error(`Unknown option: ${arg}`)
		}

		i++
	}

	return { inputs, options }
}

function parseQuality(value: string): number {
	const quality = Number.parseInt(value, 10)
	if (!/^\d+$/.test(value) || quality < 1 || quality > 100) {
		throw new Error(`Quality must be an integer from 1 to 100 (got ${value})`)
	}
	return quality
}
