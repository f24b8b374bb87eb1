import { describe, expect, it } from 'vitest'
import { parseArgs } from './args'

describe('parseArgs', () => {
	it('collects positional directories', () => {
		expect(parseArgs(['icons', 'out'])).toEqual({ inputs: ['icons', 'out'], options: {} })
	})

	it('reads flags and quality', () => {
		expect(parseArgs(['-q', '80', '--dry-run', '-v', 'in', '--quiet'])).toEqual({
			inputs: ['in'],
			options: { quality: 80, dryRun: true, verbose: true, quiet: true },
		})
	})

	it('rejects unknown options', () => {
		expect(() => parseArgs(['--resize', '10'])).toThrow('Unknown option: --resize')
	})

	it('rejects out-of-range quality', () => {
		expect(() => parseArgs(['--quality', '0'])).toThrow('Quality must be an integer from 1 to 100 (got 0)')
		expect(() => parseArgs(['--quality', '9x'])).toThrow('Quality must be an integer from 1 to 100 (got 9x)')
	})

	it('reports a quality flag with no value', () => {
		expect(() => parseArgs(['in', 'out', '-q'])).toThrow('Missing value for -q')
		expect(() => parseArgs(['--quality'])).toThrow('Missing value for --quality')
	})
})
