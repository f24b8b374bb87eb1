import type { Diagnostic } from '@lumaflip/core'
import { parseIco } from './parser'
import { recoverIco } from './recover'
import { repairIco } from './repair'
import { transformIco } from './transform'
import type { IconDir, IconDirEntry, ProcessOptions, ProcessResult, Recovery } from './types'

type Stage =
	| { name: 'parse'; data: Uint8Array; recovery: 'none' | 'repaired' }
	| { name: 'repair' }
	| { name: 'transform'; data: Uint8Array; header: IconDir; entries: IconDirEntry[]; recovery: Recovery }
	| { name: 'last-resort' }
	| { name: 'done'; result: ProcessResult }

/**
 * Invert one icon file.
 * Runs parse, then repair when the directory is unusable, then the entry
 * transform; if nothing yields a directory, the file is decoded as a plain
 * image. Never throws.
 */
export function processIco(input: Uint8Array, options: ProcessOptions = {}): ProcessResult {
	const diagnostics: Diagnostic[] = []
	let stage: Stage = { name: 'parse', data: input, recovery: 'none' }

	for (;;) {
		switch (stage.name) {
			case 'parse': {
				const parsed = parseIco(stage.data)
				diagnostics.push(...parsed.diagnostics)
				if (parsed.status === 'valid') {
					stage = {
						name: 'transform',
						data: stage.data,
						header: parsed.header,
						entries: parsed.entries,
						recovery: stage.recovery,
					}
				} else {
					// A repaired container that still fails to parse is not repaired again
					stage = stage.recovery === 'none' ? { name: 'repair' } : { name: 'last-resort' }
				}
				break
			}

			case 'repair': {
				const repaired = repairIco(input)
				diagnostics.push(...repaired.diagnostics)
				stage = repaired.ok
					? { name: 'parse', data: repaired.data, recovery: 'repaired' }
					: { name: 'last-resort' }
				break
			}

			case 'transform': {
				const transformed = transformIco(stage.data, stage.header, stage.entries, options)
				diagnostics.push(...transformed.diagnostics)
				stage = {
					name: 'done',
					result: { ok: true, data: transformed.data, recovery: stage.recovery, diagnostics },
				}
				break
			}

			case 'last-resort': {
				const recovered = recoverIco(input, options)
				diagnostics.push(...recovered.diagnostics)
				if (recovered.ok) {
					stage = {
						name: 'done',
						result: { ok: true, data: recovered.data, recovery: 'last-resort', diagnostics },
					}
				} else {
					diagnostics.push({
						code: 'Unprocessable',
						message: 'File is neither a usable icon nor a decodable image',
					})
					stage = { name: 'done', result: { ok: false, error: 'Unprocessable', diagnostics } }
				}
				break
			}

			case 'done':
				return stage.result
		}
	}
}

/**
 * Bytes in, bytes out: the transformed container, or null when the file is unprocessable
 */
export function processBuffer(input: Uint8Array, options?: ProcessOptions): Uint8Array | null {
	const result = processIco(input, options)
	return result.ok ? result.data : null
}
