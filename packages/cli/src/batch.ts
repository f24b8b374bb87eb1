/**
 * Directory traversal and per-file inversion for the lumaflip command
 */

import { mkdirSync, readFileSync, readdirSync, writeFileSync } from 'node:fs'
import { dirname, join, relative, resolve, sep } from 'node:path'
import { invertAsset } from '@lumaflip/codecs'
import { type AssetKind, type Diagnostic, assetKindFromPath, errorMessage } from '@lumaflip/core'

export interface InvertJob {
	input: string
	output: string
	/** Null when the extension is not one the inverter handles */
	kind: AssetKind | null
}

export type FileResult =
	| { status: 'inverted'; job: InvertJob; diagnostics: Diagnostic[] }
	| { status: 'skipped'; job: InvertJob; reason: string }
	| { status: 'failed'; job: InvertJob; error: string; diagnostics: Diagnostic[] }

export interface BatchOptions {
	/** JPEG re-encode quality */
	quality?: number
}

export interface BatchSummary {
	inverted: number
	skipped: number
	failed: number
	results: FileResult[]
}

/**
 * Every regular file under `dir`, sorted, skipping the subtree at `exclude`
 */
export function walk(dir: string, exclude?: string): string[] {
	const results: string[] = []

	function visit(current: string): void {
		for (const entry of readdirSync(current, { withFileTypes: true })) {
			const fullPath = join(current, entry.name)
			if (entry.isDirectory()) {
				if (exclude && resolve(fullPath) === exclude) continue
				visit(fullPath)
			} else if (entry.isFile()) {
				results.push(fullPath)
			}
		}
	}

	visit(dir)
	return results.sort()
}

/**
 * Map every file under the input directory to the same relative path under the output directory
 */
export function planJobs(inputDir: string, outputDir: string): InvertJob[] {
	const inputRoot = resolve(inputDir)
	const outputRoot = resolve(outputDir)
	const nested = outputRoot.startsWith(inputRoot + sep)

	return walk(inputRoot, nested ? outputRoot : undefined).map((input) => ({
		input,
		output: join(outputRoot, relative(inputRoot, input)),
		kind: assetKindFromPath(input),
	}))
}

/**
 * Invert one file and write the result; never throws
 */
export function processFile(job: InvertJob, options: BatchOptions = {}): FileResult {
	if (!job.kind) {
		return { status: 'skipped', job, reason: 'unsupported file type' }
	}

	let diagnostics: Diagnostic[] = []
	try {
		const data = new Uint8Array(readFileSync(job.input))
		const result = invertAsset(data, job.kind, { quality: options.quality })
		diagnostics = result.diagnostics
		if (!result.ok) {
			return { status: 'failed', job, error: result.message, diagnostics }
		}

		mkdirSync(dirname(job.output), { recursive: true })
		writeFileSync(job.output, result.data)
		return { status: 'inverted', job, diagnostics }
	} catch (err) {
		return { status: 'failed', job, error: errorMessage(err), diagnostics }
	}
}

/**
 * Process jobs in order; one bad file never stops the rest
 */
export function runBatch(
	jobs: readonly InvertJob[],
	options: BatchOptions = {},
	onResult?: (result: FileResult) => void
): BatchSummary {
	const summary: BatchSummary = { inverted: 0, skipped: 0, failed: 0, results: [] }

	for (const job of jobs) {
		const result = processFile(job, options)
		summary[result.status]++
		summary.results.push(result)
		onResult?.(result)
	}

	return summary
}
