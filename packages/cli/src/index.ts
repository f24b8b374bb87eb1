#!/usr/bin/env tsx
/**
 * lumaflip CLI - invert the lightness of every asset in a directory tree
 */

import { existsSync, statSync } from 'node:fs'
import { basename, relative, resolve } from 'node:path'
import { createInterface } from 'node:readline/promises'
import { errorMessage } from '@lumaflip/core'
import { type CliOptions, HELP, VERSION, parseArgs } from './args'
import { type FileResult, planJobs, runBatch } from './batch'

async function prompt(question: string): Promise<string> {
	const rl = createInterface({ input: process.stdin, output: process.stdout })
	try {
		return (await rl.question(question)).trim()
	} finally {
		rl.close()
	}
}

async function promptPath(question: string): Promise<string> {
	const answer = await prompt(question)
	if (!answer) {
		throw new Error('A directory is required')
	}
	return answer
}

function report(result: FileResult, inputDir: string, options: CliOptions): void {
	const name = relative(inputDir, result.job.input)

	switch (result.status) {
		case 'inverted':
			if (!options.quiet) {
				console.log(`${name} → ${basename(result.job.output)}`)
			}
			break
		case 'skipped':
			if (!options.quiet) {
				console.error(`Skip: ${name} (${result.reason})`)
			}
			break
		case 'failed':
			console.error(`Failed: ${name}: ${result.error}`)
			break
	}

	if (options.verbose && !options.quiet && result.status !== 'skipped') {
		for (const diagnostic of result.diagnostics) {
			const where = diagnostic.entry === undefined ? '' : ` [entry ${diagnostic.entry}]`
			console.error(`       ${diagnostic.code}${where}: ${diagnostic.message}`)
		}
	}
}

async function main(): Promise<void> {
	const { inputs, options } = parseArgs(process.argv.slice(2))

	if (options.help) {
		console.log(HELP)
		return
	}

	if (options.version) {
		console.log(`lumaflip v${VERSION}`)
		return
	}

	const inputDir = resolve(inputs[0] ?? (await promptPath('Input directory: ')))
	const outputDir = resolve(inputs[1] ?? (await promptPath('Output directory: ')))

	if (!existsSync(inputDir) || !statSync(inputDir).isDirectory()) {
		console.error(`Not a directory: ${inputDir}`)
		process.exit(1)
	}
	if (inputDir === outputDir) {
		console.error('Output directory must differ from the input directory')
		process.exit(1)
	}

	const jobs = planJobs(inputDir, outputDir)

	if (jobs.length === 0) {
		console.log('No files to invert')
		return
	}

	if (options.dryRun) {
		console.log('\nDry run - would invert:\n')
		for (const job of jobs) {
			console.log(`  ${job.input}`)
			console.log(job.kind ? `  → ${job.output} (${job.kind})\n` : '  → skipped (unsupported file type)\n')
		}
		return
	}

	const summary = runBatch(jobs, { quality: options.quality }, (result) =>
		report(result, inputDir, options)
	)

	if (!options.quiet) {
		console.log(`\nDone: ${summary.inverted} inverted, ${summary.skipped} skipped, ${summary.failed} failed`)
	}

	if (summary.failed > 0) {
		process.exit(1)
	}
}

main().catch((err) => {
	console.error(`Error: ${errorMessage(err)}`)
	process.exit(1)
})
