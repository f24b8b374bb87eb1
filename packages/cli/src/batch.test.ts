import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { decodeIco, decodePng, encodeIco, encodePng } from '@lumaflip/codecs'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { planJobs, processFile, runBatch, walk } from './batch'

const black = { width: 1, height: 1, data: new Uint8Array([0, 0, 0, 255]) }

let root: string
let inputDir: string
let outputDir: string

beforeEach(() => {
	root = mkdtempSync(join(tmpdir(), 'lumaflip-'))
	inputDir = join(root, 'in')
	outputDir = join(root, 'out')
	mkdirSync(join(inputDir, 'sub'), { recursive: true })

	writeFileSync(join(inputDir, 'a.svg'), '<svg xmlns="http://www.w3.org/2000/svg" fill="#000"/>')
	writeFileSync(join(inputDir, 'bad.png'), 'not a png')
	writeFileSync(join(inputDir, 'notes.txt'), 'hello')
	writeFileSync(join(inputDir, 'sub', 'b.PNG'), encodePng(black))
	writeFileSync(join(inputDir, 'sub', 'c.ico'), encodeIco([black]))
})

afterEach(() => {
	rmSync(root, { recursive: true, force: true })
})

describe('planJobs', () => {
	it('mirrors relative paths and tags kinds', () => {
		const jobs = planJobs(inputDir, outputDir)
		expect(jobs).toEqual([
			{ input: join(inputDir, 'a.svg'), output: join(outputDir, 'a.svg'), kind: 'svg' },
			{ input: join(inputDir, 'bad.png'), output: join(outputDir, 'bad.png'), kind: 'png' },
			{ input: join(inputDir, 'notes.txt'), output: join(outputDir, 'notes.txt'), kind: null },
			{ input: join(inputDir, 'sub', 'b.PNG'), output: join(outputDir, 'sub', 'b.PNG'), kind: 'png' },
			{ input: join(inputDir, 'sub', 'c.ico'), output: join(outputDir, 'sub', 'c.ico'), kind: 'ico' },
		])
	})

	it('does not walk into an output directory nested in the input', () => {
		const nested = join(inputDir, 'inverted')
		mkdirSync(nested)
		writeFileSync(join(nested, 'old.svg'), '<svg/>')

		expect(walk(inputDir, nested)).not.toContain(join(nested, 'old.svg'))
		expect(planJobs(inputDir, nested).map((job) => job.input)).not.toContain(join(nested, 'old.svg'))
	})
})

describe('runBatch', () => {
	it('writes inverted files and counts every outcome', () => {
		const seen: string[] = []
		const summary = runBatch(planJobs(inputDir, outputDir), {}, (result) => seen.push(result.status))

		expect(seen).toEqual(['inverted', 'failed', 'skipped', 'inverted', 'inverted'])
		expect(summary).toMatchObject({ inverted: 3, skipped: 1, failed: 1 })

		expect(readFileSync(join(outputDir, 'a.svg'), 'utf8')).toBe(
			'<svg xmlns="http://www.w3.org/2000/svg" fill="#FFFFFF"/>'
		)
		const png = decodePng(new Uint8Array(readFileSync(join(outputDir, 'sub', 'b.PNG'))))
		expect(Array.from(png.image.data)).toEqual([255, 255, 255, 255])
		const [icon] = decodeIco(new Uint8Array(readFileSync(join(outputDir, 'sub', 'c.ico'))))
		expect(Array.from(icon?.image.data ?? [])).toEqual([255, 255, 255, 255])

		expect(existsSync(join(outputDir, 'notes.txt'))).toBe(false)
		expect(existsSync(join(outputDir, 'bad.png'))).toBe(false)
	})
})

describe('processFile', () => {
	it('reports the failure of an unreadable input', () => {
		const result = processFile({ input: join(inputDir, 'missing.svg'), output: join(outputDir, 'x.svg'), kind: 'svg' })
		expect(result.status).toBe('failed')
	})

	it('explains a failed decode', () => {
		const result = processFile({ input: join(inputDir, 'bad.png'), output: join(outputDir, 'bad.png'), kind: 'png' })
		expect(result).toMatchObject({ status: 'failed', error: 'Invalid PNG signature' })
	})
})
