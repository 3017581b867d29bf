import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterAll, beforeAll, describe, expect, it } from 'vitest'
import { AssParsingError } from '../errors'
import { decodeSubtitleBuffer, encodingPriority, readSubtitleFile } from '../reader'

describe('decodeSubtitleBuffer', () => {
	it('strips a UTF-8 byte order mark', () => {
		const bytes = new Uint8Array([0xef, 0xbb, 0xbf, ...new TextEncoder().encode('Zażółć')])
		expect(decodeSubtitleBuffer(bytes)).toBe('Zażółć')
	})

	it('falls through to UTF-16 little endian', () => {
		const bytes = new Uint8Array([0xff, 0xfe, 0x48, 0x00, 0x69, 0x00])
		expect(decodeSubtitleBuffer(bytes)).toBe('Hi')
	})

	it('honours a big-endian UTF-16 byte order mark', () => {
		const bytes = new Uint8Array([0xfe, 0xff, 0x00, 0x48, 0x00, 0x69])
		expect(decodeSubtitleBuffer(bytes)).toBe('Hi')
	})

	it('tries only the explicit encoding when one is given', () => {
		const bytes = new Uint8Array([0x63, 0x61, 0x66, 0xe9])
		expect(decodeSubtitleBuffer(bytes, 'latin1')).toBe('café')
		expect(() => decodeSubtitleBuffer(bytes, 'utf-8')).toThrow(AssParsingError)
	})

	it('fails when every encoding fails', () => {
		expect(() => decodeSubtitleBuffer(new Uint8Array([0xff]))).toThrow(
			'Could not decode input with any of the tried encodings: utf-8-sig, utf-8, utf-16',
		)
	})

	it('treats an unknown encoding label as a failed attempt', () => {
		expect(() => decodeSubtitleBuffer(new Uint8Array([0x41]), 'no-such-encoding')).toThrow(
			AssParsingError,
		)
	})
})

describe('encodingPriority', () => {
	it('returns the explicit encoding alone', () => {
		expect(encodingPriority('utf-16')).toEqual(['utf-16'])
	})
})

describe('readSubtitleFile', () => {
	let dir = ''

	beforeAll(async () => {
		dir = await mkdtemp(join(tmpdir(), 'ass-vtt-reader-'))
	})

	afterAll(async () => {
		await rm(dir, { recursive: true, force: true })
	})

	it('reads and decodes a file', async () => {
		const file = join(dir, 'sample.ass')
		await writeFile(file, '\uFEFF[Script Info]\nTitle: test', 'utf8')
		await expect(readSubtitleFile(file)).resolves.toBe('[Script Info]\nTitle: test')
	})

	it('reports a missing file as a parse failure', async () => {
		const file = join(dir, 'missing.ass')
		await expect(readSubtitleFile(file)).rejects.toThrow(`File not found: ${file}`)
		await expect(readSubtitleFile(file)).rejects.toBeInstanceOf(AssParsingError)
	})
})
