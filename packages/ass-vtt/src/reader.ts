/**
 * Encoding-aware subtitle file reader
 */

import { readFile } from 'node:fs/promises'
import { TextDecoder } from 'node:util'
import { ENCODING_CONSTANTS } from './config/constants'
import { converterConfig } from './config/env'
import { AssParsingError, describeError } from './errors'
import { logger } from './logger'

const BOM = '\uFEFF'

function decoderFor(encoding: string, bytes: Uint8Array): TextDecoder {
	switch (encoding.toLowerCase()) {
		case 'utf-8-sig':
		case 'utf8-sig':
			return new TextDecoder('utf-8', { fatal: true, ignoreBOM: false })
		case 'utf-8':
		case 'utf8':
			return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true })
		case 'utf-16':
		case 'utf16': {
			const bigEndian = bytes.length >= 2 && bytes[0] === 0xfe && bytes[1] === 0xff
			return new TextDecoder(bigEndian ? 'utf-16be' : 'utf-16le', { fatal: true })
		}
		default:
			return new TextDecoder(encoding, { fatal: true })
	}
}

export function encodingPriority(encoding?: string): string[] {
	if (encoding) return [encoding]
	return converterConfig.encodings ?? [...ENCODING_CONSTANTS.DEFAULT_PRIORITY]
}

/**
 * Decode with the first encoding that succeeds. Throws `AssParsingError` when none does.
 */
export function decodeSubtitleBuffer(
	bytes: Uint8Array,
	encoding?: string,
	source = 'input',
): string {
	const candidates = encodingPriority(encoding)

	for (const candidate of candidates) {
		try {
			const text = decoderFor(candidate, bytes).decode(bytes)
			logger.debug('io', `Decoded ${source} using encoding: ${candidate}`)
			return text.startsWith(BOM) ? text.slice(1) : text
		} catch (error) {
			logger.debug('io', `Failed to decode ${source} with ${candidate}: ${describeError(error)}`)
		}
	}

	throw new AssParsingError(
		`Could not decode ${source} with any of the tried encodings: ${candidates.join(', ')}`,
	)
}

function isMissingFileError(error: unknown): boolean {
	return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

export async function readSubtitleFile(filePath: string, encoding?: string): Promise<string> {
	let bytes: Uint8Array
	try {
		bytes = await readFile(filePath)
	} catch (error) {
		if (isMissingFileError(error)) {
			logger.error('io', `ASS file not found: ${filePath}`)
			throw new AssParsingError(`File not found: ${filePath}`, { cause: error })
		}
		throw new AssParsingError(`Could not read file ${filePath}: ${describeError(error)}`, {
			cause: error,
		})
	}
	logger.debug('io', `Read ${bytes.length} bytes from ${filePath}`)
	return decodeSubtitleBuffer(bytes, encoding, filePath)
}
