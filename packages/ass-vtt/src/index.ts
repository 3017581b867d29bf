import { writeFile } from 'node:fs/promises'
import { z } from 'zod'
import { ENCODING_CONSTANTS } from './config/constants'
import { assembleVtt } from './cues'
import {
	AssParsingError,
	VttConversionError,
	describeError,
	isAssConverterError,
} from './errors'
import { logger } from './logger'
import { parseAssDocument } from './parser'
import { readSubtitleFile } from './reader'
import type { AssDocument, ResolutionHints } from './types'

export * from './alignment'
export * from './config/constants'
export { resolveConverterConfig } from './config/env'
export type { ConverterConfig } from './config/env'
export * from './cues'
export * from './errors'
export { logger } from './logger'
export type { LogCategory, LogEntry, LogLevel, Logger } from './logger'
export * from './parser'
export * from './reader'
export * from './styles'
export * from './tags'
export type * from './types'
export { assColorToCss } from './utils/color'
export { formatCueTimestamp, parseAssTimestamp } from './utils/time'

const resolutionSchema = z.number().int().nonnegative().optional()

const stringOptionsSchema = z.object({
	playResX: resolutionSchema,
	playResY: resolutionSchema,
})

const fileOptionsSchema = z.object({
	encoding: z.string().trim().min(1).optional(),
})

const fileOutputOptionsSchema = fileOptionsSchema.extend({
	outputEncoding: z
		.custom<BufferEncoding>((value) => typeof value === 'string' && Buffer.isEncoding(value), {
			message: 'Unsupported output encoding',
		})
		.optional(),
})

export type ConvertStringOptions = ResolutionHints
export type ConvertFileOptions = z.infer<typeof fileOptionsSchema>
export type ConvertFileToFileOptions = z.infer<typeof fileOutputOptionsSchema>

// Bad options are reported and dropped; they never abort a conversion.
function readOptions<T extends z.ZodTypeAny>(
	schema: T,
	options: unknown,
	fallback: z.infer<T>,
): z.infer<T> {
	const parsed = schema.safeParse(options ?? {})
	if (parsed.success) return parsed.data
	const issues = parsed.error.issues
		.map((issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`)
		.join('; ')
	logger.warn('convert', `Ignoring invalid conversion options (${issues})`)
	return fallback
}

function parseOrWrap(content: string, hints: ResolutionHints, source: string): AssDocument {
	try {
		return parseAssDocument(content, hints)
	} catch (error) {
		if (isAssConverterError(error)) throw error
		logger.error('convert', `Unexpected error parsing ${source}: ${describeError(error)}`)
		throw new AssParsingError(`Unexpected error parsing ${source}: ${describeError(error)}`, {
			cause: error,
		})
	}
}

function generateOrWrap(document: AssDocument, source: string): string {
	try {
		return assembleVtt(document)
	} catch (error) {
		logger.error('convert', `Unexpected error generating VTT from ${source}: ${describeError(error)}`)
		throw new VttConversionError(`Unexpected error generating VTT: ${describeError(error)}`, {
			cause: error,
		})
	}
}

/**
 * Convert in-memory ASS/SSA text. `playResX`/`playResY` are used only when the
 * script does not declare a readable resolution itself.
 */
export function convertAssStringToVtt(content: string, options: ConvertStringOptions = {}): string {
	const hints = readOptions(stringOptionsSchema, options, {})
	const document = parseOrWrap(content, hints, 'string input')
	return generateOrWrap(document, 'string input')
}

export async function convertAssFileToVtt(
	inputPath: string,
	options: ConvertFileOptions = {},
): Promise<string> {
	const { encoding } = readOptions(fileOptionsSchema, options, {})
	const content = await readSubtitleFile(inputPath, encoding)
	const document = parseOrWrap(content, {}, inputPath)
	const vtt = generateOrWrap(document, inputPath)
	logger.info('convert', `Converted ${inputPath} (${document.events.length} events)`)
	return vtt
}

/**
 * Convert `inputPath` and write the result to `outputPath` (UTF-8 unless told otherwise).
 */
export async function convertAssFileToVttFile(
	inputPath: string,
	outputPath: string,
	options: ConvertFileToFileOptions = {},
): Promise<void> {
	const { encoding, outputEncoding } = readOptions(fileOutputOptionsSchema, options, {})
	const vtt = await convertAssFileToVtt(inputPath, { encoding })

	try {
		await writeFile(outputPath, vtt, {
			encoding: outputEncoding ?? ENCODING_CONSTANTS.OUTPUT_ENCODING,
		})
	} catch (error) {
		logger.error('io', `Could not write output file ${outputPath}: ${describeError(error)}`)
		throw new VttConversionError(`Could not write output file ${outputPath}`, { cause: error })
	}
	logger.debug('io', `Saved WebVTT file: ${outputPath}`)
}

export default {
	convertAssStringToVtt,
	convertAssFileToVtt,
	convertAssFileToVttFile,
	parseAssDocument,
	assembleVtt,
	readSubtitleFile,
}
