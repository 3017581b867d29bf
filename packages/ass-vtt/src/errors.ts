export const ASS_PARSE_FAILED_CODE = 'ASS_PARSE_FAILED' as const
export const VTT_GENERATION_FAILED_CODE = 'VTT_GENERATION_FAILED' as const

export type AssConverterErrorCode =
	| typeof ASS_PARSE_FAILED_CODE
	| typeof VTT_GENERATION_FAILED_CODE

/**
 * Base class for the two failures callers are expected to abort on.
 *
 * - `code` is stable so callers can map it without matching messages.
 * - Everything else in the pipeline is recoverable and only logged.
 */
export class AssConverterError extends Error {
	readonly code: AssConverterErrorCode

	constructor(
		code: AssConverterErrorCode,
		message: string,
		options?: { cause?: unknown },
	) {
		super(message, options)
		this.name = 'AssConverterError'
		this.code = code
	}
}

/** Input is unreadable: missing file, undecodable bytes or no sections at all. */
export class AssParsingError extends AssConverterError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(ASS_PARSE_FAILED_CODE, message, options)
		this.name = 'AssParsingError'
	}
}

/** Unexpected fault while serialising an otherwise valid document. */
export class VttConversionError extends AssConverterError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(VTT_GENERATION_FAILED_CODE, message, options)
		this.name = 'VttConversionError'
	}
}

export function isAssConverterError(err: unknown): err is AssConverterError {
	return err instanceof AssConverterError
}

export function describeError(err: unknown): string {
	return err instanceof Error ? err.message : String(err)
}
