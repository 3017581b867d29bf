// Environment-backed settings for the converter. Only what the package actually reads.
import { z } from 'zod'

export const LOG_LEVEL_VALUES = ['debug', 'info', 'warn', 'error'] as const

const envSchema = z.object({
	NODE_ENV: z.string().optional(),
	ASS_VTT_LOG_LEVEL: z.enum(LOG_LEVEL_VALUES).optional(),
	// Comma-separated decode priority list, e.g. "utf-8-sig,windows-1250,utf-16"
	ASS_VTT_ENCODINGS: z.string().optional(),
})

export type ConverterEnv = z.infer<typeof envSchema>

export interface ConverterConfig {
	logLevel: (typeof LOG_LEVEL_VALUES)[number]
	encodings: string[] | null
}

export function resolveConverterConfig(
	env: Record<string, string | undefined> = process.env,
): ConverterConfig {
	const parsed = envSchema.safeParse(env)
	// A malformed variable falls back to defaults instead of breaking imports.
	const values: ConverterEnv = parsed.success
		? parsed.data
		: { NODE_ENV: env.NODE_ENV }

	const encodings = (values.ASS_VTT_ENCODINGS || '')
		.split(',')
		.map((s) => s.trim())
		.filter(Boolean)

	return {
		logLevel:
			values.ASS_VTT_LOG_LEVEL ??
			(values.NODE_ENV === 'production' ? 'info' : 'debug'),
		encodings: encodings.length > 0 ? encodings : null,
	}
}

export const converterConfig = resolveConverterConfig()
