/**
 * Timestamp helpers
 * ASS uses H:MM:SS.CC (centiseconds), WebVTT HH:MM:SS.mmm.
 */

const ASS_TIMESTAMP_FORMAT = /^(\d+):(\d{1,2}):(\d{1,2})(?:\.(\d+))?$/

/**
 * Parse an ASS timestamp into milliseconds, or null when malformed.
 * The fraction is read as a decimal, so ".5" is 500ms and ".05" is 50ms.
 */
export function parseAssTimestamp(value: string): number | null {
	const match = value.trim().match(ASS_TIMESTAMP_FORMAT)
	if (!match) return null
	const [, hours, minutes, seconds, fraction = ''] = match

	const ms = fraction ? Number.parseInt(fraction.slice(0, 3).padEnd(3, '0'), 10) : 0

	return (
		(Number.parseInt(hours, 10) * 3600 +
			Number.parseInt(minutes, 10) * 60 +
			Number.parseInt(seconds, 10)) *
			1000 +
		ms
	)
}

export function formatCueTimestamp(totalMs: number): string {
	const safeMs = Math.max(0, Math.round(totalMs))
	const hours = Math.floor(safeMs / 3600000)
	const minutes = Math.floor((safeMs % 3600000) / 60000)
	const secs = Math.floor((safeMs % 60000) / 1000)
	const ms = safeMs % 1000

	return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}:${String(secs).padStart(2, '0')}.${String(ms).padStart(3, '0')}`
}
