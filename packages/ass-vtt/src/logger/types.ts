export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogCategory =
	| 'parser'
	| 'styles'
	| 'tags'
	| 'cues'
	| 'io'
	| 'convert'

export interface LogEntry {
	timestamp: string
	level: LogLevel
	category: LogCategory
	message: string
}
