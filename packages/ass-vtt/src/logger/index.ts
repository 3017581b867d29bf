import { converterConfig } from '../config/env'
import { formatConsole, formatSimple } from './formatters'
import type { LogCategory, LogEntry, LogLevel } from './types'

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error']

class Logger {
	private logLevel: LogLevel = converterConfig.logLevel

	private shouldLog(level: LogLevel): boolean {
		const currentLevelIndex = LEVELS.indexOf(this.logLevel)
		const messageLevelIndex = LEVELS.indexOf(level)
		return messageLevelIndex >= currentLevelIndex
	}

	private createLogEntry(
		level: LogLevel,
		category: LogCategory,
		message: string,
	): LogEntry {
		return {
			timestamp: new Date().toISOString(),
			level,
			category,
			message,
		}
	}

	private log(level: LogLevel, category: LogCategory, message: string): void {
		if (!this.shouldLog(level)) return

		const entry = this.createLogEntry(level, category, message)
		const formattedMessage =
			process.env.NODE_ENV === 'production'
				? formatSimple(entry)
				: formatConsole(entry)

		switch (level) {
			case 'debug':
				console.debug(formattedMessage)
				break
			case 'info':
				console.info(formattedMessage)
				break
			case 'warn':
				console.warn(formattedMessage)
				break
			case 'error':
				console.error(formattedMessage)
				break
		}
	}

	debug(category: LogCategory, message: string): void {
		this.log('debug', category, message)
	}

	info(category: LogCategory, message: string): void {
		this.log('info', category, message)
	}

	warn(category: LogCategory, message: string): void {
		this.log('warn', category, message)
	}

	error(category: LogCategory, message: string): void {
		this.log('error', category, message)
	}

	setLevel(level: LogLevel): void {
		this.logLevel = level
	}

	getLevel(): LogLevel {
		return this.logLevel
	}
}

export const logger = new Logger()
export type { Logger }
export type { LogCategory, LogEntry, LogLevel } from './types'
