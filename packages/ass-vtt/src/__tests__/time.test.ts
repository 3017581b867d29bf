import { describe, expect, it } from 'vitest'
import { formatNumber, formatPercent } from '../utils/format'
import { formatCueTimestamp, parseAssTimestamp } from '../utils/time'

describe('parseAssTimestamp', () => {
	it('parses centisecond timestamps', () => {
		expect(parseAssTimestamp('0:00:01.00')).toBe(1000)
		expect(parseAssTimestamp('1:02:03.45')).toBe(3723450)
	})

	it('reads the fraction as a decimal', () => {
		expect(parseAssTimestamp('0:00:00.5')).toBe(500)
		expect(parseAssTimestamp('0:00:00.05')).toBe(50)
		expect(parseAssTimestamp('0:00:00.1234')).toBe(123)
	})

	it('accepts missing fractions and multi-digit hours', () => {
		expect(parseAssTimestamp('0:00:07')).toBe(7000)
		expect(parseAssTimestamp('10:00:00.12')).toBe(36000120)
	})

	it('returns null for malformed input', () => {
		expect(parseAssTimestamp('')).toBeNull()
		expect(parseAssTimestamp('abc')).toBeNull()
		expect(parseAssTimestamp('00:01.00')).toBeNull()
	})
})

describe('formatCueTimestamp', () => {
	it('formats milliseconds as HH:MM:SS.mmm', () => {
		expect(formatCueTimestamp(0)).toBe('00:00:00.000')
		expect(formatCueTimestamp(3723450)).toBe('01:02:03.450')
		expect(formatCueTimestamp(36000120)).toBe('10:00:00.120')
	})

	it('clamps negative values to zero', () => {
		expect(formatCueTimestamp(-20)).toBe('00:00:00.000')
	})
})

describe('number formatting', () => {
	it('trims trailing zeros and rounds to two decimals', () => {
		expect(formatNumber(2)).toBe('2')
		expect(formatNumber(1.5)).toBe('1.5')
		expect(formatNumber(4.1666)).toBe('4.17')
		expect(formatPercent(95)).toBe('95%')
	})
})
