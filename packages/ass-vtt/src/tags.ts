/**
 * Inline override tags
 *
 * Dialogue text interleaves literal runs with `{...}` override blocks. Each block
 * holds backslash-separated directives that are classified into a small tagged
 * union and then interpreted against two pieces of state: the running formatting
 * flags and the accumulated cue-setting overrides.
 */

import {
	legacyToNumpadAlignment,
	isValidAlignmentCode,
	mapAlignment,
} from './alignment'
import { ALIGNMENT_CONSTANTS } from './config/constants'
import { logger } from './logger'
import type { AssStyle, CueSettings, RenderContext, RenderedDialogue } from './types'
import { assColorToCss } from './utils/color'
import { formatPercent } from './utils/format'

export type FormattingFlag = 'bold' | 'italic' | 'underline'

export type FormattingState = Record<FormattingFlag, boolean>

export type Directive =
	| { kind: 'toggle'; raw: string; flag: FormattingFlag; enabled: boolean }
	| { kind: 'alignment'; raw: string; code: number }
	| { kind: 'position'; raw: string; x: number; y: number }
	| { kind: 'reset'; raw: string; styleName: string | null }
	| { kind: 'ignored'; raw: string; name: string; reason?: string }
	| { kind: 'unknown'; raw: string }

// Every directive name the renderers understand. Matching is by longest prefix,
// so `blur` wins over `b` and `fscx` over `fs`.
const KNOWN_DIRECTIVES = [
	'b', 'i', 'u', 's', 'r', 'a', 'an', 'pos', 'move', 'org',
	'c', '1c', '2c', '3c', '4c', 'alpha', '1a', '2a', '3a', '4a',
	'fn', 'fs', 'fscx', 'fscy', 'fsp', 'fe', 'fr', 'frx', 'fry', 'frz', 'fax', 'fay',
	'bord', 'xbord', 'ybord', 'shad', 'xshad', 'yshad', 'be', 'blur',
	'fad', 'fade', 't', 'k', 'K', 'kf', 'ko', 'kt', 'q', 'p', 'pbo', 'clip', 'iclip',
].sort((a, b) => b.length - a.length)

// Directives whose argument may start with a letter (font and style names)
const TEXT_ARGUMENT_DIRECTIVES = new Set(['fn', 'r'])

const FLAG_BY_DIRECTIVE: Record<string, FormattingFlag> = {
	b: 'bold',
	i: 'italic',
	u: 'underline',
}

// Outermost first
const TAG_ORDER: ReadonlyArray<readonly [FormattingFlag, string]> = [
	['underline', 'u'],
	['italic', 'i'],
	['bold', 'b'],
]

const POSITION_ARGS = /^\(\s*(-?\d+(?:\.\d+)?)\s*,\s*(-?\d+(?:\.\d+)?)\s*\)$/
const OVERRIDE_BLOCK = /(\{[^{}]*\})/
const EMPTY_TAG_PAIR = /<(b|i|u)><\/\1>/g

function matchDirectiveName(raw: string): string | null {
	for (const name of KNOWN_DIRECTIVES) {
		if (!raw.startsWith(name)) continue
		const rest = raw.slice(name.length)
		if (rest === '' || TEXT_ARGUMENT_DIRECTIVES.has(name) || !/^[a-z]/i.test(rest)) {
			return name
		}
	}
	return null
}

// Bare flag means "on"; an unreadable numeral degrades to "on" as well.
function parseToggleArgument(arg: string): boolean {
	if (!arg) return true
	const value = Number.parseInt(arg, 10)
	return Number.isNaN(value) ? true : value !== 0
}

export function classifyDirective(raw: string): Directive {
	const name = matchDirectiveName(raw)
	if (!name) return { kind: 'unknown', raw }
	const arg = raw.slice(name.length).trim()

	switch (name) {
		case 'b':
		case 'i':
		case 'u':
			return {
				kind: 'toggle',
				raw,
				flag: FLAG_BY_DIRECTIVE[name],
				enabled: parseToggleArgument(arg),
			}
		case 'an': {
			const code = /^\d+$/.test(arg) ? Number(arg) : 0
			return isValidAlignmentCode(code)
				? { kind: 'alignment', raw, code }
				: { kind: 'ignored', raw, name, reason: 'invalid alignment code' }
		}
		case 'a': {
			const code = /^\d+$/.test(arg) ? legacyToNumpadAlignment(Number(arg)) : 0
			return code > 0
				? { kind: 'alignment', raw, code }
				: { kind: 'ignored', raw, name, reason: 'invalid legacy alignment code' }
		}
		case 'pos': {
			const match = arg.match(POSITION_ARGS)
			if (!match) {
				return { kind: 'ignored', raw, name, reason: 'malformed coordinates' }
			}
			return { kind: 'position', raw, x: Number(match[1]), y: Number(match[2]) }
		}
		case 'r':
			return { kind: 'reset', raw, styleName: arg || null }
		default:
			return { kind: 'ignored', raw, name }
	}
}

/**
 * Split the body of an override block into raw directives.
 * Backslashes inside parentheses belong to the enclosing directive (`\t(\1c&HFF&)`),
 * and text before the first backslash is an author comment.
 */
export function tokenizeOverrideBlock(body: string): {
	comment: string
	directives: string[]
} {
	const directives: string[] = []
	let comment = ''
	let current = ''
	let depth = 0
	let seenBackslash = false

	for (const ch of body) {
		if (ch === '\\' && depth === 0) {
			if (seenBackslash) directives.push(current)
			else comment = current
			current = ''
			seenBackslash = true
			continue
		}
		if (ch === '(') depth++
		if (ch === ')') depth = Math.max(0, depth - 1)
		current += ch
	}
	if (seenBackslash) directives.push(current)
	else comment = current

	return {
		comment: comment.trim(),
		directives: directives.map((d) => d.trim()).filter(Boolean),
	}
}

export function baseFormatting(style: AssStyle | null): FormattingState {
	return {
		bold: Boolean(style && style.bold !== 0),
		italic: Boolean(style && style.italic !== 0),
		underline: Boolean(style && style.underline !== 0),
	}
}

export function decodeLiteralText(text: string): string {
	return text
		.replace(/\\[Nn]/g, '\n')
		.replace(/\\h/g, ' ')
		.replace(/&/g, '&amp;')
		.replace(/</g, '&lt;')
		.replace(/>/g, '&gt;')
}

function wrapRun(text: string, formatting: FormattingState): string {
	let open = ''
	let close = ''
	for (const [flag, tag] of TAG_ORDER) {
		if (!formatting[flag]) continue
		open += `<${tag}>`
		close = `</${tag}>${close}`
	}
	return `${open}${text}${close}`
}

function collapseEmptyTags(text: string): string {
	let previous = text
	let next = text.replace(EMPTY_TAG_PAIR, '')
	while (next !== previous) {
		previous = next
		next = next.replace(EMPTY_TAG_PAIR, '')
	}
	return next
}

// A blank line ends a WebVTT cue, so drop empty lines inside the payload.
function tidyLines(text: string): string {
	return text
		.split('\n')
		.map((line) => line.trimEnd())
		.filter((line) => line.trim() !== '')
		.join('\n')
		.trim()
}

class OverrideInterpreter {
	formatting: FormattingState
	overrides: CueSettings = {}

	constructor(
		private readonly baseStyle: AssStyle | null,
		private readonly context: RenderContext,
	) {
		this.formatting = baseFormatting(baseStyle)
	}

	apply(directive: Directive): void {
		switch (directive.kind) {
			case 'toggle': {
				const next = { ...this.formatting }
				next[directive.flag] = directive.enabled
				this.formatting = next
				return
			}
			case 'alignment':
				this.applyAlignment(directive.code, directive.raw)
				return
			case 'position':
				this.applyPosition(directive.x, directive.y, directive.raw)
				return
			case 'reset':
				this.formatting = baseFormatting(this.baseStyle)
				this.overrides = {}
				logger.debug(
					'tags',
					directive.styleName
						? `Applied style reset \\${directive.raw}; resetting to event style '${this.context.styleName}' instead of '${directive.styleName}'`
						: `Applied style reset \\r (event style '${this.context.styleName}')`,
				)
				return
			case 'ignored':
				this.logIgnored(directive.raw, directive.name, directive.reason)
				return
			case 'unknown':
				logger.warn('tags', `Ignoring unknown override tag: \\${directive.raw}`)
				return
		}
	}

	private applyAlignment(code: number, raw: string): void {
		// Margins are not considered for inline alignment overrides
		const placement = mapAlignment(code)
		this.overrides = {
			...this.overrides,
			align: placement.textAlign,
			line: formatPercent(placement.line),
			'line-align': placement.lineAlign,
			position: 'auto',
		}
		logger.debug(
			'tags',
			`Tag \\${raw}: align=${placement.textAlign}, line=${formatPercent(placement.line)}, line-align=${placement.lineAlign}`,
		)
	}

	private applyPosition(x: number, y: number, raw: string): void {
		const { playResX, playResY } = this.context
		if (playResX <= 0 || playResY <= 0) {
			logger.warn('tags', `Ignoring tag \\${raw}: script resolution is unknown`)
			return
		}
		const position = (x / playResX) * 100
		const line = (y / playResY) * 100

		let align: 'start' | 'center' | 'end' = 'center'
		let positionAlign: 'line-left' | 'center' | 'line-right' = 'center'
		if (position < ALIGNMENT_CONSTANTS.POSITION_LEFT_LIMIT) {
			align = 'start'
			positionAlign = 'line-left'
		} else if (position > ALIGNMENT_CONSTANTS.POSITION_RIGHT_LIMIT) {
			align = 'end'
			positionAlign = 'line-right'
		}

		this.overrides = {
			...this.overrides,
			position: formatPercent(position),
			line: formatPercent(line),
			align,
			'line-align': 'start',
			'position-align': positionAlign,
		}
		logger.debug(
			'tags',
			`Tag \\${raw}: position=${formatPercent(position)}, line=${formatPercent(line)}, position-align=${positionAlign}`,
		)
	}

	private logIgnored(raw: string, name: string, reason?: string): void {
		if (reason) {
			logger.warn('tags', `Ignoring tag \\${raw}: ${reason}`)
			return
		}
		if (name === 'c' || name === '1c') {
			const css = assColorToCss(raw.slice(name.length).replace(/&+$/, ''))
			logger.debug(
				'tags',
				`Inline primary color change to ${css ?? 'an unreadable value'} (not supported in WebVTT)`,
			)
			return
		}
		logger.debug('tags', `Ignoring ASS tag with no WebVTT equivalent: \\${raw}`)
	}
}

/**
 * Render raw dialogue text to a WebVTT payload plus the cue-setting overrides
 * its override blocks asked for. Never throws on malformed tags.
 */
export function renderDialogueText(
	text: string,
	baseStyle: AssStyle | null,
	context: RenderContext,
): RenderedDialogue {
	const interpreter = new OverrideInterpreter(baseStyle, context)
	let output = ''

	for (const segment of text.split(OVERRIDE_BLOCK)) {
		if (!segment) continue
		if (segment.startsWith('{') && segment.endsWith('}')) {
			const { comment, directives } = tokenizeOverrideBlock(segment.slice(1, -1))
			if (comment) logger.debug('tags', `Skipping comment block: {${comment}}`)
			for (const raw of directives) {
				interpreter.apply(classifyDirective(raw))
			}
			continue
		}
		output += wrapRun(decodeLiteralText(segment), interpreter.formatting)
	}

	return {
		text: tidyLines(collapseEmptyTags(output)),
		overrides: interpreter.overrides,
	}
}
