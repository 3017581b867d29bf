/**
 * ASS/SSA document parser
 *
 * Two phases: lines are grouped under their `[Section]` header, then each section
 * is decoded on its own. Only a complete absence of sections is fatal; every other
 * irregularity is logged and replaced with a default.
 */

import { legacyToNumpadAlignment } from './alignment'
import { LAYOUT_CONSTANTS, SECTION_CONSTANTS } from './config/constants'
import { AssParsingError } from './errors'
import { logger } from './logger'
import type { AssDocument, AssStyle, DialogueEvent, ResolutionHints } from './types'

export interface RawSection {
	name: string
	lines: string[]
}

const KNOWN_FIELD_NAMES: string[] = Array.from(
	new Set<string>([
		...LAYOUT_CONSTANTS.STYLE_FORMAT,
		...LAYOUT_CONSTANTS.LEGACY_STYLE_FORMAT,
		...LAYOUT_CONSTANTS.EVENT_FORMAT,
		...LAYOUT_CONSTANTS.LEGACY_EVENT_FORMAT,
	]),
)

const INTEGER_REGEX = /^[+-]?\d+$/
const MARKED_REGEX = /^marked\s*=\s*\d+$/i

function sectionKey(name: string): string {
	return name.trim().toLowerCase()
}

function canonicalFieldName(name: string): string {
	const lower = name.toLowerCase()
	return KNOWN_FIELD_NAMES.find((known) => known.toLowerCase() === lower) ?? name
}

function parseFormatLine(line: string): string[] {
	return line
		.slice('format:'.length)
		.split(',')
		.map((field) => canonicalFieldName(field.trim()))
		.filter(Boolean)
}

/**
 * Split on the first `count - 1` commas only, so the last column (Text) keeps its commas.
 */
export function splitFields(payload: string, count: number): string[] {
	if (count <= 1) return [payload]
	const out: string[] = []
	let start = 0
	for (let i = 0; i < count - 1; i++) {
		const idx = payload.indexOf(',', start)
		if (idx === -1) break
		out.push(payload.slice(start, idx))
		start = idx + 1
	}
	out.push(payload.slice(start))
	return out
}

function zipFields(format: string[], parts: string[]): Record<string, string> {
	const fields: Record<string, string> = {}
	format.forEach((key, i) => {
		fields[key] = (parts[i] ?? '').trim()
	})
	return fields
}

/**
 * Group trimmed lines under the most recent `[Section]` header. Lines before the
 * first header, blank lines and `;` comments are dropped.
 */
export function splitIntoSections(content: string): Map<string, RawSection> {
	const sections = new Map<string, RawSection>()
	let current: RawSection | null = null

	for (const rawLine of content.split(/\r\n|\r|\n/)) {
		const line = rawLine.replace(/^\uFEFF/, '').trim()
		if (!line) continue

		if (line.startsWith('[') && line.endsWith(']')) {
			const name = line.slice(1, -1).trim()
			const key = sectionKey(name)
			current = sections.get(key) ?? { name, lines: [] }
			sections.set(key, current)
			logger.debug('parser', `Switched to section: [${name}]`)
			continue
		}
		if (!current || line.startsWith(';')) continue
		current.lines.push(line)
	}

	return sections
}

function resolveResolution(
	key: string,
	raw: string | undefined,
	hint: number | undefined,
): number {
	const fallback = hint ?? 0
	if (raw === undefined) return fallback
	if (INTEGER_REGEX.test(raw)) {
		const value = Number.parseInt(raw, 10)
		if (value >= 0) return value
	}
	logger.warn('parser', `Invalid ${key} value ('${raw}'). Using ${fallback}.`)
	return fallback
}

export function parseScriptInfo(
	section: RawSection | undefined,
	hints: ResolutionHints = {},
): Pick<AssDocument, 'scriptInfo' | 'playResX' | 'playResY'> {
	const scriptInfo: Record<string, string> = {}
	if (!section) {
		logger.warn(
			'parser',
			`Missing [${SECTION_CONSTANTS.SCRIPT_INFO}] section. Using resolution hints if provided.`,
		)
		return { scriptInfo, playResX: hints.playResX ?? 0, playResY: hints.playResY ?? 0 }
	}

	for (const line of section.lines) {
		const idx = line.indexOf(':')
		if (idx === -1) {
			logger.warn('parser', `Ignoring unknown line in [${section.name}]: ${line}`)
			continue
		}
		scriptInfo[line.slice(0, idx).trim()] = line.slice(idx + 1).trim()
	}

	const lookup = (name: string) => {
		const key = Object.keys(scriptInfo).find((k) => k.toLowerCase() === name.toLowerCase())
		return key === undefined ? undefined : scriptInfo[key]
	}
	const playResX = resolveResolution('PlayResX', lookup('PlayResX'), hints.playResX)
	const playResY = resolveResolution('PlayResY', lookup('PlayResY'), hints.playResY)
	logger.debug('parser', `Script resolution: ${playResX}x${playResY}`)

	return { scriptInfo, playResX, playResY }
}

function coerceNumber(
	fields: Record<string, string>,
	key: string,
	styleName: string,
	fallback = 0,
): number {
	const raw = fields[key]
	if (raw === undefined) return fallback
	const value = raw === '' ? Number.NaN : Number(raw)
	if (Number.isFinite(value)) return value
	logger.warn(
		'parser',
		`Invalid numeric value for '${key}' in style '${styleName}': '${raw}'. Using 0.`,
	)
	return 0
}

function buildStyle(fields: Record<string, string>, legacy: boolean): AssStyle | null {
	const originalName = fields.Name ?? ''
	if (!originalName) return null
	const num = (key: string, fallback = 0) => coerceNumber(fields, key, originalName, fallback)

	const alignment = Math.trunc(num('Alignment'))
	return {
		name: originalName.replace(/ /g, '_'),
		originalName,
		fontName: fields.Fontname ?? '',
		fontSize: num('Fontsize'),
		primaryColour: fields.PrimaryColour || undefined,
		secondaryColour: fields.SecondaryColour || undefined,
		// SSA names the outline colour TertiaryColour
		outlineColour: fields.OutlineColour || fields.TertiaryColour || undefined,
		backColour: fields.BackColour || undefined,
		bold: num('Bold'),
		italic: num('Italic'),
		underline: num('Underline'),
		strikeOut: num('StrikeOut'),
		scaleX: num('ScaleX', 100),
		scaleY: num('ScaleY', 100),
		spacing: num('Spacing'),
		angle: num('Angle'),
		borderStyle: num('BorderStyle', 1),
		outline: num('Outline'),
		shadow: num('Shadow'),
		alignment: legacy ? legacyToNumpadAlignment(alignment) : alignment,
		marginL: num('MarginL'),
		marginR: num('MarginR'),
		marginV: num('MarginV'),
		encoding: num('Encoding'),
		fields,
	}
}

export function parseStyles(sections: Map<string, RawSection>): {
	styles: Map<string, AssStyle>
	defaultStyleName: string | null
} {
	const styles = new Map<string, AssStyle>()
	let defaultStyleName: string | null = null

	const modern = sections.get(sectionKey(SECTION_CONSTANTS.STYLES_V4_PLUS))
	const section = modern ?? sections.get(sectionKey(SECTION_CONSTANTS.STYLES_V4))
	if (!section) {
		logger.warn('parser', 'Missing styles section.')
		return { styles, defaultStyleName }
	}
	const legacy = !modern
	const defaultFormat: string[] = legacy
		? [...LAYOUT_CONSTANTS.LEGACY_STYLE_FORMAT]
		: [...LAYOUT_CONSTANTS.STYLE_FORMAT]

	let format = defaultFormat
	let formatFound = false
	for (const line of section.lines) {
		const lower = line.toLowerCase()
		if (lower.startsWith('format:')) {
			format = parseFormatLine(line)
			formatFound = true
			logger.debug('parser', `Found custom style format: ${format.join(',')}`)
			continue
		}
		if (!lower.startsWith('style:')) {
			logger.warn('parser', `Ignoring unknown line in [${section.name}]: ${line}`)
			continue
		}
		if (!formatFound) {
			format = defaultFormat
			formatFound = true
			logger.warn('parser', `Missing 'Format:' in styles. Using default for [${section.name}].`)
		}

		const parts = splitFields(line.slice('style:'.length).trim(), format.length)
		if (parts.length !== format.length) {
			logger.warn('parser', `Incorrect field count in style line: ${line}. Ignoring.`)
			continue
		}
		const style = buildStyle(zipFields(format, parts), legacy)
		if (!style) {
			logger.warn('parser', `Ignoring style without a name: ${line}`)
			continue
		}
		styles.set(style.name, style)
		defaultStyleName ??= style.name
		logger.debug('parser', `Parsed style: ${style.name} (originally: ${style.originalName})`)
	}

	return { styles, defaultStyleName }
}

function normalizeEventFormat(format: string[]): string[] {
	if (format.includes('Marked') && !format.includes('Layer')) {
		return format.map((field) => (field === 'Marked' ? 'Layer' : field))
	}
	return format
}

/**
 * Without a Format line, a numeric first column means the modern layout (Layer),
 * anything else the legacy one (Marked).
 */
export function inferEventFormat(payload: string): string[] {
	const first = payload.split(',', 1)[0]?.trim() ?? ''
	return INTEGER_REGEX.test(first)
		? [...LAYOUT_CONSTANTS.EVENT_FORMAT]
		: normalizeEventFormat([...LAYOUT_CONSTANTS.LEGACY_EVENT_FORMAT])
}

function parseInteger(raw: string | undefined, label: string, line: string): number {
	if (raw === undefined || raw === '') return 0
	if (INTEGER_REGEX.test(raw)) return Number.parseInt(raw, 10)
	logger.warn('parser', `Invalid ${label} value '${raw}' in Dialogue: ${line}. Using 0.`)
	return 0
}

function parseLayer(raw: string | undefined, line: string): number {
	// SSA's "Marked=N" is an editing flag, not a layer
	if (raw !== undefined && MARKED_REGEX.test(raw)) return 0
	return parseInteger(raw, 'Layer', line)
}

function buildEvent(fields: Record<string, string>, line: string): DialogueEvent {
	return {
		layer: parseLayer(fields.Layer, line),
		start: fields.Start ?? '',
		end: fields.End ?? '',
		style: (fields.Style ?? '').replace(/ /g, '_'),
		name: fields.Name ?? '',
		marginL: parseInteger(fields.MarginL, 'MarginL', line),
		marginR: parseInteger(fields.MarginR, 'MarginR', line),
		marginV: parseInteger(fields.MarginV, 'MarginV', line),
		effect: fields.Effect ?? '',
		text: fields.Text ?? '',
	}
}

export function parseEvents(section: RawSection | undefined): DialogueEvent[] {
	if (!section) {
		logger.warn('parser', `Missing [${SECTION_CONSTANTS.EVENTS}] section. No subtitles.`)
		return []
	}

	const events: DialogueEvent[] = []
	let format: string[] = [...LAYOUT_CONSTANTS.EVENT_FORMAT]
	let formatFound = false

	for (const line of section.lines) {
		const lower = line.toLowerCase()
		if (lower.startsWith('format:')) {
			format = normalizeEventFormat(parseFormatLine(line))
			formatFound = true
			logger.debug('parser', `Found custom event format: ${format.join(',')}`)
			continue
		}
		if (lower.startsWith('comment:')) continue
		if (!lower.startsWith('dialogue:')) {
			logger.warn('parser', `Ignoring unknown line in [${section.name}]: ${line}`)
			continue
		}

		const payload = line.slice('dialogue:'.length).trim()
		if (!formatFound) {
			format = inferEventFormat(payload)
			formatFound = true
			logger.warn('parser', "Missing 'Format:' line in [Events]. Using inferred format.")
		}

		const parts = splitFields(payload, format.length)
		if (parts.length !== format.length) {
			logger.warn('parser', `Incorrect field count in Dialogue: ${line}. Ignoring.`)
			continue
		}
		events.push(buildEvent(zipFields(format, parts), line))
	}

	return events
}

/**
 * Parse ASS/SSA text. `hints` pre-seed the script resolution and are only used
 * when [Script Info] does not provide a readable value.
 */
export function parseAssDocument(content: string, hints: ResolutionHints = {}): AssDocument {
	const text = content.startsWith('\uFEFF') ? content.slice(1) : content
	const sections = splitIntoSections(text)
	if (sections.size === 0) {
		throw new AssParsingError('No sections found; the [Events] section is missing.')
	}

	const info = parseScriptInfo(sections.get(sectionKey(SECTION_CONSTANTS.SCRIPT_INFO)), hints)
	const { styles, defaultStyleName } = parseStyles(sections)
	const events = parseEvents(sections.get(sectionKey(SECTION_CONSTANTS.EVENTS)))
	if (events.length === 0) logger.warn('parser', 'No events (Dialogue lines) parsed.')
	logger.debug(
		'parser',
		`Parsing finished: ${styles.size} styles, ${events.length} events.`,
	)

	return { ...info, styles, defaultStyleName, events }
}
