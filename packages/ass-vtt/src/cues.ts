/**
 * Cue assembly
 *
 * Turns a parsed document into WebVTT text: events are sorted by start time,
 * filtered, rendered through the override-tag interpreter and placed using the
 * style alignment, the event margin and any inline overrides, in that order.
 */

import { mapAlignment, marginToPercent } from './alignment'
import { VTT_CONSTANTS } from './config/constants'
import { logger } from './logger'
import { generateStyleSheet } from './styles'
import { renderDialogueText } from './tags'
import type { AssDocument, AssStyle, CueSettingKey, CueSettings, DialogueEvent } from './types'
import { formatPercent } from './utils/format'
import { formatCueTimestamp, parseAssTimestamp } from './utils/time'

export type ResolvedCueSettings = Record<CueSettingKey, string>

export interface VttCue {
	start: string
	end: string
	settings: CueSettings
	payload: string
}

export function convertTimestamp(value: string): { ms: number; text: string } {
	const ms = parseAssTimestamp(value)
	if (ms === null) {
		logger.error('cues', `Invalid ASS time format: '${value}'`)
		return { ms: 0, text: VTT_CONSTANTS.ZERO_TIMESTAMP }
	}
	return { ms, text: formatCueTimestamp(ms) }
}

/**
 * Stable sort by start time. Malformed start times sort as zero.
 */
export function sortEventsByStart(events: DialogueEvent[]): DialogueEvent[] {
	const keyed = events.map((event) => {
		const ms = parseAssTimestamp(event.start)
		if (ms === null) {
			logger.error('cues', `Invalid start time for sorting: '${event.start}'. Sorting as 0.`)
		}
		return { event, ms: ms ?? 0 }
	})
	return keyed.sort((a, b) => a.ms - b.ms).map(({ event }) => event)
}

export function resolveStyle(document: AssDocument, styleName: string): AssStyle | null {
	const style = styleName ? document.styles.get(styleName) : undefined
	if (style) return style

	const fallback =
		document.defaultStyleName === null
			? undefined
			: document.styles.get(document.defaultStyleName)
	if (styleName) {
		logger.warn(
			'cues',
			`Style '${styleName}' not found. Using default '${document.defaultStyleName ?? 'none'}'.`,
		)
	}
	return fallback ?? null
}

/**
 * Placement derived from the style alone. A bottom style without a usable margin
 * is left to the player's own bottom placement.
 */
export function styleCueSettings(style: AssStyle | null, playResY: number): ResolvedCueSettings {
	const marginV = style?.marginV ?? 0
	const placement = mapAlignment(style?.alignment, marginV, playResY)
	const nativeBottom =
		placement.vertical === 'bottom' && marginToPercent(marginV, playResY) <= 0

	return {
		align: placement.textAlign,
		line: nativeBottom ? VTT_CONSTANTS.DEFAULT_SETTINGS.line : formatPercent(placement.line),
		'line-align': nativeBottom
			? VTT_CONSTANTS.DEFAULT_SETTINGS['line-align']
			: placement.lineAlign,
		position: VTT_CONSTANTS.DEFAULT_SETTINGS.position,
		'position-align': VTT_CONSTANTS.DEFAULT_SETTINGS['position-align'],
	}
}

/**
 * A non-zero event MarginV replaces the vertical offset of top and bottom styles.
 * The anchor class still comes from the style.
 */
export function applyEventMargin(
	settings: ResolvedCueSettings,
	styleAlignment: number,
	eventMarginV: number,
	playResY: number,
): ResolvedCueSettings {
	if (eventMarginV <= 0 || playResY <= 0) return settings

	if (styleAlignment >= 1 && styleAlignment <= 3) {
		return {
			...settings,
			line: formatPercent(((playResY - eventMarginV) / playResY) * 100),
			'line-align': 'end',
		}
	}
	if (styleAlignment >= 7 && styleAlignment <= 9) {
		return {
			...settings,
			line: formatPercent((eventMarginV / playResY) * 100),
			'line-align': 'start',
		}
	}
	return settings
}

/**
 * Settings worth writing: anything off the WebVTT default, plus every key an
 * inline override set explicitly.
 */
export function selectCueSettings(
	settings: ResolvedCueSettings,
	overrides: CueSettings,
): CueSettings {
	const selected: CueSettings = {}
	for (const key of VTT_CONSTANTS.SETTING_ORDER) {
		if (settings[key] !== VTT_CONSTANTS.DEFAULT_SETTINGS[key] || key in overrides) {
			selected[key] = settings[key]
		}
	}
	return selected
}

function escapeActor(actor: string): string {
	return actor.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;')
}

export function wrapVoice(payload: string, styleName: string, actor: string): string {
	const speaker = actor.trim()
	if (!speaker) return payload
	const tag = styleName ? `v.${styleName}` : 'v'
	return `<${tag} ${escapeActor(speaker)}>${payload}</v>`
}

export function formatCueBlock(index: number, cue: VttCue): string {
	const settings = VTT_CONSTANTS.SETTING_ORDER.flatMap((key) => {
		const value = cue.settings[key]
		return value === undefined ? [] : [`${key}:${value}`]
	})
	const timing = [`${cue.start} --> ${cue.end}`, ...settings].join(' ')
	return `${index}\n${timing}\n${cue.payload}`
}

function buildCue(document: AssDocument, event: DialogueEvent): VttCue | null {
	if (event.layer !== 0) {
		logger.debug('cues', `Skipping event on layer ${event.layer}`)
		return null
	}

	const style = resolveStyle(document, event.style)
	const styleName = event.style || style?.name || ''
	const rendered = renderDialogueText(event.text, style, {
		playResX: document.playResX,
		playResY: document.playResY,
		styleName,
	})
	if (!rendered.text) {
		logger.debug('cues', `Skipping event with empty text at ${event.start}`)
		return null
	}

	const start = convertTimestamp(event.start)
	const end = convertTimestamp(event.end)
	if (start.ms >= end.ms) {
		logger.debug('cues', `Skipping event with non-positive duration: ${start.text} --> ${end.text}`)
		return null
	}

	const placed = applyEventMargin(
		styleCueSettings(style, document.playResY),
		style?.alignment ?? 0,
		event.marginV,
		document.playResY,
	)
	const merged: ResolvedCueSettings = { ...placed, ...rendered.overrides }

	return {
		start: start.text,
		end: end.text,
		settings: selectCueSettings(merged, rendered.overrides),
		payload: wrapVoice(rendered.text, styleName, event.name),
	}
}

export function buildCues(document: AssDocument): VttCue[] {
	const cues: VttCue[] = []
	for (const event of sortEventsByStart(document.events)) {
		const cue = buildCue(document, event)
		if (cue) cues.push(cue)
	}
	logger.info(
		'cues',
		`Generated ${cues.length} cues, skipped ${document.events.length - cues.length} events`,
	)
	return cues
}

/**
 * Serialise a parsed document to WebVTT. A document without events yields the bare header.
 */
export function assembleVtt(document: AssDocument): string {
	if (document.events.length === 0) {
		logger.warn('cues', 'No events to convert. Returning empty WebVTT header.')
		return `${VTT_CONSTANTS.HEADER}\n`
	}

	const blocks: string[] = [VTT_CONSTANTS.HEADER]
	const styleBlock = generateStyleSheet(document.styles)
	if (styleBlock) blocks.push(styleBlock)

	buildCues(document).forEach((cue, i) => {
		blocks.push(formatCueBlock(i + 1, cue))
	})

	return `${blocks.join('\n\n')}\n`
}
