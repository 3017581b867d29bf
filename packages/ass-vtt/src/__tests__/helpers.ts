import type { AssStyle } from '../types'

export function makeStyle(overrides: Partial<AssStyle> = {}): AssStyle {
	return {
		name: 'Default',
		originalName: 'Default',
		fontName: 'Arial',
		fontSize: 48,
		bold: 0,
		italic: 0,
		underline: 0,
		strikeOut: 0,
		scaleX: 100,
		scaleY: 100,
		spacing: 0,
		angle: 0,
		borderStyle: 1,
		outline: 0,
		shadow: 0,
		alignment: 2,
		marginL: 10,
		marginR: 10,
		marginV: 0,
		encoding: 1,
		fields: {},
		...overrides,
	}
}

export const STYLE_FORMAT_LINE =
	'Format: Name, Fontname, Fontsize, PrimaryColour, SecondaryColour, OutlineColour, BackColour, Bold, Italic, Underline, StrikeOut, ScaleX, ScaleY, Spacing, Angle, BorderStyle, Outline, Shadow, Alignment, MarginL, MarginR, MarginV, Encoding'

export const EVENT_FORMAT_LINE =
	'Format: Layer, Start, End, Style, Name, MarginL, MarginR, MarginV, Effect, Text'

export function styleLine(
	name: string,
	{ alignment = 2, marginV = 0, primary = '&H00FFFFFF' } = {},
): string {
	return `Style: ${name},Arial,48,${primary},&H000000FF,&H00000000,&H00000000,0,0,0,0,100,100,0,0,1,0,0,${alignment},10,10,${marginV},1`
}

export function dialogueLine(
	text: string,
	{
		layer = 0,
		start = '0:00:01.00',
		end = '0:00:03.00',
		style = 'Default',
		name = '',
		marginV = 0,
	} = {},
): string {
	return `Dialogue: ${layer},${start},${end},${style},${name},0,0,${marginV},,${text}`
}

export function buildScript(
	styles: string[],
	events: string[],
	scriptInfo: string[] = ['PlayResX: 1280', 'PlayResY: 720'],
): string {
	return [
		'[Script Info]',
		'ScriptType: v4.00+',
		...scriptInfo,
		'',
		'[V4+ Styles]',
		STYLE_FORMAT_LINE,
		...styles,
		'',
		'[Events]',
		EVENT_FORMAT_LINE,
		...events,
		'',
	].join('\n')
}
