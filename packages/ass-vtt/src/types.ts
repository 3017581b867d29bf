import type { TextAlign, VerticalAnchor } from './config/constants'

export interface AssStyle {
	/** Display name with spaces replaced by underscores; used as the CSS class */
	name: string
	/** Name as written in the file, kept for log messages */
	originalName: string
	fontName: string
	fontSize: number
	primaryColour?: string
	secondaryColour?: string
	outlineColour?: string
	backColour?: string
	bold: number
	italic: number
	underline: number
	strikeOut: number
	scaleX: number
	scaleY: number
	spacing: number
	angle: number
	/** 1 = outline + drop shadow, 3 = opaque box */
	borderStyle: number
	outline: number
	shadow: number
	/** Numpad alignment code, 0 when missing or invalid */
	alignment: number
	marginL: number
	marginR: number
	marginV: number
	encoding: number
	fields: Record<string, string>
}

export interface DialogueEvent {
	layer: number
	start: string
	end: string
	style: string
	name: string
	marginL: number
	marginR: number
	marginV: number
	effect: string
	text: string
}

export interface AssDocument {
	scriptInfo: Record<string, string>
	playResX: number
	playResY: number
	styles: Map<string, AssStyle>
	defaultStyleName: string | null
	events: DialogueEvent[]
}

export interface ResolutionHints {
	playResX?: number
	playResY?: number
}

export type CueSettingKey =
	| 'align'
	| 'line'
	| 'line-align'
	| 'position'
	| 'position-align'

export type CueSettings = Partial<Record<CueSettingKey, string>>

export interface AlignmentPlacement {
	textAlign: TextAlign
	lineAlign: 'start' | 'center' | 'end'
	/** Percentage of the video height */
	line: number
	vertical: VerticalAnchor
}

export interface RenderContext {
	playResX: number
	playResY: number
	/** Style name of the event being rendered, for log messages */
	styleName: string
}

export interface RenderedDialogue {
	text: string
	overrides: CueSettings
}
