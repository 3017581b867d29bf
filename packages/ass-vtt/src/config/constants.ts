/**
 * Converter-wide constants
 */

/**
 * Section headers and row layouts
 */
export const SECTION_CONSTANTS = {
	SCRIPT_INFO: 'Script Info',
	STYLES_V4_PLUS: 'V4+ Styles',
	STYLES_V4: 'V4 Styles',
	EVENTS: 'Events',
} as const

export const LAYOUT_CONSTANTS = {
	// [V4+ Styles]
	STYLE_FORMAT: [
		'Name',
		'Fontname',
		'Fontsize',
		'PrimaryColour',
		'SecondaryColour',
		'OutlineColour',
		'BackColour',
		'Bold',
		'Italic',
		'Underline',
		'StrikeOut',
		'ScaleX',
		'ScaleY',
		'Spacing',
		'Angle',
		'BorderStyle',
		'Outline',
		'Shadow',
		'Alignment',
		'MarginL',
		'MarginR',
		'MarginV',
		'Encoding',
	],
	// [V4 Styles]
	LEGACY_STYLE_FORMAT: [
		'Name',
		'Fontname',
		'Fontsize',
		'PrimaryColour',
		'SecondaryColour',
		'TertiaryColour',
		'BackColour',
		'Bold',
		'Italic',
		'Underline',
		'StrikeOut',
		'ScaleX',
		'ScaleY',
		'Spacing',
		'Angle',
		'BorderStyle',
		'Outline',
		'Shadow',
		'Alignment',
		'MarginL',
		'MarginR',
		'MarginV',
		'AlphaLevel',
		'Encoding',
	],
	EVENT_FORMAT: [
		'Layer',
		'Start',
		'End',
		'Style',
		'Name',
		'MarginL',
		'MarginR',
		'MarginV',
		'Effect',
		'Text',
	],
	LEGACY_EVENT_FORMAT: [
		'Marked',
		'Start',
		'End',
		'Style',
		'Name',
		'MarginL',
		'MarginR',
		'MarginV',
		'Effect',
		'Text',
	],
} as const

/**
 * Placement
 */
export type VerticalAnchor = 'top' | 'middle' | 'bottom'
export type TextAlign = 'start' | 'center' | 'end'

// numpad code -> [vertical anchor, text alignment]
export const ALIGNMENT_MAP: Readonly<
	Record<number, readonly [VerticalAnchor, TextAlign]>
> = {
	1: ['bottom', 'start'],
	2: ['bottom', 'center'],
	3: ['bottom', 'end'],
	4: ['middle', 'start'],
	5: ['middle', 'center'],
	6: ['middle', 'end'],
	7: ['top', 'start'],
	8: ['top', 'center'],
	9: ['top', 'end'],
}

export const ALIGNMENT_CONSTANTS = {
	DEFAULT_CODE: 2,
	TOP_MIN_LINE: 2,
	MIDDLE_LINE: 50,
	BOTTOM_MIN_MARGIN: 10,
	BOTTOM_DEFAULT_LINE: 90,
	// \pos x buckets, in percent of PlayResX
	POSITION_LEFT_LIMIT: 33,
	POSITION_RIGHT_LIMIT: 66,
} as const

/**
 * WebVTT
 */
export const VTT_CONSTANTS = {
	HEADER: 'WEBVTT',
	STYLE_HEADER: 'STYLE',
	ZERO_TIMESTAMP: '00:00:00.000',
	SETTING_ORDER: ['align', 'line', 'line-align', 'position', 'position-align'],
	DEFAULT_SETTINGS: {
		align: 'center',
		line: 'auto',
		'line-align': 'start',
		position: 'auto',
		'position-align': 'auto',
	},
	FALLBACK_SHADOW_COLOR: 'rgba(0,0,0,0.5)',
} as const

export const OPAQUE_ALPHA_THRESHOLD = 0.999

/**
 * Decoding
 */
export const ENCODING_CONSTANTS = {
	// BOM-aware UTF-8 first, then plain UTF-8, then a wide encoding
	DEFAULT_PRIORITY: ['utf-8-sig', 'utf-8', 'utf-16'],
	OUTPUT_ENCODING: 'utf8',
} as const
