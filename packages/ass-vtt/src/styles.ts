/**
 * STYLE block generation
 * One `::cue(.Name)` rule per style that has anything WebVTT can express.
 */

import { VTT_CONSTANTS } from './config/constants'
import { logger } from './logger'
import type { AssStyle } from './types'
import { assColorToCss } from './utils/color'
import { formatNumber } from './utils/format'

export function styleDeclarations(style: AssStyle): string[] {
	const declarations: string[] = []

	const color = assColorToCss(style.primaryColour)
	if (color) declarations.push(`color: ${color};`)

	const outlineColor = assColorToCss(style.outlineColour)
	if (style.outline > 0 && outlineColor) {
		declarations.push(`-webkit-text-stroke-width: ${formatNumber(style.outline)}px;`)
		declarations.push(`-webkit-text-stroke-color: ${outlineColor};`)
	}

	const backColor = assColorToCss(style.backColour)
	const shadowDepth = Math.trunc(style.shadow)
	if (shadowDepth > 0) {
		const shadowColor =
			style.borderStyle === 1
				? (backColor ?? VTT_CONSTANTS.FALLBACK_SHADOW_COLOR)
				: (outlineColor ?? backColor ?? VTT_CONSTANTS.FALLBACK_SHADOW_COLOR)
		declarations.push(`text-shadow: ${shadowColor} ${shadowDepth}px ${shadowDepth}px 0px;`)
	}

	if (style.borderStyle === 3 && backColor) {
		declarations.push(`background-color: ${backColor};`)
	}

	if (style.spacing !== 0) {
		declarations.push(`letter-spacing: ${formatNumber(style.spacing)}px;`)
	}

	return declarations
}

/**
 * Build the `STYLE` block in style-table order, or `''` when no style has a rule.
 */
export function generateStyleSheet(styles: Map<string, AssStyle> | Iterable<AssStyle>): string {
	const list = styles instanceof Map ? Array.from(styles.values()) : Array.from(styles)
	const rules: string[] = []

	for (const style of list) {
		const declarations = styleDeclarations(style)
		if (declarations.length === 0) {
			logger.debug('styles', `Style '${style.name}' has no WebVTT-expressible properties`)
			continue
		}
		rules.push(`::cue(.${style.name}) { ${declarations.join(' ')} }`)
	}

	if (rules.length === 0) return ''
	logger.debug('styles', `Generated ${rules.length} CSS rules`)
	return [VTT_CONSTANTS.STYLE_HEADER, ...rules].join('\n')
}
