/**
 * Colour helpers
 * ASS stores colours as &HAABBGGRR (or &HBBGGRR): reversed byte order, inverted alpha.
 */

import { OPAQUE_ALPHA_THRESHOLD } from '../config/constants'
import { logger } from '../logger'

const ASS_COLOR_PREFIX = '&H'
const HEX_REGEX = /^[0-9A-F]+$/

/**
 * Convert an ASS colour to `#rrggbb` when opaque, otherwise `rgba(r,g,b,a)`
 */
export function assColorToCss(raw: string | null | undefined): string | null {
	const value = (raw ?? '').trim()
	if (!value.startsWith(ASS_COLOR_PREFIX)) return null

	const hex = value.slice(ASS_COLOR_PREFIX.length).toUpperCase()
	if (hex.length !== 8 && hex.length !== 6) {
		logger.warn('styles', `Invalid ASS color format length: ${value}`)
		return null
	}
	if (!HEX_REGEX.test(hex)) {
		logger.warn('styles', `Could not parse ASS color: ${value}`)
		return null
	}

	const bytes = hex.length === 8 ? hex : `00${hex}`
	const alphaByte = Number.parseInt(bytes.slice(0, 2), 16)
	const blue = bytes.slice(2, 4)
	const green = bytes.slice(4, 6)
	const red = bytes.slice(6, 8)
	const opacity = Math.round((1 - alphaByte / 255) * 1000) / 1000

	if (opacity >= OPAQUE_ALPHA_THRESHOLD) {
		return `#${red}${green}${blue}`.toLowerCase()
	}

	const r = Number.parseInt(red, 16)
	const g = Number.parseInt(green, 16)
	const b = Number.parseInt(blue, 16)
	return `rgba(${r},${g},${b},${opacity})`
}
