import { ALIGNMENT_CONSTANTS, ALIGNMENT_MAP } from './config/constants'
import type { AlignmentPlacement } from './types'

export function isValidAlignmentCode(code: number): boolean {
	return Number.isInteger(code) && code >= 1 && code <= 9
}

/**
 * Vertical margin as a percentage of PlayResY, 0 when it cannot be computed.
 */
export function marginToPercent(marginV: number, playResY: number): number {
	if (marginV > 0 && playResY > 0) {
		return (marginV / playResY) * 100
	}
	return 0
}

/**
 * Map a numpad alignment code onto WebVTT `align`, `line` and `line-align`.
 * Unknown codes fall back to bottom-center.
 */
export function mapAlignment(
	code: number | null | undefined,
	styleMarginV = 0,
	playResY = 0,
): AlignmentPlacement {
	const resolved =
		code != null && isValidAlignmentCode(code)
			? code
			: ALIGNMENT_CONSTANTS.DEFAULT_CODE
	const [vertical, textAlign] = ALIGNMENT_MAP[resolved]
	const marginOffset = marginToPercent(styleMarginV, playResY)

	switch (vertical) {
		case 'top':
			return {
				vertical,
				textAlign,
				line:
					marginOffset > 0
						? Math.max(ALIGNMENT_CONSTANTS.TOP_MIN_LINE, marginOffset)
						: ALIGNMENT_CONSTANTS.TOP_MIN_LINE,
				lineAlign: 'start',
			}
		case 'middle':
			return {
				vertical,
				textAlign,
				line: ALIGNMENT_CONSTANTS.MIDDLE_LINE,
				lineAlign: 'center',
			}
		case 'bottom':
			return {
				vertical,
				textAlign,
				line:
					marginOffset > 0
						? 100 - Math.max(ALIGNMENT_CONSTANTS.BOTTOM_MIN_MARGIN, marginOffset)
						: ALIGNMENT_CONSTANTS.BOTTOM_DEFAULT_LINE,
				lineAlign: 'end',
			}
	}
}

/**
 * SSA (`[V4 Styles]`, `\a`) codes: 1-3 bottom, 5-7 top (+4), 9-11 middle (+8).
 * Returns 0 for codes outside that layout.
 */
export function legacyToNumpadAlignment(code: number): number {
	if (code >= 1 && code <= 3) return code
	if (code >= 5 && code <= 7) return code + 2
	if (code >= 9 && code <= 11) return code - 5
	return 0
}
