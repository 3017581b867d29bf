/** 2 -> "2", 4.1666 -> "4.17" */
export function formatNumber(value: number): string {
	return String(Number(value.toFixed(2)))
}

export function formatPercent(value: number): string {
	return `${formatNumber(value)}%`
}
