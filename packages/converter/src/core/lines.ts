/**
 * Line handling shared by the lexical scan and the line pass.
 */

const LINE_BREAK = /\r\n|\r|\n/g

/**
 * A source line and the terminator that ended it ('' for the last line).
 */
export interface SourceLine {
	readonly text: string
	readonly terminator: string
}

/**
 * Splits text into lines with their terminators.
 * A terminator at the very end does not start an extra empty line.
 */
export function splitSourceLines(source: string): SourceLine[] {
	const lines: SourceLine[] = []
	const breaks = new RegExp(LINE_BREAK)
	let lineStart = 0
	for (let match = breaks.exec(source); match !== null; match = breaks.exec(source)) {
		lines.push({ terminator: match[0], text: source.slice(lineStart, match.index) })
		lineStart = match.index + match[0].length
	}
	if (lineStart < source.length) {
		lines.push({ terminator: '', text: source.slice(lineStart) })
	}
	return lines
}

/**
 * Splits text into lines without terminators.
 */
export function splitLines(source: string): string[] {
	return splitSourceLines(source).map((line) => line.text)
}

export function isBlank(text: string): boolean {
	return text.trim().length === 0
}

export function hasTrailingNewline(source: string): boolean {
	return source.endsWith('\n')
}
