import type { SourceLine } from '../core/lines.ts'

/**
 * A 0-based (line, column) coordinate.
 */
export interface Coordinate {
	line: number
	column: number
}

/**
 * Set of (line, column) coordinates lying inside a string or comment.
 * Columns are UTF-16 offsets within the line, matching string indexing.
 */
export class ProtectedPositions {
	private readonly byLine: Map<number, Set<number>> = new Map()
	private total = 0

	add(line: number, column: number): void {
		let columns = this.byLine.get(line)
		if (columns === undefined) {
			columns = new Set()
			this.byLine.set(line, columns)
		}
		if (!columns.has(column)) {
			columns.add(column)
			this.total++
		}
	}

	/** Adds columns in range [start, end) on one line. */
	addRange(line: number, start: number, end: number): void {
		for (let column = start; column < end; column++) {
			this.add(line, column)
		}
	}

	has(line: number, column: number): boolean {
		return this.byLine.get(line)?.has(column) ?? false
	}

	get size(): number {
		return this.total
	}

	/** Sorted protected columns of one line. */
	columnsOn(line: number): number[] {
		const columns = this.byLine.get(line)
		return columns === undefined ? [] : [...columns].sort((a, b) => a - b)
	}
}

/**
 * Maps offsets in the whole source to line/column coordinates.
 */
export class LineIndex {
	private readonly starts: number[] = []
	private readonly lengths: number[] = []

	constructor(lines: readonly SourceLine[]) {
		let offset = 0
		for (const line of lines) {
			const length = line.text.length + line.terminator.length
			this.starts.push(offset)
			this.lengths.push(length)
			offset += length
		}
	}

	get lineCount(): number {
		return this.starts.length
	}

	/** Length of a line including its terminator (0 past the last line). */
	lineLength(line: number): number {
		return this.lengths[line] ?? 0
	}

	/**
	 * Converts a source offset to a coordinate. An offset at the end of the
	 * source maps past the last character of the last line.
	 */
	locate(offset: number): Coordinate {
		let low = 0
		let high = this.starts.length - 1
		while (low < high) {
			const mid = Math.ceil((low + high) / 2)
			const start = this.starts[mid] ?? 0
			if (start <= offset) {
				low = mid
			} else {
				high = mid - 1
			}
		}
		return { column: offset - (this.starts[low] ?? 0), line: low }
	}
}
