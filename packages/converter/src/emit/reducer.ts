import { extractTrailingComment, findScopingBrace } from '../classify/braces.ts'
import type { BraceKind } from '../classify/types.ts'
import { isBlank } from '../core/lines.ts'
import type { ProtectedPositions } from '../lex/positions.ts'
import { indentLine } from './indent.ts'

/**
 * Result of reducing one source line.
 */
export interface LineOutcome {
	/** Depth after this line */
	depth: number
	/** Output line, or null when the line disappears */
	emitted: string | null
	/** Scoping brace acted on, if any */
	brace: BraceKind | null
	/** A close brace arrived with no open block */
	underflow: boolean
}

/**
 * Joins an open-brace header and its trailing comment.
 * Returns null when both are empty.
 */
function joinHeader(header: string, comment: string): string | null {
	if (header === '' && comment === '') return null
	if (header === '' || comment === '') return `${header}${comment}`
	return `${header}  ${comment}`
}

function reduceOpen(line: string, column: number, depth: number): LineOutcome {
	const header = line.slice(0, column).trimEnd()
	const comment = extractTrailingComment(line.slice(column + 1))
	return {
		brace: 'open',
		depth: depth + 1,
		emitted: joinHeader(header, comment),
		underflow: false,
	}
}

function reduceClose(line: string, column: number, depth: number, unit: string): LineOutcome {
	const newDepth = Math.max(0, depth - 1)
	const comment = extractTrailingComment(line.slice(column + 1))
	return {
		brace: 'close',
		depth: newDepth,
		emitted: comment === '' ? null : indentLine(comment, newDepth, unit),
		underflow: depth === 0,
	}
}

/**
 * Processes one source line at the given depth.
 *
 * - scoping `{`: emits the header (with any comment after the brace), depth + 1
 * - scoping `}`: depth - 1 (never below 0); emits only a trailing comment
 * - otherwise: blank lines become '', others are re-indented to depth
 */
export function reduceLine(
	line: string,
	lineIndex: number,
	depth: number,
	protectedPositions: ProtectedPositions,
	unit: string
): LineOutcome {
	const brace = findScopingBrace(line, lineIndex, protectedPositions)
	if (brace?.kind === 'open') return reduceOpen(line, brace.column, depth)
	if (brace?.kind === 'close') return reduceClose(line, brace.column, depth, unit)

	const emitted = isBlank(line) ? '' : indentLine(line.trimStart(), depth, unit)
	return { brace: null, depth, emitted, underflow: false }
}
