import type { ProtectedPositions } from '../lex/positions.ts'
import { COMMENT_PREFIX, type ScopingBrace } from './types.ts'

function isCommentOrEmpty(text: string): boolean {
	const trimmed = text.trim()
	return trimmed === '' || trimmed.startsWith(COMMENT_PREFIX)
}

function firstNonWhitespace(line: string): number {
	return line.length - line.trimStart().length
}

/**
 * `{` ending a block-introducing statement: only whitespace between the
 * last colon and the brace, nothing but a comment after it.
 */
function followsColon(line: string, column: number): boolean {
	const before = line.slice(0, column)
	const colon = before.lastIndexOf(':')
	if (colon === -1) return false
	if (before.slice(colon + 1).trim() !== '') return false
	return isCommentOrEmpty(line.slice(column + 1))
}

/**
 * `{` alone on its line, optionally followed by a comment.
 */
function standsAlone(line: string, column: number): boolean {
	return column === firstNonWhitespace(line) && isCommentOrEmpty(line.slice(column + 1))
}

/**
 * Decides whether the `{` at `column` opens a block.
 * Braces inside strings or comments never do.
 */
export function isScopingOpenBrace(
	line: string,
	column: number,
	lineIndex: number,
	protectedPositions: ProtectedPositions
): boolean {
	if (line[column] !== '{') return false
	if (protectedPositions.has(lineIndex, column)) return false
	return followsColon(line, column) || standsAlone(line, column)
}

/**
 * Decides whether the `}` at `column` closes a block: it must lead the line
 * and be followed by nothing but an optional comment.
 */
export function isScopingCloseBrace(
	line: string,
	column: number,
	lineIndex: number,
	protectedPositions: ProtectedPositions
): boolean {
	if (line[column] !== '}') return false
	if (protectedPositions.has(lineIndex, column)) return false
	return column === firstNonWhitespace(line) && isCommentOrEmpty(line.slice(column + 1))
}

/**
 * Finds the first scoping brace on a line, skipping braces that are not.
 *
 * Only one brace per line is ever acted on, so `} else: {` is read as a
 * header that opens a block and the leading `}` is not a close.
 */
export function findScopingBrace(
	line: string,
	lineIndex: number,
	protectedPositions: ProtectedPositions
): ScopingBrace | null {
	for (let column = 0; column < line.length; column++) {
		if (isScopingOpenBrace(line, column, lineIndex, protectedPositions)) {
			return { column, kind: 'open' }
		}
		if (isScopingCloseBrace(line, column, lineIndex, protectedPositions)) {
			return { column, kind: 'close' }
		}
	}
	return null
}

/**
 * Returns the comment following a brace, or '' when there is none.
 * Everything from the first `#` on counts as the comment.
 */
export function extractTrailingComment(text: string): string {
	const stripped = text.trimStart()
	const start = stripped.indexOf(COMMENT_PREFIX)
	return start === -1 ? '' : stripped.slice(start)
}
