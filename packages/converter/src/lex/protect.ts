import type { ConversionContext } from '../core/context.ts'
import { splitSourceLines } from '../core/lines.ts'
import { type Lexeme, match, semantics } from './grammar.ts'
import { LineIndex, ProtectedPositions } from './positions.ts'

/**
 * Scans source text for string and comment lexemes.
 *
 * The scan stops at the first unterminated string literal: lexemes before
 * it are returned, it and everything after it are not. A UBLEX001 warning
 * is recorded on the context at the literal's start.
 */
export function scanLexemes(source: string, context?: ConversionContext): Lexeme[] {
	const result = match(source)
	if (result.failed()) {
		context?.emit('UBLEX002', 1, 1, { reason: result.shortMessage ?? 'no match' })
		return []
	}

	const lexemes: Lexeme[] = semantics(result)['toLexemes']()
	const unterminatedAt = lexemes.findIndex((lexeme) => lexeme.kind === 'unterminated')
	if (unterminatedAt === -1) return lexemes

	const unterminated = lexemes[unterminatedAt]
	if (context !== undefined && unterminated !== undefined) {
		const index = new LineIndex(splitSourceLines(source))
		const { line, column } = index.locate(unterminated.start)
		context.emit('UBLEX001', line + 1, column + 1, { quote: unterminated.quote ?? '"' })
	}
	return lexemes.slice(0, unterminatedAt)
}

/**
 * Marks every column a lexeme covers.
 * Multi-line lexemes cover the rest of their first line, all of each
 * interior line and the start of their last line.
 */
function markLexeme(lexeme: Lexeme, index: LineIndex, positions: ProtectedPositions): void {
	const start = index.locate(lexeme.start)
	const end = index.locate(lexeme.end)

	if (start.line === end.line) {
		positions.addRange(start.line, start.column, end.column)
		return
	}

	for (let line = start.line; line <= end.line && line < index.lineCount; line++) {
		const length = index.lineLength(line)
		if (line === start.line) {
			positions.addRange(line, start.column, length)
		} else if (line === end.line) {
			positions.addRange(line, 0, Math.min(end.column, length))
		} else {
			positions.addRange(line, 0, length)
		}
	}
}

/**
 * Returns the set of (line, column) coordinates inside strings or comments.
 * Never throws: incomplete source yields the positions found before the
 * point where scanning stopped.
 */
export function findProtectedPositions(
	source: string,
	context?: ConversionContext
): ProtectedPositions {
	const positions = new ProtectedPositions()
	const index = new LineIndex(splitSourceLines(source))
	for (const lexeme of scanLexemes(source, context)) {
		markLexeme(lexeme, index, positions)
	}
	return positions
}
