/**
 * unbrace converter public API
 *
 * Rewrites brace-delimited Python into indentation blocks:
 * 1. Lexical protection (source → protected string/comment positions)
 * 2. Line reduction (each line → at most one output line, depth threaded through)
 * 3. Blank-line collapse (output → final text)
 */

import { ConversionContext } from './core/context.ts'
import { hasTrailingNewline, isBlank, splitLines } from './core/lines.ts'
import { collapseBlankLines } from './emit/collapse.ts'
import { createIndentUnit, DEFAULT_INDENT_WIDTH } from './emit/indent.ts'
import { reduceLine } from './emit/reducer.ts'
import { findProtectedPositions } from './lex/protect.ts'

export {
	type BraceKind,
	COMMENT_PREFIX,
	extractTrailingComment,
	findScopingBrace,
	isScopingCloseBrace,
	isScopingOpenBrace,
	type ScopingBrace,
} from './classify/index.ts'
export { ConversionContext, type Diagnostic, DiagnosticSeverity } from './core/context.ts'
export { ConversionError } from './core/errors.ts'
export { hasTrailingNewline, isBlank, splitLines } from './core/lines.ts'
export {
	collapseBlankLines,
	createIndentUnit,
	DEFAULT_INDENT_WIDTH,
	indentLine,
	isValidIndentWidth,
	type LineOutcome,
	MAX_INDENT_WIDTH,
	reduceLine,
} from './emit/index.ts'
export {
	type Lexeme,
	type LexemeKind,
	findProtectedPositions,
	ProtectedPositions,
	scanLexemes,
} from './lex/index.ts'

/**
 * Options for the convert functions.
 */
export interface ConvertOptions {
	/** Path to the source file (for diagnostics) */
	filename?: string
	/** Spaces per indentation level */
	indentWidth?: number
}

/**
 * Converted text plus the diagnostics gathered while converting.
 */
export interface ConversionResult {
	text: string
	context: ConversionContext
}

/**
 * Accumulator threaded through the line pass.
 */
interface LinePass {
	depth: number
	output: string[]
}

/**
 * Joins the output lines, restoring a trailing newline only when the source
 * had one. Without it, trailing empty lines are dropped so the joined text
 * does not end in a newline either.
 */
function finalizeText(lines: string[], hadTrailingNewline: boolean): string {
	if (hadTrailingNewline) {
		return `${lines.join('\n')}\n`
	}
	let end = lines.length
	while (end > 0 && lines[end - 1] === '') end--
	return lines.slice(0, end).join('\n')
}

/**
 * Convert braced source and report what happened along the way.
 *
 * @param source - Source text using `{`/`}` blocks
 * @param options - Conversion options
 * @returns Converted text and the conversion context holding diagnostics
 * @throws {ConversionError} If the options are unusable (never because of the source)
 */
export function convertSource(source: string, options: ConvertOptions = {}): ConversionResult {
	const unit = createIndentUnit(options.indentWidth ?? DEFAULT_INDENT_WIDTH)
	const context = new ConversionContext(source, options.filename)

	if (isBlank(source)) {
		return { context, text: source }
	}

	const protectedPositions = findProtectedPositions(source, context)
	const lines = splitLines(source)

	const pass = lines.reduce<LinePass>(
		(acc, line, lineIndex) => {
			const outcome = reduceLine(line, lineIndex, acc.depth, protectedPositions, unit)
			if (outcome.underflow) {
				context.emit('UBBRACE001', lineIndex + 1, line.indexOf('}') + 1)
			}
			if (outcome.emitted !== null) acc.output.push(outcome.emitted)
			return { depth: outcome.depth, output: acc.output }
		},
		{ depth: 0, output: [] }
	)

	if (pass.depth > 0) {
		context.emit('UBBRACE002', lines.length, 1, { count: pass.depth })
	}

	const text = finalizeText(collapseBlankLines(pass.output), hasTrailingNewline(source))
	return { context, text }
}

/**
 * Convert braced source to indentation blocks.
 *
 * Pure and total over its input: performs no I/O and does not throw for any
 * source text. Unterminated strings or unbalanced braces are tolerated.
 */
export function convert(source: string): string {
	return convertSource(source).text
}
