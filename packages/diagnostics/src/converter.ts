/**
 * Converter diagnostic definitions.
 *
 * Code format: UB<PHASE><NUMBER>
 * - UBLEX: Lexical scan (001-099)
 * - UBBRACE: Brace structure (001-099)
 *
 * Every converter diagnostic is a warning: the conversion always produces output.
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// LEXER WARNINGS (UBLEX001-099)
// =============================================================================

export const UBLEX001: DiagnosticDef = {
	code: 'UBLEX001',
	description:
		'A string literal starts here but never ends. Braces from this point on are no longer protected by string or comment detection.',
	message: 'unterminated string literal',
	severity: DiagnosticSeverity.Warning,
	suggestion: 'Close the string with a matching {quote}.',
}

export const UBLEX002: DiagnosticDef = {
	code: 'UBLEX002',
	description: "The lexical scan couldn't read this file, so no strings or comments are protected.",
	message: 'cannot scan source: {reason}',
	severity: DiagnosticSeverity.Warning,
	suggestion: 'Check the file for unusual characters, or report this if it seems like a bug.',
}

// =============================================================================
// BRACE WARNINGS (UBBRACE001-099)
// =============================================================================

export const UBBRACE001: DiagnosticDef = {
	code: 'UBBRACE001',
	description: 'This closing brace has no open block to close. It was dropped.',
	message: 'unmatched closing brace',
	severity: DiagnosticSeverity.Warning,
	suggestion: 'Remove the brace, or add the `{` that should open this block.',
}

export const UBBRACE002: DiagnosticDef = {
	code: 'UBBRACE002',
	description: 'The file ended while blocks were still open.',
	message: '{count} block(s) never closed',
	severity: DiagnosticSeverity.Warning,
	suggestion: 'Add the missing `}` lines.',
}

// =============================================================================
// CATALOG
// =============================================================================

/**
 * Central catalog of all converter diagnostics.
 */
export const CONVERTER_DIAGNOSTICS = {
	// Brace warnings
	UBBRACE001,
	UBBRACE002,
	// Lexer warnings
	UBLEX001,
	UBLEX002,
} as const

/**
 * All valid converter diagnostic codes.
 */
export type ConverterDiagnosticCode = keyof typeof CONVERTER_DIAGNOSTICS
