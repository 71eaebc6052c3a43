/**
 * CLI diagnostic definitions.
 *
 * Error code format: UBCLI<NUMBER>
 * - UBCLI: CLI errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CLI ERRORS (UBCLI001-099)
// =============================================================================

export const UBCLI001: DiagnosticDef = {
	code: 'UBCLI001',
	description: "unbrace couldn't find an input file at this path.",
	message: 'input not found: {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Pass the path of your braced source file, e.g. `unbrace convert src/app.py`.',
}

export const UBCLI002: DiagnosticDef = {
	code: 'UBCLI002',
	description: "The input file exists but unbrace can't open it.",
	message: 'cannot read file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have read permission for this file.',
}

export const UBCLI003: DiagnosticDef = {
	code: 'UBCLI003',
	description: "unbrace couldn't save the converted file.",
	message: 'cannot write file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have write permission for the output location.',
}

export const UBCLI004: DiagnosticDef = {
	code: 'UBCLI004',
	description: 'Something unexpected went wrong while converting the source.',
	message: 'conversion failed: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'This is a bug in unbrace. Please report it along with the input file.',
}

export const UBCLI005: DiagnosticDef = {
	code: 'UBCLI005',
	description: 'The indent width must be a whole number of spaces.',
	message: 'invalid indent width "{width}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use a value between 1 and 16, e.g. `--indent-width 4`.',
}

// =============================================================================
// CATALOG
// =============================================================================

export const CLI_DIAGNOSTICS = {
	UBCLI001,
	UBCLI002,
	UBCLI003,
	UBCLI004,
	UBCLI005,
} as const

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
