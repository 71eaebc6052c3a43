/**
 * @unbrace/diagnostics
 *
 * Shared diagnostic types and definitions for unbrace packages.
 */

export {
	CLI_DIAGNOSTICS,
	type CliDiagnosticCode,
	UBCLI001,
	UBCLI002,
	UBCLI003,
	UBCLI004,
	UBCLI005,
} from './cli.ts'
export {
	CONVERTER_DIAGNOSTICS,
	type ConverterDiagnosticCode,
	UBBRACE001,
	UBBRACE002,
	UBLEX001,
	UBLEX002,
} from './converter.ts'
export { interpolateMessage } from './interpolate.ts'
export {
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	type DiagnosticSeverity as DiagnosticSeverityType,
	severityLabel,
} from './types.ts'

import { CLI_DIAGNOSTICS } from './cli.ts'
import { CONVERTER_DIAGNOSTICS } from './converter.ts'

/**
 * All diagnostics from all packages.
 */
export const DIAGNOSTICS = {
	...CONVERTER_DIAGNOSTICS,
	...CLI_DIAGNOSTICS,
} as const

/**
 * All valid diagnostic codes.
 */
export type DiagnosticCode = keyof typeof DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof DIAGNOSTICS)[typeof code] {
	return DIAGNOSTICS[code]
}

/**
 * Check if a code is a valid diagnostic code.
 */
export function isValidDiagnosticCode(code: string): code is DiagnosticCode {
	return code in DIAGNOSTICS
}
