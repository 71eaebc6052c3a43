/**
 * Re-export diagnostic types and converter definitions from shared package.
 */

import { CONVERTER_DIAGNOSTICS } from '@unbrace/diagnostics'

export {
	CONVERTER_DIAGNOSTICS,
	type ConverterDiagnosticCode,
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	interpolateMessage,
	severityLabel,
	UBBRACE001,
	UBBRACE002,
	UBLEX001,
	UBLEX002,
} from '@unbrace/diagnostics'

/**
 * All valid diagnostic codes for the converter.
 */
export type DiagnosticCode = keyof typeof CONVERTER_DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof CONVERTER_DIAGNOSTICS)[typeof code] {
	return CONVERTER_DIAGNOSTICS[code]
}
