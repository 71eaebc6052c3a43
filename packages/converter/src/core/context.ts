/**
 * Per-conversion context: the source being converted and the diagnostics
 * collected while converting it.
 */

import { splitLines } from './lines.ts'
import {
	type DiagnosticArgs,
	type DiagnosticCode,
	type DiagnosticDef,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
	severityLabel,
} from './diagnostics.ts'

export { DiagnosticSeverity } from './diagnostics.ts'

/**
 * A diagnostic message with location information.
 */
export interface Diagnostic {
	/** The diagnostic definition from the catalog */
	readonly def: DiagnosticDef
	/** Interpolated message with arguments applied */
	readonly message: string
	/** Line number (1-indexed) */
	readonly line: number
	/** Column number (1-indexed) */
	readonly column: number
	/** Template arguments used for message and suggestion interpolation */
	readonly args?: DiagnosticArgs
}

/**
 * Created once per conversion call and handed to each phase that reports.
 * Append-only: diagnostics are never removed once emitted.
 */
export class ConversionContext {
	/** Original source text */
	readonly source: string

	/** Source filename for diagnostics */
	readonly filename: string

	private readonly diagnostics: Diagnostic[] = []

	private sourceLines: string[] | null = null

	constructor(source: string, filename = '<input>') {
		this.source = source
		this.filename = filename
	}

	/**
	 * Emit a diagnostic by code at a specific location.
	 */
	emit(code: DiagnosticCode, line: number, column: number, args?: DiagnosticArgs): void {
		const def = getDiagnostic(code)
		const message = interpolateMessage(def.message, args)
		this.diagnostics.push({
			column,
			def,
			line,
			message,
			...(args ? { args } : {}),
		})
	}

	hasErrors(): boolean {
		return this.diagnostics.some((d) => d.def.severity === DiagnosticSeverity.Error)
	}

	hasDiagnostics(): boolean {
		return this.diagnostics.length > 0
	}

	getDiagnostics(): readonly Diagnostic[] {
		return this.diagnostics
	}

	getWarnings(): Diagnostic[] {
		return this.diagnostics.filter((d) => d.def.severity === DiagnosticSeverity.Warning)
	}

	getSourceLine(line: number): string | undefined {
		this.sourceLines ??= splitLines(this.source)
		return this.sourceLines[line - 1]
	}

	/**
	 * Format a diagnostic for display (Rust-style output).
	 *
	 * Example:
	 * ```
	 * warning[UBBRACE001]: unmatched closing brace
	 *   --> curlied.py:7:1
	 *    |
	 *  7 | }
	 *    | ^
	 *    |
	 *    = help: Remove the brace, or add the `{` that should open this block.
	 * ```
	 */
	formatDiagnostic(diagnostic: Diagnostic): string {
		const { def } = diagnostic
		const header = `${severityLabel(def.severity)}[${def.code}]: ${diagnostic.message}`
		const location = `  --> ${this.filename}:${diagnostic.line}:${diagnostic.column}`

		const sourceLine = this.getSourceLine(diagnostic.line)
		if (sourceLine === undefined) {
			return `${header}\n${location}`
		}

		const pad = ' '.repeat(String(diagnostic.line).length)
		const emptyPrefix = ` ${pad} | `
		const pointer = `${' '.repeat(diagnostic.column - 1)}^`
		const lines = [
			header,
			location,
			emptyPrefix,
			` ${diagnostic.line} | ${sourceLine}`,
			`${emptyPrefix}${pointer}`,
		]

		if (def.suggestion) {
			const suggestion = interpolateMessage(def.suggestion, diagnostic.args)
			lines.push(emptyPrefix, `   = help: ${suggestion}`)
		}

		return lines.join('\n')
	}

	formatAllDiagnostics(): string {
		return this.diagnostics.map((d) => this.formatDiagnostic(d)).join('\n\n')
	}
}
