import type { DiagnosticArgs } from './types.ts'

const PLACEHOLDER = /\{(\w+)\}/g

/**
 * Interpolate template arguments into a message or suggestion.
 * Replaces {key} with the value from args; unknown keys are left as written.
 */
export function interpolateMessage(template: string, args?: DiagnosticArgs): string {
	if (!args) return template
	return template.replace(PLACEHOLDER, (placeholder, key: string) => {
		const value = args[key]
		return value === undefined ? placeholder : String(value)
	})
}
