import { ConversionError } from '../core/errors.ts'

export const DEFAULT_INDENT_WIDTH = 4
export const MAX_INDENT_WIDTH = 16

export function isValidIndentWidth(width: number): boolean {
	return Number.isInteger(width) && width >= 1 && width <= MAX_INDENT_WIDTH
}

/**
 * Builds the indentation unit: `width` spaces.
 * @throws ConversionError if width is not an integer in 1..16
 */
export function createIndentUnit(width: number = DEFAULT_INDENT_WIDTH): string {
	if (!isValidIndentWidth(width)) {
		throw new ConversionError(
			`Indent width must be an integer from 1 to ${MAX_INDENT_WIDTH}, got ${width}.`,
			'indentWidth'
		)
	}
	return ' '.repeat(width)
}

/**
 * Prefixes content with `depth` indentation units.
 */
export function indentLine(content: string, depth: number, unit: string): string {
	return `${unit.repeat(depth)}${content}`
}
