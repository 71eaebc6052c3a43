/**
 * Output emission: per-line reduction, indentation and blank-line cleanup.
 */

export { collapseBlankLines } from './collapse.ts'
export {
	createIndentUnit,
	DEFAULT_INDENT_WIDTH,
	indentLine,
	isValidIndentWidth,
	MAX_INDENT_WIDTH,
} from './indent.ts'
export { type LineOutcome, reduceLine } from './reducer.ts'
