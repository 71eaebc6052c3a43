/**
 * Brace classification.
 * Tells block delimiters apart from braces in ordinary code.
 */

export {
	extractTrailingComment,
	findScopingBrace,
	isScopingCloseBrace,
	isScopingOpenBrace,
} from './braces.ts'
export { type BraceKind, COMMENT_PREFIX, type ScopingBrace } from './types.ts'
