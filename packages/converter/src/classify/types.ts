/**
 * Line comment marker of the target language.
 */
export const COMMENT_PREFIX = '#'

export type BraceKind = 'open' | 'close'

/**
 * A brace that opens or closes a block, with its column in the line.
 */
export interface ScopingBrace {
	kind: BraceKind
	column: number
}
