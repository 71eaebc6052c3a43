/**
 * Lexical protection.
 * Finds the string and comment spans whose braces are never structural.
 */

export {
	createSemantics,
	type Lexeme,
	type LexemeKind,
	match,
	PythonLexemeGrammar,
} from './grammar.ts'
export { type Coordinate, LineIndex, ProtectedPositions } from './positions.ts'
export { findProtectedPositions, scanLexemes } from './protect.ts'
