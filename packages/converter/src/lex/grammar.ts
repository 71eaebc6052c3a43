import type { Node, Semantics } from 'ohm-js'
import * as ohm from 'ohm-js'

/**
 * Kinds of source span the scan reports.
 * `unterminated` is a string literal whose closing quote never arrives.
 */
export type LexemeKind = 'string' | 'comment' | 'unterminated'

/**
 * A string or comment span. Offsets are UTF-16 indices into the whole
 * source; `end` is exclusive.
 */
export interface Lexeme {
	kind: LexemeKind
	start: number
	end: number
	/** Opening quote, for string kinds */
	quote?: string
}

/**
 * Lexical grammar for Python strings and comments.
 *
 * Only the spans that matter for brace protection are recognized; everything
 * else is consumed as identifier words or single characters. Words are
 * matched whole so that `xr"…"` is the name `xr` followed by a plain string.
 *
 * Alternatives are tried in order: a complete string wins over an
 * unterminated one, which only matches when no closing quote follows.
 * Three quotes always open a long string: `"""abc"` is unterminated, not an
 * empty string followed by another.
 */
const grammarSource = String.raw`
PythonLexemes {
  source = lexeme*
  lexeme = comment | string | openString | word | any

  comment = "#" (~eol any)*

  string = stringPrefix? (longString | shortString)
  openString = stringPrefix? (openLongString | openShortString)

  stringPrefix = caseInsensitive<"rb"> | caseInsensitive<"br">
               | caseInsensitive<"rf"> | caseInsensitive<"fr">
               | caseInsensitive<"r"> | caseInsensitive<"u">
               | caseInsensitive<"b"> | caseInsensitive<"f">

  longString = "\"\"\"" (escape | ~"\"\"\"" any)* "\"\"\""
             | "'''" (escape | ~"'''" any)* "'''"
  shortString = ~tripleQuote "\"" (escape | ~("\"" | eol) any)* "\""
              | ~tripleQuote "'" (escape | ~("'" | eol) any)* "'"

  openLongString = tripleQuote any*
  openShortString = ~tripleQuote ("\"" | "'") (escape | ~eol any)*

  tripleQuote = "\"\"\"" | "'''"

  escape = "\\" (eol | any)
  eol = "\r\n" | "\r" | "\n"
  word = (alnum | "_")+
}
`

/**
 * The compiled lexical grammar.
 */
export const PythonLexemeGrammar = ohm.grammar(grammarSource)

/**
 * Builds a lexeme from the node's source interval.
 */
function toLexeme(node: Node, kind: LexemeKind, body: Node): Lexeme {
	const { startIdx, endIdx } = node.source
	// For strings, body is longString/shortString/open*: its first child is the opening quote
	const quote = body.children[0]?.sourceString
	return {
		end: endIdx,
		kind,
		start: startIdx,
		...(kind === 'comment' || quote === undefined ? {} : { quote }),
	}
}

/**
 * Create semantics for the lexical grammar.
 */
export function createSemantics(): Semantics {
	const semantics = PythonLexemeGrammar.createSemantics()

	semantics.addOperation<Lexeme | null>('toLexeme', {
		_terminal() {
			return null
		},
		comment(_hash: Node, body: Node) {
			return toLexeme(this, 'comment', body)
		},
		openString(_prefix: Node, body: Node) {
			return toLexeme(this, 'unterminated', body)
		},
		string(_prefix: Node, body: Node) {
			return toLexeme(this, 'string', body)
		},
		word(_chars: Node) {
			return null
		},
	})

	semantics.addOperation<Lexeme[]>('toLexemes', {
		source(lexemes: Node) {
			const collected: Lexeme[] = []
			for (const child of lexemes.children) {
				const lexeme: Lexeme | null = child['toLexeme']()
				if (lexeme !== null) collected.push(lexeme)
			}
			return collected
		},
	})

	return semantics
}

/**
 * Default semantics instance.
 */
export const semantics = createSemantics()

/**
 * Match source text against the lexical grammar.
 */
export function match(source: string): ohm.MatchResult {
	return PythonLexemeGrammar.match(source, 'source')
}
