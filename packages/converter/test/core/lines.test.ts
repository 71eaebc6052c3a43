import assert from 'node:assert'
import { describe, it } from 'node:test'
import { hasTrailingNewline, isBlank, splitLines, splitSourceLines } from '../../src/core/lines.ts'

describe('core/lines', () => {
	describe('splitSourceLines', () => {
		it('should keep each terminator with its line', () => {
			assert.deepStrictEqual(splitSourceLines('a\r\nb\rc\n'), [
				{ terminator: '\r\n', text: 'a' },
				{ terminator: '\r', text: 'b' },
				{ terminator: '\n', text: 'c' },
			])
		})

		it('should give the last line an empty terminator', () => {
			assert.deepStrictEqual(splitSourceLines('a\nb'), [
				{ terminator: '\n', text: 'a' },
				{ terminator: '', text: 'b' },
			])
		})

		it('should return no lines for empty text', () => {
			assert.deepStrictEqual(splitSourceLines(''), [])
		})
	})

	describe('splitLines', () => {
		it('should not add a line after a final terminator', () => {
			assert.deepStrictEqual(splitLines('a\n'), ['a'])
		})

		it('should keep empty lines before a final terminator', () => {
			assert.deepStrictEqual(splitLines('a\n\n'), ['a', ''])
		})

		it('should return a single line without terminators', () => {
			assert.deepStrictEqual(splitLines('a'), ['a'])
		})
	})

	describe('hasTrailingNewline', () => {
		it('should detect LF and CRLF endings', () => {
			assert.strictEqual(hasTrailingNewline('a\n'), true)
			assert.strictEqual(hasTrailingNewline('a\r\n'), true)
		})

		it('should not treat a lone CR as a newline', () => {
			assert.strictEqual(hasTrailingNewline('a\r'), false)
			assert.strictEqual(hasTrailingNewline(''), false)
		})
	})

	describe('isBlank', () => {
		it('should accept whitespace-only text', () => {
			assert.strictEqual(isBlank(''), true)
			assert.strictEqual(isBlank(' \t\n'), true)
		})

		it('should reject text with content', () => {
			assert.strictEqual(isBlank('  x'), false)
		})
	})
})
