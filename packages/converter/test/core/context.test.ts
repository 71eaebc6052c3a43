import assert from 'node:assert'
import { describe, it } from 'node:test'
import { ConversionContext, DiagnosticSeverity } from '../../src/core/context.ts'

describe('core/context', () => {
	describe('ConversionContext', () => {
		it('should store source and filename', () => {
			const ctx = new ConversionContext('x = 1', 'app.py')
			assert.strictEqual(ctx.source, 'x = 1')
			assert.strictEqual(ctx.filename, 'app.py')
		})

		it('should use default filename if not provided', () => {
			const ctx = new ConversionContext('x = 1')
			assert.strictEqual(ctx.filename, '<input>')
		})

		it('should start with no diagnostics', () => {
			const ctx = new ConversionContext('x = 1')
			assert.strictEqual(ctx.hasDiagnostics(), false)
			assert.strictEqual(ctx.hasErrors(), false)
			assert.deepStrictEqual(ctx.getDiagnostics(), [])
		})

		describe('emit', () => {
			it('should record a warning from the catalog', () => {
				const ctx = new ConversionContext('}\n')
				ctx.emit('UBBRACE001', 1, 1)

				const [diagnostic] = ctx.getDiagnostics()
				assert.strictEqual(diagnostic?.def.code, 'UBBRACE001')
				assert.strictEqual(diagnostic?.def.severity, DiagnosticSeverity.Warning)
				assert.strictEqual(diagnostic?.message, 'unmatched closing brace')
				assert.strictEqual(diagnostic?.args, undefined)
				assert.strictEqual(ctx.getWarnings().length, 1)
				assert.strictEqual(ctx.hasErrors(), false)
			})

			it('should interpolate arguments into the message', () => {
				const ctx = new ConversionContext('if x: {\n')
				ctx.emit('UBBRACE002', 1, 1, { count: 3 })
				assert.strictEqual(ctx.getDiagnostics()[0]?.message, '3 block(s) never closed')
			})
		})

		describe('getSourceLine', () => {
			it('should return 1-indexed lines', () => {
				const ctx = new ConversionContext('a\r\nb\n')
				assert.strictEqual(ctx.getSourceLine(1), 'a')
				assert.strictEqual(ctx.getSourceLine(2), 'b')
				assert.strictEqual(ctx.getSourceLine(3), undefined)
			})
		})

		describe('formatDiagnostic', () => {
			it('should point at the column and interpolate the suggestion', () => {
				const ctx = new ConversionContext('a = 1\nb = "x\n', 'app.py')
				ctx.emit('UBLEX001', 2, 5, { quote: '"' })
				const [diagnostic] = ctx.getDiagnostics()
				assert.ok(diagnostic)
				assert.strictEqual(
					ctx.formatDiagnostic(diagnostic),
					[
						'warning[UBLEX001]: unterminated string literal',
						'  --> app.py:2:5',
						'   | ',
						' 2 | b = "x',
						'   |     ^',
						'   | ',
						'   = help: Close the string with a matching ".',
					].join('\n')
				)
			})

			it('should omit the source excerpt for lines outside the source', () => {
				const ctx = new ConversionContext('x')
				ctx.emit('UBLEX002', 9, 1, { reason: 'boom' })
				const [diagnostic] = ctx.getDiagnostics()
				assert.ok(diagnostic)
				assert.strictEqual(
					ctx.formatDiagnostic(diagnostic),
					'warning[UBLEX002]: cannot scan source: boom\n  --> <input>:9:1'
				)
			})

			it('should separate diagnostics with a blank line', () => {
				const ctx = new ConversionContext('x')
				ctx.emit('UBLEX002', 9, 1, { reason: 'a' })
				ctx.emit('UBLEX002', 9, 1, { reason: 'b' })
				assert.strictEqual(
					ctx.formatAllDiagnostics(),
					'warning[UBLEX002]: cannot scan source: a\n  --> <input>:9:1\n\nwarning[UBLEX002]: cannot scan source: b\n  --> <input>:9:1'
				)
			})
		})
	})
})
