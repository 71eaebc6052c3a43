import assert from 'node:assert'
import { describe, it } from 'node:test'
import {
	DIAGNOSTICS,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
	isValidDiagnosticCode,
	severityLabel,
} from '../src/index.ts'

describe('diagnostics', () => {
	describe('catalog', () => {
		it('should key every definition by its own code', () => {
			for (const [code, def] of Object.entries(DIAGNOSTICS)) {
				assert.strictEqual(def.code, code)
			}
		})

		it('should keep converter diagnostics at warning severity', () => {
			for (const [code, def] of Object.entries(DIAGNOSTICS)) {
				if (code.startsWith('UBCLI')) continue
				assert.strictEqual(def.severity, DiagnosticSeverity.Warning, code)
			}
		})

		it('should keep CLI diagnostics at error severity', () => {
			assert.strictEqual(getDiagnostic('UBCLI001').severity, DiagnosticSeverity.Error)
			assert.strictEqual(getDiagnostic('UBCLI004').severity, DiagnosticSeverity.Error)
		})

		it('should recognize known codes only', () => {
			assert.strictEqual(isValidDiagnosticCode('UBLEX001'), true)
			assert.strictEqual(isValidDiagnosticCode('UBCLI005'), true)
			assert.strictEqual(isValidDiagnosticCode('UBLEX999'), false)
			assert.strictEqual(isValidDiagnosticCode(''), false)
		})
	})

	describe('interpolateMessage', () => {
		it('should return the template when no args are given', () => {
			assert.strictEqual(interpolateMessage('{count} block(s) never closed'), '{count} block(s) never closed')
		})

		it('should replace known placeholders', () => {
			assert.strictEqual(
				interpolateMessage('{count} block(s) never closed', { count: 2 }),
				'2 block(s) never closed'
			)
		})

		it('should leave unknown placeholders in place', () => {
			assert.strictEqual(interpolateMessage('input not found: {path}', { reason: 'x' }), 'input not found: {path}')
		})

		it('should replace every occurrence', () => {
			assert.strictEqual(interpolateMessage('{a}-{a}', { a: 'x' }), 'x-x')
		})
	})

	describe('severityLabel', () => {
		it('should label each severity', () => {
			assert.strictEqual(severityLabel(DiagnosticSeverity.Error), 'error')
			assert.strictEqual(severityLabel(DiagnosticSeverity.Warning), 'warning')
			assert.strictEqual(severityLabel(DiagnosticSeverity.Note), 'note')
		})
	})
})
