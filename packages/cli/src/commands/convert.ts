import { readFile, writeFile } from 'node:fs/promises'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import { type ConversionResult, convertSource, isValidIndentWidth } from '@unbrace/converter'
import {
	formatConversionError,
	formatInvalidIndentWidthError,
	formatReadError,
	formatSuccess,
	formatWriteError,
} from '../utils.ts'

export default class ConvertCommand extends BaseCommand {
	static override commandName = 'convert'
	static override description = 'Rewrite braced Python blocks as indentation'

	@args.string({
		default: 'curlied.py',
		description: 'Braced source file to convert',
		required: false,
	})
	declare input: string

	@flags.string({ alias: 'o', default: 'whitespaced.py', description: 'File to write the result to' })
	declare output: string

	@flags.number({ default: 4, description: 'Spaces per indentation level (1-16)' })
	declare indentWidth: number

	private validateIndentWidth(): boolean {
		if (!isValidIndentWidth(this.indentWidth)) {
			this.logger.error(formatInvalidIndentWidthError(this.indentWidth))
			this.exitCode = 1
			return false
		}
		return true
	}

	private async readSourceFile(): Promise<string | null> {
		try {
			return await readFile(this.input, 'utf-8')
		} catch (error: unknown) {
			this.logger.error(formatReadError(this.input, error))
			this.exitCode = 1
			return null
		}
	}

	private convertText(source: string): ConversionResult | null {
		try {
			return convertSource(source, { filename: this.input, indentWidth: this.indentWidth })
		} catch (error: unknown) {
			this.logger.error(formatConversionError(error))
			this.exitCode = 1
			return null
		}
	}

	private reportWarnings(result: ConversionResult): void {
		const { context } = result
		for (const warning of context.getWarnings()) {
			this.logger.warning(context.formatDiagnostic(warning))
		}
	}

	private async writeOutputFile(content: string): Promise<boolean> {
		try {
			await writeFile(this.output, content, 'utf-8')
			return true
		} catch (error: unknown) {
			this.logger.error(formatWriteError(error))
			this.exitCode = 1
			return false
		}
	}

	override async run(): Promise<void> {
		if (!this.validateIndentWidth()) return

		const source = await this.readSourceFile()
		if (source === null) return

		const result = this.convertText(source)
		if (result === null) return

		this.reportWarnings(result)

		if (await this.writeOutputFile(result.text)) {
			this.logger.success(formatSuccess(this.input, this.output))
		}
	}
}
