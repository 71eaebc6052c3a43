import { ConversionError } from '@unbrace/converter'
import {
	interpolateMessage,
	UBCLI001,
	UBCLI002,
	UBCLI003,
	UBCLI004,
	UBCLI005,
} from '@unbrace/diagnostics'

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

export function formatReadError(filePath: string, error: unknown): string {
	if (isNodeError(error) && error.code === 'ENOENT') {
		const message = interpolateMessage(UBCLI001.message, { path: filePath })
		return `[${UBCLI001.code}] ${message}`
	}
	const message = interpolateMessage(UBCLI002.message, { reason: getErrorMessage(error) })
	return `[${UBCLI002.code}] ${message}`
}

export function formatWriteError(error: unknown): string {
	const message = interpolateMessage(UBCLI003.message, { reason: getErrorMessage(error) })
	return `[${UBCLI003.code}] ${message}`
}

export function formatConversionError(error: unknown): string {
	if (error instanceof ConversionError) {
		return error.message
	}
	const message = interpolateMessage(UBCLI004.message, { reason: getErrorMessage(error) })
	return `[${UBCLI004.code}] ${message}`
}

export function formatInvalidIndentWidthError(width: number | string): string {
	const message = interpolateMessage(UBCLI005.message, { width })
	return `[${UBCLI005.code}] ${message}`
}

export function formatSuccess(inputPath: string, outputPath: string): string {
	return `Converted ${inputPath} to ${outputPath}`
}
