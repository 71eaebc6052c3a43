/**
 * Thrown when conversion is asked for something it cannot do, such as an
 * unusable indent width. Source text never causes this error.
 */
export class ConversionError extends Error {
	readonly option: string | undefined

	constructor(message: string, option?: string) {
		super(message)
		this.name = 'ConversionError'
		this.option = option
	}
}
