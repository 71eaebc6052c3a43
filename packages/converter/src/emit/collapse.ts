/**
 * Drops every empty line that directly follows another empty line, so runs
 * of blank lines shrink to one.
 */
export function collapseBlankLines(lines: readonly string[]): string[] {
	const collapsed: string[] = []
	for (const line of lines) {
		if (line === '' && collapsed.length > 0 && collapsed[collapsed.length - 1] === '') continue
		collapsed.push(line)
	}
	return collapsed
}
