/**
 * Validation of history query filters.
 *
 * A query filter is a sequence of Overpass filter clauses appended to every id selection, e.g.
 * `[highway]`, `[name~"^Main"]` or `(around:100,52.5,13.4)`. Validation only checks structure:
 * every clause starts with `[` or `(`, brackets balance and quotes are closed.
 *
 * @module
 */

import { InputValidationError } from "./errors"

const CLOSING: Record<string, string> = { "[": "]", "(": ")" }

/**
 * Validate a query filter and return it trimmed. An empty filter returns `undefined`.
 * @throws InputValidationError when the filter is malformed.
 */
export function parseQueryFilter(filter?: string): string | undefined {
	const trimmed = filter?.trim() ?? ""
	if (trimmed === "") return undefined

	const stack: string[] = []
	let quote: string | null = null
	let escaped = false

	for (let i = 0; i < trimmed.length; i++) {
		const char = trimmed.charAt(i)
		if (quote != null) {
			if (escaped) escaped = false
			else if (char === "\\") escaped = true
			else if (char === quote) quote = null
			continue
		}
		if (char === '"' || char === "'") {
			quote = char
		} else if (char === "[" || char === "(") {
			stack.push(char)
		} else if (char === "]" || char === ")") {
			const open = stack.pop()
			if (open == null || CLOSING[open] !== char) {
				throw new InputValidationError(
					`Unbalanced "${char}" at position ${i} in query filter`,
					{ filter: trimmed },
				)
			}
		} else if (stack.length === 0 && !/\s/.test(char)) {
			throw new InputValidationError(
				`Query filter clauses must start with "[" or "(", got "${char}" at position ${i}`,
				{ filter: trimmed },
			)
		} else if (char === ";") {
			throw new InputValidationError(
				"Query filter must not contain statement separators",
				{ filter: trimmed },
			)
		}
	}

	if (quote != null) {
		throw new InputValidationError("Unterminated quote in query filter", {
			filter: trimmed,
		})
	}
	if (stack.length > 0) {
		throw new InputValidationError("Unclosed bracket in query filter", {
			filter: trimmed,
		})
	}
	return trimmed
}
