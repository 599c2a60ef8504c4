/**
 * Read-only SQL guard
 *
 * Runs inside every engine adapter before the backend sees a statement.
 * Not a parser: it scans code outside strings and comments for
 * - write / DDL / DCL keywords (ResourceError: the session has no permission)
 * - stacked statements (SyntaxError: ask for a single statement)
 * - unbounded scans on distributed engines (SyntaxError: add a LIMIT or aggregate)
 */

import type { ErrorKind } from "./config.js"

export interface GuardViolation {
	kind: ErrorKind
	code: "WRITE_OPERATION" | "MULTIPLE_STATEMENTS" | "UNBOUNDED_SCAN" | "EMPTY_STATEMENT"
	message: string
}

export interface GuardOptions {
	/** Require an aggregate, GROUP BY or LIMIT (distributed engines) */
	requireBoundedScan?: boolean
}

const WRITE_KEYWORDS = [
	// DDL
	"DROP",
	"CREATE",
	"ALTER",
	"TRUNCATE",
	"RENAME",
	// DML
	"INSERT",
	"UPDATE",
	"DELETE",
	"MERGE",
	// DCL
	"GRANT",
	"REVOKE",
	// engine-side file and extension access
	"COPY",
	"ATTACH",
	"DETACH",
	"INSTALL",
	"EXPORT",
	"VACUUM",
]

const BOUNDING_PATTERNS = [
	/\b(COUNT|SUM|AVG|MIN|MAX|APPROX_COUNT_DISTINCT|PERCENTILE_APPROX)\s*\(/i,
	/\bGROUP\s+BY\b/i,
	/\bLIMIT\s+\d+/i,
]

/**
 * Replace string literals, quoted identifiers and comments with spaces so that
 * keyword scans only see code. Offsets are preserved.
 */
export function maskLiteralsAndComments(sql: string): string {
	const out: string[] = []
	let i = 0
	const len = sql.length

	const blank = (from: number, to: number) => {
		for (let j = from; j < to; j++) out.push(sql[j] === "\n" ? "\n" : " ")
	}

	while (i < len) {
		const char = sql[i]
		const next = i + 1 < len ? sql[i + 1] : ""

		// -- line comment
		if (char === "-" && next === "-") {
			const start = i
			while (i < len && sql[i] !== "\n") i++
			blank(start, i)
			continue
		}

		// /* block comment */
		if (char === "/" && next === "*") {
			const start = i
			i += 2
			while (i < len && !(sql[i] === "*" && sql[i + 1] === "/")) i++
			i = Math.min(len, i + 2)
			blank(start, i)
			continue
		}

		// '...' string, "..." or `...` identifier; doubled quote escapes
		if (char === "'" || char === '"' || char === "`") {
			const start = i
			i++
			while (i < len) {
				if (sql[i] === char) {
					if (sql[i + 1] === char) {
						i += 2
						continue
					}
					i++
					break
				}
				i++
			}
			blank(start, i)
			continue
		}

		out.push(char)
		i++
	}

	return out.join("")
}

function hasStackedStatements(code: string): boolean {
	const trimmed = code.trim().replace(/;+\s*$/, "")
	return trimmed.includes(";")
}

/**
 * Returns the first violation found, or null when the statement may run.
 */
export function checkReadOnlySQL(sql: string, options: GuardOptions = {}): GuardViolation | null {
	const code = maskLiteralsAndComments(sql)

	if (code.trim().replace(/;/g, "").trim().length === 0) {
		return {
			kind: "SyntaxError",
			code: "EMPTY_STATEMENT",
			message: "Empty SQL statement",
		}
	}

	for (const keyword of WRITE_KEYWORDS) {
		if (new RegExp(`\\b${keyword}\\b`, "i").test(code)) {
			return {
				kind: "ResourceError",
				code: "WRITE_OPERATION",
				message: `Permission denied: ${keyword} statements are not allowed, only read-only queries`,
			}
		}
	}

	if (hasStackedStatements(code)) {
		return {
			kind: "SyntaxError",
			code: "MULTIPLE_STATEMENTS",
			message: "Multiple statements are not supported; submit a single SELECT",
		}
	}

	if (options.requireBoundedScan && !BOUNDING_PATTERNS.some(p => p.test(code))) {
		return {
			kind: "SyntaxError",
			code: "UNBOUNDED_SCAN",
			message: "Unsupported query: distributed queries must aggregate (COUNT/SUM/AVG/MIN/MAX, GROUP BY) or include a LIMIT",
		}
	}

	return null
}
