/**
 * Execution Memory
 *
 * Append-only, ordered record of the attempts of one analysis session.
 * Created per session and passed into the executor; never shared between
 * sessions. Storage is pluggable: in-process by default, or one JSON line per
 * attempt on disk for post-hoc diagnostics.
 */

import * as fs from "fs"
import * as path from "path"
import { z } from "zod"
import { DEFAULTS, ENGINE_IDS, ERROR_KINDS, type Attempt } from "./config.js"
import { StorageError, errorMessage } from "./errors.js"

export interface AttemptStore {
	append(attempt: Attempt): Promise<void>
	list(sessionId: string): Promise<Attempt[]>
}

/**
 * Keeps the attempts of the most recent `maxSessions` sessions; starting one
 * more drops the oldest
 */
export class InMemoryAttemptStore implements AttemptStore {
	private readonly sessions = new Map<string, Attempt[]>()

	constructor(private readonly maxSessions: number = DEFAULTS.memoryMaxSessions) {}

	async append(attempt: Attempt): Promise<void> {
		let list = this.sessions.get(attempt.session_id)
		if (!list) {
			list = []
			this.sessions.set(attempt.session_id, list)
			for (const oldest of this.sessions.keys()) {
				if (this.sessions.size <= this.maxSessions) break
				this.sessions.delete(oldest)
			}
		}
		list.push(attempt)
	}

	get sessionCount(): number {
		return this.sessions.size
	}

	async list(sessionId: string): Promise<Attempt[]> {
		return [...(this.sessions.get(sessionId) ?? [])]
	}
}

const attemptSchema = z.object({
	session_id: z.string(),
	sequence: z.number().int().positive(),
	engine: z.enum(ENGINE_IDS),
	sql: z.string(),
	origin: z.enum(["initial", "correction", "fallback"]),
	outcome: z.discriminatedUnion("status", [
		z.object({ status: z.literal("success"), row_count: z.number(), columns: z.array(z.string()) }),
		z.object({ status: z.literal("failure"), kind: z.enum(ERROR_KINDS), message: z.string() }),
	]),
	started_at: z.string(),
	duration_ms: z.number(),
})

/**
 * One `<session_id>.jsonl` file per session under `dir`
 */
export class JsonlAttemptStore implements AttemptStore {
	constructor(private readonly dir: string) {}

	async append(attempt: Attempt): Promise<void> {
		await fs.promises.mkdir(this.dir, { recursive: true })
		await fs.promises.appendFile(this.fileFor(attempt.session_id), JSON.stringify(attempt) + "\n", "utf-8")
	}

	async list(sessionId: string): Promise<Attempt[]> {
		let raw: string
		try {
			raw = await fs.promises.readFile(this.fileFor(sessionId), "utf-8")
		} catch (error) {
			if (error instanceof Error && "code" in error && error.code === "ENOENT") return []
			throw error
		}
		return raw
			.split("\n")
			.filter(line => line.trim().length > 0)
			.map(line => attemptSchema.parse(JSON.parse(line)))
	}

	private fileFor(sessionId: string): string {
		return path.join(this.dir, `${sessionId.replace(/[^A-Za-z0-9_-]/g, "_")}.jsonl`)
	}
}

function freezeAttempt(attempt: Attempt): Readonly<Attempt> {
	Object.freeze(attempt.outcome)
	if (attempt.outcome.status === "success") Object.freeze(attempt.outcome.columns)
	return Object.freeze(attempt)
}

export class ExecutionMemory {
	private readonly attempts: Attempt[] = []

	constructor(
		readonly sessionId: string,
		private readonly store: AttemptStore = new InMemoryAttemptStore(),
	) {}

	/** Sequence number the next appended attempt must carry */
	get nextSequence(): number {
		return this.attempts.length + 1
	}

	/**
	 * Record one attempt. Rejects (StorageError) attempts from another session,
	 * out-of-order sequence numbers and store failures; the attempt is kept
	 * only once the store has accepted it.
	 */
	async append(attempt: Attempt): Promise<void> {
		if (attempt.session_id !== this.sessionId) {
			throw new StorageError(`Attempt belongs to session ${attempt.session_id}, not ${this.sessionId}`, {
				session_id: this.sessionId,
			})
		}
		if (attempt.sequence !== this.nextSequence) {
			throw new StorageError(`Attempt sequence ${attempt.sequence} out of order, expected ${this.nextSequence}`, {
				session_id: this.sessionId,
				sequence: attempt.sequence,
			})
		}

		const frozen = freezeAttempt(structuredClone(attempt))
		try {
			await this.store.append(frozen)
		} catch (error) {
			throw new StorageError(`Failed to record attempt ${attempt.sequence}: ${errorMessage(error)}`, {
				session_id: this.sessionId,
				sequence: attempt.sequence,
			})
		}
		this.attempts.push(frozen)
	}

	/**
	 * Ordered attempts of this session. Another session id reads through to the store.
	 */
	async history(sessionId: string = this.sessionId): Promise<Attempt[]> {
		if (sessionId === this.sessionId) return [...this.attempts]
		try {
			return await this.store.list(sessionId)
		} catch (error) {
			throw new StorageError(`Failed to read attempts of ${sessionId}: ${errorMessage(error)}`, { session_id: sessionId })
		}
	}

	snapshot(): readonly Attempt[] {
		return [...this.attempts]
	}

	lastFailure(): Attempt | undefined {
		for (let i = this.attempts.length - 1; i >= 0; i--) {
			if (this.attempts[i].outcome.status === "failure") return this.attempts[i]
		}
		return undefined
	}

	/**
	 * The last `limit` failures, oldest first, as prompt-ready text
	 */
	failureContext(limit: number = DEFAULTS.failureContextLimit): string {
		const failures = this.attempts.filter(a => a.outcome.status === "failure").slice(-limit)
		if (failures.length === 0) return ""

		const lines = ["Previous failed attempts:"]
		for (const attempt of failures) {
			if (attempt.outcome.status !== "failure") continue
			lines.push(`- Attempt ${attempt.sequence} on ${attempt.engine}: ${attempt.outcome.kind}: ${attempt.outcome.message}`)
			lines.push(`  SQL: ${attempt.sql}`)
		}
		return lines.join("\n")
	}
}
