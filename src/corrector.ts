/**
 * Corrector
 *
 * Maps (failed SQL, error context) to a candidate SQL through the generator's
 * repair capability. It does not judge the candidate (the next execution
 * does) and never writes to Execution Memory (the executor does).
 */

import { DEFAULTS } from "./config.js"
import { AnalysisError, GenerationError, errorMessage } from "./errors.js"
import type { RepairRequest, SqlGenerator } from "./sql_generator.js"

export type CorrectionRequest = RepairRequest

export interface Corrector {
	correct(request: CorrectionRequest): Promise<string>
}

export interface SqlCorrectorOptions {
	timeoutMs?: number
}

export class SqlCorrector implements Corrector {
	private readonly timeoutMs: number

	constructor(
		private readonly generator: SqlGenerator,
		options: SqlCorrectorOptions = {},
	) {
		this.timeoutMs = options.timeoutMs ?? DEFAULTS.collaboratorTimeoutMs
	}

	async correct(request: CorrectionRequest): Promise<string> {
		let timer: NodeJS.Timeout | undefined
		const deadline = new Promise<never>((_, reject) => {
			timer = setTimeout(() => {
				reject(new GenerationError(`Correction timed out after ${this.timeoutMs}ms`, true, { engine: request.engine }))
			}, this.timeoutMs)
		})

		let candidate: string
		try {
			candidate = await Promise.race([this.generator.repair(request), deadline])
		} catch (error) {
			if (error instanceof GenerationError) throw error
			const recoverable = error instanceof AnalysisError && error.recoverable
			throw new GenerationError(`Correction failed: ${errorMessage(error)}`, recoverable, { engine: request.engine })
		} finally {
			clearTimeout(timer)
		}

		const sql = candidate.trim()
		if (!sql) {
			throw new GenerationError("Correction produced empty SQL", true, { engine: request.engine })
		}
		return sql
	}
}
