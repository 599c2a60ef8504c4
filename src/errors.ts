/**
 * Error types for structured error handling
 *
 * EngineError is the only thing an engine adapter may reject with; the
 * executor reasons about `kind` and never about backend exception types.
 * AnalysisError covers everything that is fatal to a session.
 */

import type { Attempt, EngineId, ErrorKind } from "./config.js"

export class EngineError extends Error {
	constructor(
		public readonly kind: ErrorKind,
		public readonly engine: EngineId,
		message: string,
		/** Backend-specific code (SQLSTATE, Livy ename, DuckDB error type) */
		public readonly code?: string,
	) {
		super(message)
		this.name = "EngineError"
	}
}

export type AnalysisErrorType = "planning" | "generation" | "execution" | "storage" | "config" | "plot"

export class AnalysisError extends Error {
	/** Attempts recorded before the failure, when raised from inside a session */
	public attempts: readonly Attempt[] = []

	constructor(
		public readonly type: AnalysisErrorType,
		message: string,
		public readonly recoverable: boolean = false,
		public readonly context?: Record<string, unknown>,
	) {
		super(message)
		this.name = "AnalysisError"
	}
}

export class PlanningError extends AnalysisError {
	constructor(message: string, recoverable = false, context?: Record<string, unknown>) {
		super("planning", message, recoverable, context)
		this.name = "PlanningError"
	}
}

export class GenerationError extends AnalysisError {
	constructor(message: string, recoverable = false, context?: Record<string, unknown>) {
		super("generation", message, recoverable, context)
		this.name = "GenerationError"
	}
}

export class StorageError extends AnalysisError {
	constructor(message: string, context?: Record<string, unknown>) {
		super("storage", message, false, context)
		this.name = "StorageError"
	}
}

export class ConfigError extends AnalysisError {
	constructor(message: string, context?: Record<string, unknown>) {
		super("config", message, false, context)
		this.name = "ConfigError"
	}
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}
