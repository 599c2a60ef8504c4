/**
 * Ollama HTTP Client
 *
 * Chat completions for the planner and SQL generator.
 *
 * Responsibilities:
 * - POST to Ollama /api/chat (non-streaming)
 * - Handle timeouts
 * - Circuit breaker: fail fast after a connection failure; after retryAfterMs one
 *   request is let through (half-open) and a success closes the circuit again
 * - Optional periodic health checks
 */

import { z } from "zod"
import { AnalysisError, errorMessage } from "./errors.js"

export interface ChatRequest {
	system: string
	user: string
	temperature?: number
}

export interface LlmClient {
	chat(request: ChatRequest): Promise<string>
}

export interface OllamaClientOptions {
	baseUrl: string
	model: string
	timeoutMs: number
	numCtx: number
	temperature: number
	/** How long the circuit stays open before a request is let through again */
	retryAfterMs?: number
}

const chatResponseSchema = z.object({
	message: z.object({
		role: z.string(),
		content: z.string(),
	}),
	eval_count: z.number().optional(),
	total_duration: z.number().optional(),
})

export class OllamaClient implements LlmClient {
	private readonly baseUrl: string
	private readonly retryAfterMs: number
	private isHealthy: boolean = true
	private openedAt = 0
	private healthCheckInterval?: NodeJS.Timeout

	constructor(private readonly options: OllamaClientOptions) {
		this.baseUrl = options.baseUrl.replace(/\/+$/, "")
		this.retryAfterMs = options.retryAfterMs ?? 5000
	}

	async chat(request: ChatRequest): Promise<string> {
		// Circuit breaker: if Ollama was unreachable recently, fail fast
		if (!this.isHealthy && Date.now() - this.openedAt < this.retryAfterMs) {
			throw new AnalysisError(
				"generation",
				"Ollama is unavailable. Please try again later.",
				true,
				{ baseUrl: this.baseUrl },
			)
		}

		const url = `${this.baseUrl}/api/chat`
		const controller = new AbortController()
		const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs)

		try {
			const response = await fetch(url, {
				method: "POST",
				headers: {
					"Content-Type": "application/json",
					"Accept": "application/json",
				},
				body: JSON.stringify({
					model: this.options.model,
					stream: false,
					messages: [
						{ role: "system", content: request.system },
						{ role: "user", content: request.user },
					],
					options: {
						temperature: request.temperature ?? this.options.temperature,
						num_ctx: this.options.numCtx,
					},
				}),
				signal: controller.signal,
			})
			// Reachable again: close the circuit
			this.isHealthy = true

			if (!response.ok) {
				const errorText = await response.text()
				throw new AnalysisError(
					"generation",
					`Ollama returned error: ${response.status} ${errorText}`,
					response.status >= 500, // 5xx errors are recoverable
					{ statusCode: response.status, responseBody: errorText },
				)
			}

			const parsed = chatResponseSchema.safeParse(await response.json())
			if (!parsed.success) {
				throw new AnalysisError("generation", "Ollama returned an unexpected response shape", false, {
					issues: parsed.error.issues.map(i => i.message),
				})
			}
			return parsed.data.message.content
		} catch (error) {
			// Handle timeout
			if (error instanceof Error && error.name === "AbortError") {
				throw new AnalysisError(
					"generation",
					`Ollama request timed out after ${this.options.timeoutMs}ms`,
					true,
					{ timeout: this.options.timeoutMs, url },
				)
			}

			// Handle network errors
			if (error instanceof TypeError) {
				this.isHealthy = false
				this.openedAt = Date.now()
				throw new AnalysisError(
					"generation",
					`Cannot connect to Ollama at ${this.baseUrl}. Is it running?`,
					true,
					{ baseUrl: this.baseUrl, originalError: error.message },
				)
			}

			if (error instanceof AnalysisError) {
				throw error
			}

			throw new AnalysisError(
				"generation",
				`Unexpected error communicating with Ollama: ${errorMessage(error)}`,
				false,
				{ originalError: String(error) },
			)
		} finally {
			clearTimeout(timeoutId)
		}
	}

	/**
	 * GET /api/tags; a success closes the circuit again
	 */
	async healthCheck(): Promise<boolean> {
		const controller = new AbortController()
		const timeoutId = setTimeout(() => controller.abort(), 5000)
		try {
			const response = await fetch(`${this.baseUrl}/api/tags`, { method: "GET", signal: controller.signal })
			this.isHealthy = response.ok
		} catch {
			this.isHealthy = false
		} finally {
			clearTimeout(timeoutId)
		}
		if (!this.isHealthy) this.openedAt = Date.now()
		return this.isHealthy
	}

	/**
	 * Check Ollama every intervalMs so the circuit closes without waiting for a request
	 */
	startHealthChecks(intervalMs: number = 30000): void {
		if (this.healthCheckInterval) return

		this.healthCheckInterval = setInterval(() => {
			void this.healthCheck()
		}, intervalMs)
		this.healthCheckInterval.unref()
	}

	stopHealthChecks(): void {
		if (this.healthCheckInterval) {
			clearInterval(this.healthCheckInterval)
			this.healthCheckInterval = undefined
		}
	}

	get healthy(): boolean {
		return this.isHealthy
	}
}
