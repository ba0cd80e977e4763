import OpenAI from "openai";
import { parseTaggingResponse } from "../pipeline/model-response.js";
import type { ModelClient, ModelCompletion, ModelCompletionOptions, RunLogLevel } from "../types.js";
import { TimeoutError, backoffDelayMs, delay, withTimeout } from "../utils/async.js";

export const DEFAULT_TEMPERATURE = 0.3;

/** Placeholder key for local servers that ignore authentication. */
const LOCAL_API_KEY = "local-model-server";

export interface ModelTelemetryEvent {
  level: RunLogLevel;
  stage: string;
  event: string;
  message: string;
  payload?: Record<string, unknown>;
}

export type ModelTelemetryCallback = (event: ModelTelemetryEvent) => void;

/** Subset of the openai SDK surface used here, so tests can inject a stub. */
export interface ChatCompletionsApi {
  create(body: {
    model: string;
    messages: Array<{ role: "system" | "user"; content: string }>;
    temperature: number;
    response_format: { type: "json_object" };
  }): Promise<{
    model?: string;
    choices: Array<{ message?: { content?: string | null } | null }>;
    usage?: unknown;
  }>;
}

export interface OpenAIModelClientOptions {
  model: string;
  baseURL?: string;
  apiKey?: string;
  timeoutMs: number;
  maxRetries: number;
  retryBaseMs: number;
  retryMaxMs: number;
  telemetry?: ModelTelemetryCallback;
  completions?: ChatCompletionsApi;
}

interface ModelClientStats {
  call_count: number;
  retry_count: number;
  timeout_count: number;
  request_failure_count: number;
}

const SYSTEM_PROMPT =
  "You tag vape and CBD retail products with an approved vocabulary. Reply with a single JSON object only.";

function readField(error: unknown, key: string): unknown {
  if (typeof error === "object" && error !== null && key in error) {
    return Reflect.get(error, key);
  }
  return undefined;
}

function isRetryableError(error: unknown): boolean {
  if (error instanceof TimeoutError) {
    return true;
  }

  const status = readField(error, "status");
  if (typeof status === "number" && (status === 429 || status >= 500)) {
    return true;
  }

  const code = readField(error, "code");
  if (typeof code === "string" && ["ETIMEDOUT", "ECONNRESET", "ECONNABORTED", "ECONNREFUSED"].includes(code)) {
    return true;
  }

  const message = readField(error, "message");
  if (typeof message === "string") {
    const normalized = message.toLowerCase();
    return (
      normalized.includes("timeout") ||
      normalized.includes("timed out") ||
      normalized.includes("rate limit") ||
      normalized.includes("too many requests")
    );
  }

  return false;
}

function serializeError(error: unknown): Record<string, unknown> {
  const status = readField(error, "status");
  const code = readField(error, "code");
  return {
    name: error instanceof Error ? error.name : null,
    message: error instanceof Error ? error.message : String(readField(error, "message") ?? error),
    status: typeof status === "number" ? status : null,
    code: typeof code === "string" ? code : null,
  };
}

/**
 * Model client for any OpenAI-compatible chat endpoint (OpenAI itself, or a
 * local server such as Ollama's /v1). Retries transient failures with
 * jittered backoff and reports every attempt through the telemetry callback.
 */
export class OpenAIModelClient implements ModelClient {
  readonly name: string;

  private readonly completions: ChatCompletionsApi;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryBaseMs: number;
  private readonly retryMaxMs: number;
  private readonly telemetry?: ModelTelemetryCallback;

  private readonly stats: ModelClientStats = {
    call_count: 0,
    retry_count: 0,
    timeout_count: 0,
    request_failure_count: 0,
  };

  constructor(options: OpenAIModelClientOptions) {
    this.name = options.model;
    this.completions =
      options.completions ??
      new OpenAI({
        apiKey: options.apiKey ?? LOCAL_API_KEY,
        baseURL: options.baseURL,
        maxRetries: 0,
      }).chat.completions;
    this.timeoutMs = options.timeoutMs;
    this.maxRetries = options.maxRetries;
    this.retryBaseMs = options.retryBaseMs;
    this.retryMaxMs = options.retryMaxMs;
    this.telemetry = options.telemetry;
  }

  getStats(): ModelClientStats {
    return { ...this.stats };
  }

  async complete(prompt: string, options: ModelCompletionOptions = {}): Promise<ModelCompletion> {
    this.stats.call_count += 1;
    const requestBody = {
      model: this.name,
      messages: [
        { role: "system" as const, content: SYSTEM_PROMPT },
        { role: "user" as const, content: prompt },
      ],
      temperature: options.temperature ?? DEFAULT_TEMPERATURE,
      response_format: { type: "json_object" as const },
    };

    const response = await this.withRetry(requestBody, () => this.completions.create(requestBody));
    const text = response.choices[0]?.message?.content ?? "";
    return {
      text,
      confidence: parseTaggingResponse(text)?.confidence ?? 0,
    };
  }

  private emitTelemetry(event: ModelTelemetryEvent): void {
    this.telemetry?.(event);
  }

  private async withRetry<T extends { model?: string; usage?: unknown }>(
    requestBody: { model: string; temperature: number },
    operation: () => Promise<T>,
  ): Promise<T> {
    const totalAttempts = this.maxRetries + 1;

    this.emitTelemetry({
      level: "debug",
      stage: "model",
      event: "model.call.started",
      message: `Model call started (${this.name}).`,
      payload: {
        model: requestBody.model,
        temperature: requestBody.temperature,
        total_attempts: totalAttempts,
      },
    });

    for (let attempt = 1; attempt <= totalAttempts; attempt += 1) {
      const attemptStartedAt = Date.now();
      try {
        const response = await withTimeout(operation(), this.timeoutMs, "model_request_timeout");

        this.emitTelemetry({
          level: "debug",
          stage: "model",
          event: "model.attempt.succeeded",
          message: `Model attempt succeeded (${this.name}).`,
          payload: {
            model: requestBody.model,
            attempt,
            elapsed_ms: Date.now() - attemptStartedAt,
            response_metadata: { model: response.model ?? null, usage: response.usage ?? null },
          },
        });

        return response;
      } catch (error) {
        if (error instanceof TimeoutError) {
          this.stats.timeout_count += 1;
        }

        const retryable = isRetryableError(error);
        const errorPayload = serializeError(error);

        this.emitTelemetry({
          level: "warn",
          stage: "model",
          event: "model.attempt.failed",
          message: `Model attempt failed (${this.name}).`,
          payload: {
            model: requestBody.model,
            attempt,
            total_attempts: totalAttempts,
            retryable,
            elapsed_ms: Date.now() - attemptStartedAt,
            error: errorPayload,
          },
        });

        if (!retryable || attempt === totalAttempts) {
          this.stats.request_failure_count += 1;
          this.emitTelemetry({
            level: "error",
            stage: "model",
            event: "model.call.failed",
            message: `Model call failed (${this.name}).`,
            payload: {
              model: requestBody.model,
              attempt,
              total_attempts: totalAttempts,
              error: errorPayload,
            },
          });
          throw error;
        }

        this.stats.retry_count += 1;
        const delayMs = backoffDelayMs(attempt, this.retryBaseMs, this.retryMaxMs);

        this.emitTelemetry({
          level: "warn",
          stage: "model",
          event: "model.retry.scheduled",
          message: `Model retry scheduled (${this.name}).`,
          payload: {
            model: requestBody.model,
            attempt,
            total_attempts: totalAttempts,
            delay_ms: delayMs,
          },
        });

        await delay(delayMs);
      }
    }

    throw new Error("unreachable_retry_state");
  }
}
