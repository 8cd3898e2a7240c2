import { getConfig } from "../config.js";
import {
  BackendRejectedError,
  BackendUnavailableError,
  CancelledError,
  TransportError,
  ValidationError,
} from "../errors.js";
import { BackendErrorSchema, GenerationResponseSchema, backendErrorMessage } from "../schemas.js";
import { createLogger } from "../utils/logger.js";
import { withRetry, type RetryOptions } from "../utils/retry.js";
import type { GenerateOptions, GenerationRequest, GenerationResult, Generator, InteractionEvent } from "./types.js";

const log = createLogger("backend");

export type GenerationClientOptions = {
  baseUrl?: string;
  /** Endpoint path appended to baseUrl (default: /api/generate) */
  path?: string;
  model?: string;
  headers?: Record<string, string>;
  /** Per-exchange timeout in ms */
  timeout?: number;
  retry?: Partial<Pick<RetryOptions, "maxAttempts" | "baseDelayMs" | "maxDelayMs" | "jitter" | "deadlineMs">>;
  fetch?: typeof fetch;
  onInteraction?: (event: InteractionEvent) => void;
  /** Jitter source, for tests */
  random?: () => number;
};

let totalAttempts = 0;

/** Exchanges attempted by every client in this process. Diagnostics only. */
export function getTotalAttempts(): number {
  return totalAttempts;
}

export function resetTotalAttempts(): void {
  totalAttempts = 0;
}

/** HTTP statuses treated as transient besides 5xx. */
const RETRYABLE_STATUS = new Set([408, 429]);

export class GenerationClient implements Generator {
  readonly baseUrl: string;
  readonly model: string;

  private url: string;
  private headers: Record<string, string>;
  private timeout: number;
  private retry: Pick<RetryOptions, "maxAttempts" | "baseDelayMs" | "maxDelayMs" | "jitter" | "deadlineMs">;
  private fetchImpl: typeof fetch;
  private onInteraction?: (event: InteractionEvent) => void;
  private random?: () => number;
  private requestCount = 0;

  constructor(opts: GenerationClientOptions = {}) {
    const cfg = getConfig();
    this.baseUrl = (opts.baseUrl ?? cfg.backend.baseUrl).replace(/\/+$/, "");
    this.url = `${this.baseUrl}${opts.path ?? cfg.backend.path}`;
    this.model = opts.model ?? cfg.backend.model;
    this.headers = opts.headers ?? {};
    this.timeout = opts.timeout ?? cfg.timeouts.generationMs;
    this.retry = { ...cfg.retry, ...opts.retry };
    this.fetchImpl = opts.fetch ?? fetch;
    this.onInteraction = opts.onInteraction;
    this.random = opts.random;
  }

  async generate(request: GenerationRequest, opts?: GenerateOptions): Promise<GenerationResult> {
    const timeoutMs = opts?.timeoutMs ?? this.timeout;
    if (!request.context.trim()) {
      throw new ValidationError("VALIDATION_FAILED", "Generation context must not be empty");
    }
    if (!request.prompt.trim()) {
      throw new ValidationError("VALIDATION_FAILED", "Generation prompt must not be empty");
    }
    if (!(timeoutMs > 0)) {
      throw new ValidationError("VALIDATION_FAILED", `Timeout must be positive, got ${timeoutMs}`);
    }

    const model = request.model ?? this.model;
    const start = Date.now();
    let attempts = 0;

    const deadlineMs = this.retry.deadlineMs;

    const text = await withRetry(
      (attempt) => {
        attempts = attempt;
        // An exchange never runs past the overall deadline.
        const left = deadlineMs === undefined ? timeoutMs : deadlineMs - (Date.now() - start);
        return this.exchange(request, model, attempt, Math.max(1, Math.min(timeoutMs, left)), opts?.signal);
      },
      {
        ...this.retry,
        now: () => Date.now() - start,
        signal: opts?.signal,
        random: this.random,
        shouldRetry: (err) => err instanceof TransportError,
        onRetry: (attempt, err, delayMs) => {
          log.warn(`Attempt ${attempt} failed, retrying in ${delayMs}ms`, { model, error: String(err) });
        },
        onExhausted: (lastError, tried) => new BackendUnavailableError(tried, lastError),
      },
    );

    return { text, model, latencyMs: Date.now() - start, attempts };
  }

  /** One network exchange. Throws TransportError for anything worth retrying. */
  private async exchange(
    request: GenerationRequest,
    model: string,
    attempt: number,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<string> {
    totalAttempts++;
    const requestId = ++this.requestCount;
    this.emit({ type: "request", requestId, attempt, model, promptLength: request.prompt.length });

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const cfg = getConfig().generation;
      const res = await this.fetchImpl(this.url, {
        method: "POST",
        headers: { "Content-Type": "application/json", ...this.headers },
        body: JSON.stringify({
          model,
          prompt: request.prompt,
          context: request.context,
          system: request.context,
          stream: false,
          options: { temperature: cfg.temperature, top_k: cfg.topK, top_p: cfg.topP },
          ...(request.format ? { format: request.format } : {}),
        }),
        signal: controller.signal,
      });
      const raw = await res.text();

      if (!res.ok) {
        throw this.classifyHttpFailure(res.status, raw);
      }

      const text = this.validateBody(raw, request.format);
      this.emit({ type: "response", requestId, attempt, model, responseLength: text.length });
      return text;
    } catch (err) {
      const mapped = this.mapError(err, timedOut, timeoutMs, signal);
      this.emit({ type: "error", requestId, attempt, model, error: mapped.message });
      throw mapped;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }
  }

  private classifyHttpFailure(status: number, raw: string): Error {
    const detail = this.errorDetail(raw);
    if (status >= 500 || RETRYABLE_STATUS.has(status)) {
      return new TransportError("http", `HTTP ${status}: ${detail}`, { httpStatus: status });
    }
    return new BackendRejectedError(status, detail);
  }

  private errorDetail(raw: string): string {
    try {
      const parsed = BackendErrorSchema.safeParse(JSON.parse(raw));
      if (parsed.success) return backendErrorMessage(parsed.data);
    } catch {
      // not JSON; fall back to the raw body
    }
    return raw.slice(0, 200) || "(empty body)";
  }

  private validateBody(raw: string, format?: "json"): string {
    let body: unknown;
    try {
      body = JSON.parse(raw);
    } catch (err) {
      throw new TransportError("malformed", "Response body is not JSON", { cause: err });
    }
    const parsed = GenerationResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new TransportError("malformed", "Response body has no generated text");
    }
    const text = parsed.data.trim();
    const minLength = getConfig().generation.minResponseLength;
    if (text.length < minLength) {
      throw new TransportError("malformed", `Generated text shorter than ${minLength} characters`);
    }
    if (format === "json") {
      try {
        JSON.parse(text);
      } catch (err) {
        throw new TransportError("malformed", "Generated text is not valid JSON", { cause: err });
      }
    }
    return text;
  }

  private mapError(err: unknown, timedOut: boolean, timeoutMs: number, signal?: AbortSignal): Error {
    if (err instanceof TransportError || err instanceof BackendRejectedError) return err;
    if (signal?.aborted) return new CancelledError();
    if (timedOut) {
      return new TransportError("timeout", `No response within ${timeoutMs}ms`, { cause: err });
    }
    return new TransportError("network", err instanceof Error ? err.message : String(err), { cause: err });
  }

  private emit(event: InteractionEvent): void {
    if (!this.onInteraction) return;
    try {
      this.onInteraction(event);
    } catch (err) {
      log.warn("Interaction listener threw", { error: String(err) });
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      const res = await this.fetchImpl(this.baseUrl, {
        method: "GET",
        signal: AbortSignal.timeout(getConfig().timeouts.healthCheckMs),
      });
      return res.ok;
    } catch (err) {
      log.debug("Health check failed", { url: this.baseUrl, error: String(err) });
      return false;
    }
  }
}
