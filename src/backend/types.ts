export type GenerationRequest = {
  /** Role and capability text the backend receives as its system context */
  context: string;
  /** The task itself */
  prompt: string;
  /** Overrides the client's default model */
  model?: string;
  /** Ask the backend for a JSON document and reject anything that does not parse */
  format?: "json";
};

export type GenerateOptions = {
  timeoutMs?: number;
  signal?: AbortSignal;
};

export type GenerationResult = {
  text: string;
  model: string;
  latencyMs: number;
  attempts: number;
};

/** What a worker needs from a backend. `GenerationClient` is the HTTP implementation. */
export interface Generator {
  generate(request: GenerationRequest, opts?: GenerateOptions): Promise<GenerationResult>;
}

export type InteractionEvent =
  | { type: "request"; requestId: number; attempt: number; model: string; promptLength: number }
  | { type: "response"; requestId: number; attempt: number; model: string; responseLength: number }
  | { type: "error"; requestId: number; attempt: number; model: string; error: string };
