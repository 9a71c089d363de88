/**
 * Provider-agnostic LLM adapter interface.
 *
 * The evaluation core only ever asks for a single text completion; every
 * provider (OpenAI, Anthropic, offline fixtures) implements this contract.
 */

/**
 * Usage metrics returned by LLM calls for telemetry.
 */
export interface UsageMetrics {
  input_tokens: number;
  output_tokens: number;
}

/**
 * Arguments for a single completion.
 */
export interface CompleteArgs {
  /** System instructions (persona); optional */
  system?: string;
  prompt: string;
  maxTokens: number;
  temperature: number;
}

export interface CompleteResult {
  text: string;
  model: string;
  usage: UsageMetrics;
}

/**
 * Per-call options shared by every adapter method.
 */
export interface CallOpts {
  requestId: string;
  timeoutMs: number;
  /** External cancellation, e.g. the run deadline */
  abortSignal?: AbortSignal;
}

export interface LLMAdapter {
  readonly name: "openai" | "anthropic" | "fixtures" | (string & {});
  readonly model: string;

  complete(args: CompleteArgs, opts: CallOpts): Promise<CompleteResult>;
}
