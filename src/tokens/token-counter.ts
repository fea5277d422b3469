// =============================================================================
// TokenCounter — Backend selection and degradation for token estimation
// =============================================================================

import { TiktokenTokenCounter } from "../adapters/token-counter/tiktoken.adapter.js";
import type { TokenCounterBackend } from "../config.js";
import { ValidationError, errorMessage } from "../errors.js";
import { createLogger } from "../logging.js";
import type { ChatMessage, TokenEstimatorPort } from "../ports/token-counter.port.js";

export const DEFAULT_COUNT_MODEL = "gpt-4o";

/** Model families the local (OpenAI) tokenizer only approximates. */
const FOREIGN_MODEL_PREFIXES = ["claude", "gemini", "llama", "mistral", "mixtral"];

const logger = createLogger("token-counter");

let sharedLocal: TiktokenTokenCounter | undefined;

function defaultLocalCounter(): TiktokenTokenCounter {
  sharedLocal ??= new TiktokenTokenCounter();
  return sharedLocal;
}

export interface TokenCounterOptions {
  /** "auto" uses the external estimator when one is given, else the local tokenizer */
  backend?: TokenCounterBackend;
  /** Model-aware estimator used by the "external" backend */
  estimator?: TokenEstimatorPort;
  /** Local backend override (default: tiktoken) */
  local?: TokenEstimatorPort;
}

export class TokenCounter {
  readonly backend: "local" | "external";
  private readonly estimator?: TokenEstimatorPort;
  private localCounter?: TokenEstimatorPort;
  private readonly warnedModels = new Set<string>();

  constructor(options: TokenCounterOptions = {}) {
    const requested = options.backend ?? "auto";
    if (requested === "external" && !options.estimator) {
      throw new ValidationError('"external" requires an estimator', "backend");
    }
    this.backend = requested === "local" || !options.estimator ? "local" : "external";
    this.estimator = options.estimator;
    this.localCounter = options.local;
  }

  /** Models counted with a tokenizer from another vendor. */
  get approximatedModels(): ReadonlySet<string> {
    return this.warnedModels;
  }

  countTokens(text: string, model: string = DEFAULT_COUNT_MODEL): number {
    if (!text) return 0;
    return this.dispatch(model, (counter) => counter.count(text, model));
  }

  countMessages(messages: readonly ChatMessage[], model: string = DEFAULT_COUNT_MODEL): number {
    if (!messages.length) return 0;
    return this.dispatch(model, (counter) => counter.countMessages(messages, model));
  }

  private dispatch(model: string, count: (counter: TokenEstimatorPort) => number): number {
    if (this.backend === "external" && this.estimator) {
      try {
        return count(this.estimator);
      } catch (error) {
        logger.warn("estimator:failed", { model, error: errorMessage(error), fallback: "local" });
      }
    }
    this.noteApproximation(model);
    return count(this.local());
  }

  private local(): TokenEstimatorPort {
    this.localCounter ??= defaultLocalCounter();
    return this.localCounter;
  }

  private noteApproximation(model: string): void {
    if (this.warnedModels.has(model)) return;
    const lower = model.toLowerCase();
    if (!FOREIGN_MODEL_PREFIXES.some((prefix) => lower.startsWith(prefix))) return;
    this.warnedModels.add(model);
    logger.warn("tokenizer:cross-vendor", {
      model,
      detail: "local tokenizer counts for this model family are approximate",
    });
  }
}

export function countTokens(
  text: string,
  model: string = DEFAULT_COUNT_MODEL,
  options?: TokenCounterOptions,
): number {
  return new TokenCounter(options).countTokens(text, model);
}

export function countMessages(
  messages: readonly ChatMessage[],
  model: string = DEFAULT_COUNT_MODEL,
  options?: TokenCounterOptions,
): number {
  return new TokenCounter(options).countMessages(messages, model);
}
