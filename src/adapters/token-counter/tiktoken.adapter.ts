// =============================================================================
// TiktokenTokenCounter — Local BPE token counting via tiktoken
// =============================================================================

import { createRequire } from "node:module";
import { TokenCountError, errorMessage } from "../../errors.js";
import { createLogger } from "../../logging.js";
import type { ChatMessage, TokenEstimatorPort } from "../../ports/token-counter.port.js";
import { ApproximateTokenCounter } from "./approximate.adapter.js";

type TiktokenEncoding = {
  encode: (text: string, allowedSpecial?: string[], disallowedSpecial?: string[]) => ArrayLike<number>;
  free: () => void;
};
type TiktokenModule = {
  encoding_for_model: (model: string) => TiktokenEncoding;
  get_encoding: (encoding: string) => TiktokenEncoding;
};

const DEFAULT_ENCODING = "cl100k_base";
const CONVERSATION_OVERHEAD_TOKENS = 3;
const FRAMED_ROLES = new Set(["system", "user", "assistant", "tool"]);

const logger = createLogger("token-counter");
const fallback = new ApproximateTokenCounter();

function loadTiktoken(): TiktokenModule | null {
  try {
    const require = createRequire(import.meta.url);
    const mod: TiktokenModule = require("tiktoken");
    return mod;
  } catch (error) {
    logger.warn("tiktoken:unavailable", { error: errorMessage(error), fallback: "approximate" });
    return null;
  }
}

/** ChatML framing applied to each message before encoding. */
export function frameMessage(message: ChatMessage): string {
  const role = FRAMED_ROLES.has(message.role) ? message.role : "user";
  return `<|im_start|>${role}\n${message.content}<|im_end|>\n`;
}

export class TiktokenTokenCounter implements TokenEstimatorPort {
  private readonly tiktoken: TiktokenModule | null;
  private readonly encodingCache = new Map<string, TiktokenEncoding>();
  private readonly maxCacheSize: number;

  constructor(options?: { maxCacheSize?: number }) {
    this.maxCacheSize = options?.maxCacheSize ?? 16;
    this.tiktoken = loadTiktoken();
  }

  /** False when tiktoken failed to load and counts are character-based approximations. */
  get available(): boolean {
    return this.tiktoken !== null;
  }

  count(text: string, model: string): number {
    if (!text) return 0;
    if (!this.tiktoken) return fallback.count(text);
    return this.encode(text, model);
  }

  countMessages(messages: readonly ChatMessage[], model: string): number {
    if (!messages.length) return 0;
    if (!this.tiktoken) return fallback.countMessages(messages);
    return messages.reduce(
      (sum, msg) => sum + this.encode(frameMessage(msg), model),
      CONVERSATION_OVERHEAD_TOKENS,
    );
  }

  /** Release cached encodings */
  dispose(): void {
    for (const enc of this.encodingCache.values()) enc.free();
    this.encodingCache.clear();
  }

  private encode(text: string, model: string): number {
    try {
      // Special-token text inside user content is counted as plain text
      return this.getEncoding(model).encode(text, [], []).length;
    } catch (error) {
      throw new TokenCountError(`Failed to count tokens for ${model}: ${errorMessage(error)}`, model, error);
    }
  }

  private getEncoding(model: string): TiktokenEncoding {
    const cached = this.encodingCache.get(model);
    if (cached) return cached;
    if (!this.tiktoken) throw new Error("tiktoken is not loaded");

    let enc: TiktokenEncoding;
    try {
      enc = this.tiktoken.encoding_for_model(model);
    } catch {
      // Models tiktoken does not know use the default encoding
      enc = this.tiktoken.get_encoding(DEFAULT_ENCODING);
    }

    if (this.encodingCache.size >= this.maxCacheSize) {
      const oldest = this.encodingCache.keys().next();
      if (!oldest.done) {
        this.encodingCache.get(oldest.value)?.free();
        this.encodingCache.delete(oldest.value);
      }
    }
    this.encodingCache.set(model, enc);
    return enc;
  }
}
