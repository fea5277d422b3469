// =============================================================================
// Call payload readers — Model, messages, usage and output text
// =============================================================================

import { z } from "zod";
import type { ChatMessage } from "../ports/token-counter.port.js";

export interface CallRequest {
  model: string;
  messages: ChatMessage[];
}

export interface ReportedUsage {
  inputTokens?: number;
  outputTokens?: number;
}

const ContentPartSchema = z.object({ text: z.string() });

const MessageSchema = z.object({
  role: z.string().catch("user"),
  content: z
    .union([z.string(), z.array(z.unknown())])
    .nullish()
    .transform((content) => {
      if (typeof content === "string") return content;
      if (!content) return "";
      return content
        .map((part) => {
          const parsed = ContentPartSchema.safeParse(part);
          return parsed.success ? parsed.data.text : "";
        })
        .join("");
    }),
});

const CallParamsSchema = z.object({
  model: z.string().optional(),
  messages: z.array(z.unknown()).optional(),
});

const TokenCountSchema = z.number().nonnegative().nullish();

const UsageSchema = z.object({
  usage: z.object({
    prompt_tokens: TokenCountSchema,
    completion_tokens: TokenCountSchema,
    input_tokens: TokenCountSchema,
    output_tokens: TokenCountSchema,
    inputTokens: TokenCountSchema,
    outputTokens: TokenCountSchema,
  }),
});

const OutputTextSchema = z.union([
  z
    .object({ choices: z.array(z.object({ message: z.object({ content: z.string() }) })).nonempty() })
    .transform((r) => r.choices[0].message.content),
  z
    .object({ content: z.array(ContentPartSchema).nonempty() })
    .transform((r) => r.content[0].text),
  z.object({ text: z.string() }).transform((r) => r.text),
]);

function toMessages(raw: readonly unknown[]): ChatMessage[] {
  const messages: ChatMessage[] = [];
  for (const item of raw) {
    const parsed = MessageSchema.safeParse(item);
    if (parsed.success) messages.push(parsed.data);
  }
  return messages;
}

/**
 * Reads `(params)` with `{ model, messages }` or positional `(model, messages)`
 * arguments. Unrecognized shapes give model "unknown" and no messages.
 */
export function readCallRequest(args: readonly unknown[]): CallRequest {
  const [first, second] = args;
  const params = CallParamsSchema.safeParse(first);
  if (params.success && (params.data.model !== undefined || params.data.messages !== undefined)) {
    return {
      model: params.data.model ?? "unknown",
      messages: toMessages(params.data.messages ?? []),
    };
  }
  return {
    model: typeof first === "string" ? first : "unknown",
    messages: Array.isArray(second) ? toMessages(second) : [],
  };
}

/** Token usage reported by the response, if it carries a recognizable `usage` field. */
export function readUsage(response: unknown): ReportedUsage | undefined {
  const parsed = UsageSchema.safeParse(response);
  if (!parsed.success) return undefined;
  const u = parsed.data.usage;
  const inputTokens = u.prompt_tokens ?? u.input_tokens ?? u.inputTokens ?? undefined;
  const outputTokens = u.completion_tokens ?? u.output_tokens ?? u.outputTokens ?? undefined;
  if (inputTokens === undefined && outputTokens === undefined) return undefined;
  return { inputTokens, outputTokens };
}

export function readOutputText(response: unknown): string | undefined {
  const parsed = OutputTextSchema.safeParse(response);
  return parsed.success ? parsed.data : undefined;
}
