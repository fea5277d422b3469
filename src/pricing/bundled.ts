// =============================================================================
// Bundled pricing — USD per 1K tokens: [input, output]
// =============================================================================

export const BUNDLED_PRICING: Readonly<Record<string, readonly [number, number]>> = {
  // OpenAI
  "gpt-4.1":                    [0.003, 0.012],
  "gpt-4.1-mini":               [0.0008, 0.0032],
  "gpt-4.1-nano":               [0.0002, 0.0008],
  "gpt-4o":                     [0.0025, 0.01],
  "gpt-4o-mini":                [0.00015, 0.0006],
  "gpt-4-turbo":                [0.01, 0.03],
  "gpt-4":                      [0.03, 0.06],
  "gpt-3.5-turbo":              [0.0005, 0.002],
  // Anthropic
  "claude-3-5-sonnet-20241022": [0.003, 0.015],
  "claude-3-5-sonnet":          [0.003, 0.015],
  "claude-3-opus-20240229":     [0.015, 0.075],
  "claude-3-opus":              [0.015, 0.075],
  "claude-3-sonnet-20240229":   [0.003, 0.015],
  "claude-3-sonnet":            [0.003, 0.015],
  "claude-3-haiku-20240307":    [0.00025, 0.00125],
  "claude-3-haiku":             [0.00025, 0.00125],
  // Google
  "gemini-1.5-pro":             [0.00125, 0.005],
  "gemini-1.5-flash":           [0.000075, 0.0003],
  "gemini-1.5-flash-8b":        [0.0000375, 0.00015],
  // Open weights
  "llama-3-70b":                [0.0008, 0.0008],
  "llama-3-8b":                 [0.0002, 0.0002],
  "mixtral-8x7b":               [0.00024, 0.00024],
  // Mistral
  "mistral-small":              [0.001, 0.003],
  "mistral-medium":             [0.0024, 0.0072],
  "mistral-large":              [0.004, 0.012],
};

/** Shorthand names, keyed lowercase. */
export const MODEL_ALIASES: Readonly<Record<string, string>> = {
  "gpt4o": "gpt-4o",
  "gpt4o-mini": "gpt-4o-mini",
  "gpt4": "gpt-4",
  "claude-sonnet": "claude-3-5-sonnet-20241022",
  "claude-3.5-sonnet": "claude-3-5-sonnet-20241022",
  "claude-opus": "claude-3-opus-20240229",
  "claude-3-opus": "claude-3-opus-20240229",
  "claude-sonnet-20240229": "claude-3-sonnet-20240229",
  "claude-haiku": "claude-3-haiku-20240307",
  "claude-3-haiku": "claude-3-haiku-20240307",
};
