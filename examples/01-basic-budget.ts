// =============================================================================
// 01 — A budgeted run around a fake chat client
// =============================================================================
//
// Hooks the client's `create` method, runs a small loop of calls under a
// $0.05 ceiling and prints the trace when the run ends. The client is a stub,
// so no API key is needed.
//
// Usage: npx tsx examples/01-basic-budget.ts

import { BudgetExceededError, CircuitBreaker, MethodPatchHookPoint } from "../src/index.js";

interface ChatParams {
  model: string;
  messages: { role: string; content: string }[];
}

const client = {
  chat: {
    completions: {
      async create(params: ChatParams) {
        const prompt = params.messages.at(-1)?.content ?? "";
        return {
          choices: [{ message: { content: `echo: ${prompt}` } }],
          usage: { prompt_tokens: 1200 + prompt.length, completion_tokens: 800 },
        };
      },
    },
  },
};

async function main(): Promise<void> {
  const breaker = new CircuitBreaker({
    maxUsd: 0.05,
    maxTurns: 10,
    hooks: [new MethodPatchHookPoint(client.chat.completions, "create", { label: "chat.completions" })],
  });

  try {
    await breaker.run(async () => {
      for (let step = 1; ; step++) {
        const reply = await client.chat.completions.create({
          model: "gpt-4o",
          messages: [{ role: "user", content: `Step ${step}: keep refining the plan.` }],
        });
        console.log(reply.choices[0].message.content);
      }
    });
  } catch (error) {
    if (!(error instanceof BudgetExceededError)) throw error;
    console.log(`Stopped: ${error.message}`);
  }

  console.log(`Run ${breaker.lastRunId} spent $${breaker.lastTrace?.totalCost.toFixed(4)}`);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
