import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { Interceptor, LLM_CALL_SPAN } from "../interceptor.js";
import { isHookPointClaimed } from "../activation-guard.js";
import { BudgetTracker } from "../../budget/budget-tracker.js";
import { PricingRegistry } from "../../pricing/pricing-registry.js";
import { TokenCounter } from "../../tokens/token-counter.js";
import { TraceCollector } from "../../trace/collector.js";
import { ApproximateTokenCounter } from "../../adapters/token-counter/approximate.adapter.js";
import { MethodPatchHookPoint } from "../../adapters/interception/method-patch.adapter.js";
import { BudgetExceededError, InterceptionError, TurnLimitError } from "../../errors.js";
import { type LogEntry, configureLogging, resetLogging } from "../../logging.js";
import type { HookPointPort } from "../../ports/interception.port.js";
import type { TokenEstimatorPort } from "../../ports/token-counter.port.js";
import type { CallRequest } from "../payload.js";

// test-model: $1 / 1K input, $2 / 1K output.
// A 400-char message estimates to 3 + 100 + 4 = 107 input tokens, and the same
// number of projected output tokens: (107 * 1 + 107 * 2) / 1000 = $0.321.
const REQUEST: CallRequest = {
  model: "test-model",
  messages: [{ role: "user", content: "x".repeat(400) }],
};
const ESTIMATED_COST = 0.321;

// 100 input + 50 output tokens: (100 * 1 + 50 * 2) / 1000 = $0.2
const RESPONSE = {
  choices: [{ message: { content: "done" } }],
  usage: { prompt_tokens: 100, completion_tokens: 50 },
};

interface Harness {
  tracker: BudgetTracker;
  collector: TraceCollector;
  interceptor: Interceptor;
}

function harness(maxUsd: number, maxTurns?: number, local: TokenEstimatorPort = new ApproximateTokenCounter()): Harness {
  const tracker = new BudgetTracker("run-test", maxUsd, maxTurns);
  const pricing = new PricingRegistry();
  pricing.registerCustomModel("test-model", 1, 2);
  const collector = new TraceCollector();
  collector.startTrace(tracker.runId);
  const interceptor = new Interceptor({
    tracker,
    tokenCounter: new TokenCounter({ backend: "local", local }),
    pricing,
    collector,
  });
  return { tracker, collector, interceptor };
}

function spansOf(collector: TraceCollector) {
  return collector.getCurrentTrace()?.spans ?? [];
}

let logs: LogEntry[];

beforeEach(() => {
  logs = [];
  configureLogging({ level: "debug", sink: (entry) => logs.push(entry) });
});

afterEach(() => {
  resetLogging();
});

describe("Interceptor", () => {
  describe("intercept", () => {
    it("charges the reported usage and closes an ok span", async () => {
      const { tracker, collector, interceptor } = harness(1);

      const response = await interceptor.intercept(REQUEST, async () => RESPONSE);

      expect(response).toBe(RESPONSE);
      expect(tracker.spentUsd).toBeCloseTo(0.2, 10);
      expect(tracker.turnCount).toBe(1);

      const [span] = spansOf(collector);
      expect(span.isClosed).toBe(true);
      expect(span.spanType).toBe(LLM_CALL_SPAN);
      expect(span.status).toBe("ok");
      expect(span.model).toBe("test-model");
      expect(span.inputTokens).toBe(100);
      expect(span.outputTokens).toBe(50);
      expect(span.costUsd).toBeCloseTo(0.2, 10);
      expect(span.outputPreview).toBe("done");
      expect(span.inputPreview).toHaveLength(203);
      expect(span.metadata).toEqual({
        estimatedInputTokens: 107,
        estimatedCostUsd: expect.closeTo(ESTIMATED_COST, 10),
        usageReported: true,
      });
    });

    it("falls back to the input estimate and zero output without usage", async () => {
      const { tracker, collector, interceptor } = harness(1);

      await interceptor.intercept(REQUEST, async () => ({ text: "plain" }));

      // 107 input tokens at $1 / 1K
      expect(tracker.spentUsd).toBeCloseTo(0.107, 10);
      const [span] = spansOf(collector);
      expect(span.inputTokens).toBe(107);
      expect(span.outputTokens).toBe(0);
      expect(span.outputPreview).toBe("plain");
      expect(span.metadata.usageReported).toBe(false);
    });

    it("refuses a call whose estimate does not fit, before invoking it", async () => {
      const { tracker, collector, interceptor } = harness(0.3);
      const invoke = vi.fn(async () => RESPONSE);

      await expect(interceptor.intercept(REQUEST, invoke)).rejects.toBeInstanceOf(BudgetExceededError);

      expect(invoke).not.toHaveBeenCalled();
      expect(spansOf(collector)).toHaveLength(0);
      expect(tracker.turnCount).toBe(0);
      expect(tracker.spentUsd).toBe(0);
    });

    it("reports the projected spend in the refusal", async () => {
      const { interceptor } = harness(0.3);
      let caught: unknown;
      try {
        await interceptor.intercept(REQUEST, async () => RESPONSE);
      } catch (error) {
        caught = error;
      }
      expect(caught).toMatchObject({
        runId: "run-test",
        budgetUsd: 0.3,
        spentUsd: expect.closeTo(ESTIMATED_COST, 10),
        lastModel: "test-model",
      });
    });

    it("records a failed call as an error span without charging it", async () => {
      const { tracker, collector, interceptor } = harness(1);

      await expect(
        interceptor.intercept(REQUEST, async () => {
          throw new Error("upstream 500");
        }),
      ).rejects.toThrow("upstream 500");

      expect(tracker.spentUsd).toBe(0);
      expect(tracker.turnCount).toBe(0);
      const [span] = spansOf(collector);
      expect(span.status).toBe("error");
      expect(span.isClosed).toBe(true);
      expect(span.metadata).toMatchObject({ error: "upstream 500", estimatedInputTokens: 107 });
    });

    it("fails the commit past the turn limit after the call has run", async () => {
      const { tracker, collector, interceptor } = harness(10, 1);
      tracker.recordCall(1, 1, "test-model", 0.01, 1);
      const invoke = vi.fn(async () => RESPONSE);

      await expect(interceptor.intercept(REQUEST, invoke)).rejects.toBeInstanceOf(TurnLimitError);

      expect(invoke).toHaveBeenCalledTimes(1);
      expect(tracker.turnCount).toBe(1);
      expect(tracker.spentUsd).toBe(0.01);
      const [span] = spansOf(collector);
      expect(span.status).toBe("error");
      expect(span.costUsd).toBeCloseTo(0.2, 10);
      expect(span.metadata.error).toBe("Turn limit exceeded: 2 / 1 on run run-test");
    });

    it("admits concurrent calls without losing commits", async () => {
      const { tracker, collector, interceptor } = harness(10);

      await Promise.all(
        Array.from({ length: 10 }, (_, i) =>
          interceptor.intercept(REQUEST, async () => {
            await new Promise<void>((resolve) => setTimeout(resolve, i % 3));
            return RESPONSE;
          }),
        ),
      );

      expect(tracker.turnCount).toBe(10);
      expect(tracker.spentUsd).toBeCloseTo(2, 9);
      expect(spansOf(collector)).toHaveLength(10);
      expect(spansOf(collector).every((span) => span.isClosed && span.status === "ok")).toBe(true);
    });
  });

  describe("interceptSync", () => {
    it("meters a synchronous call", () => {
      const { tracker, collector, interceptor } = harness(1);

      const response = interceptor.interceptSync(REQUEST, () => RESPONSE);

      expect(response).toBe(RESPONSE);
      expect(tracker.turnCount).toBe(1);
      expect(spansOf(collector)[0].status).toBe("ok");
    });

    it("rethrows a synchronous failure", () => {
      const { collector, interceptor } = harness(1);

      expect(() =>
        interceptor.interceptSync(REQUEST, () => {
          throw new Error("bad request");
        }),
      ).toThrow("bad request");
      expect(spansOf(collector)[0].status).toBe("error");
    });
  });

  describe("degraded estimation", () => {
    it("treats a failed token count as zero input tokens", async () => {
      const failing: TokenEstimatorPort = {
        count: () => {
          throw new Error("tokenizer crashed");
        },
        countMessages: () => {
          throw new Error("tokenizer crashed");
        },
      };
      const { tracker, interceptor } = harness(1, undefined, failing);

      await interceptor.intercept(REQUEST, async () => ({ text: "ok" }));

      expect(tracker.turnCount).toBe(1);
      expect(tracker.spentUsd).toBe(0);
      expect(logs.map((entry) => entry.event)).toContain("estimate:tokens-failed");
    });

    it("prices an unknown model at zero and warns", async () => {
      const { tracker, collector, interceptor } = harness(1);

      await interceptor.intercept({ model: "mystery-model", messages: REQUEST.messages }, async () => RESPONSE);

      expect(tracker.turnCount).toBe(1);
      expect(tracker.spentUsd).toBe(0);
      expect(spansOf(collector)[0].costUsd).toBe(0);
      expect(logs).toContainEqual(
        expect.objectContaining({ level: "warn", event: "pricing:failed", data: expect.objectContaining({ model: "mystery-model" }) }),
      );
    });
  });

  describe("trackCall", () => {
    it("records known usage as a closed manual span", () => {
      const { tracker, collector, interceptor } = harness(1);

      expect(interceptor.trackCall("test-model", 100, 50)).toBeCloseTo(0.2, 10);

      expect(tracker.turnCount).toBe(1);
      const [span] = spansOf(collector);
      expect(span.isClosed).toBe(true);
      expect(span.metadata).toEqual({ manual: true });
      expect(span.durationMs).toBe(0);
    });

    it("refuses usage that would reach the ceiling", () => {
      const { tracker, collector, interceptor } = harness(0.2);

      expect(() => interceptor.trackCall("test-model", 100, 50)).toThrow(BudgetExceededError);
      expect(tracker.turnCount).toBe(0);
      expect(spansOf(collector)).toHaveLength(0);
    });
  });

  describe("hook points", () => {
    function makeClient() {
      return {
        calls: 0,
        async create(params: { model: string; messages: { role: string; content: string }[] }) {
          this.calls += 1;
          return { ...RESPONSE, model: params.model };
        },
      };
    }

    it("meters calls through an installed hook and restores it", async () => {
      const { tracker, interceptor } = harness(1);
      const client = makeClient();
      const original = client.create;
      const hook = new MethodPatchHookPoint(client, "create", { label: "client" });

      interceptor.activate([hook]);
      expect(interceptor.isActive).toBe(true);
      expect(isHookPointClaimed(hook.id)).toBe(true);
      expect(client.create).not.toBe(original);

      const response = await client.create(REQUEST);
      expect(response.model).toBe("test-model");
      expect(client.calls).toBe(1);
      expect(tracker.turnCount).toBe(1);

      interceptor.deactivate();
      expect(client.create).toBe(original);
      expect(isHookPointClaimed(hook.id)).toBe(false);
      expect(interceptor.isActive).toBe(false);

      await client.create(REQUEST);
      expect(tracker.turnCount).toBe(1);
    });

    it("fails fast when another interceptor holds the hook point", () => {
      const first = harness(1).interceptor;
      const second = harness(1).interceptor;
      const client = makeClient();
      const original = client.create;

      first.activate([new MethodPatchHookPoint(client, "create")]);
      const patched = client.create;

      expect(() => second.activate([new MethodPatchHookPoint(client, "create")])).toThrow(InterceptionError);
      expect(second.isActive).toBe(false);
      expect(client.create).toBe(patched);

      first.deactivate();
      expect(client.create).toBe(original);
    });

    it("fails fast on the same method hooked under a different label", async () => {
      const first = harness(1);
      const second = harness(1);
      const client = makeClient();
      const original = client.create;

      first.interceptor.activate([new MethodPatchHookPoint(client, "create")]);
      expect(() =>
        second.interceptor.activate([new MethodPatchHookPoint(client, "create", { label: "chat" })]),
      ).toThrow(InterceptionError);

      second.interceptor.deactivate();
      first.interceptor.deactivate();
      expect(client.create).toBe(original);

      await client.create(REQUEST);
      expect(first.tracker.turnCount).toBe(0);
      expect(second.tracker.turnCount).toBe(0);
    });

    it("rejects a second activation of the same interceptor", () => {
      const { interceptor } = harness(1);
      interceptor.activate([]);
      expect(() => interceptor.activate([])).toThrow("Interceptor is already active");
      interceptor.deactivate();
    });

    it("releases every claim even when an uninstall throws", () => {
      const { interceptor } = harness(1);
      const broken: HookPointPort = {
        id: "test#broken",
        mode: "async",
        install: () => undefined,
        uninstall: () => {
          throw new Error("cannot restore");
        },
      };
      const client = makeClient();
      const original = client.create;
      const healthy = new MethodPatchHookPoint(client, "create");

      interceptor.activate([broken, healthy]);

      expect(() => interceptor.deactivate()).toThrow("cannot restore");
      expect(isHookPointClaimed("test#broken")).toBe(false);
      expect(isHookPointClaimed(healthy.id)).toBe(false);
      expect(client.create).toBe(original);
      expect(interceptor.isActive).toBe(false);
    });

    it("rolls back installed hooks when a later install fails", () => {
      const { interceptor } = harness(1);
      const client = makeClient();
      const original = client.create;
      const good = new MethodPatchHookPoint(client, "create");
      const bad = new MethodPatchHookPoint(client, "calls");

      expect(() => interceptor.activate([good, bad])).toThrow(InterceptionError);
      expect(client.create).toBe(original);
      expect(isHookPointClaimed(good.id)).toBe(false);
      expect(isHookPointClaimed(bad.id)).toBe(false);
      expect(interceptor.isActive).toBe(false);
    });

    it("routes sync hook points through the synchronous path", () => {
      const { tracker, interceptor } = harness(1);
      const client = {
        complete(model: string, messages: { role: string; content: string }[]) {
          return { text: `${model}:${messages.length}`, usage: { input_tokens: 100, output_tokens: 50 } };
        },
      };
      interceptor.activate([new MethodPatchHookPoint(client, "complete", { mode: "sync" })]);

      const result = client.complete("test-model", REQUEST.messages);

      expect(result.text).toBe("test-model:1");
      expect(tracker.spentUsd).toBeCloseTo(0.2, 10);
      interceptor.deactivate();
    });
  });
});
