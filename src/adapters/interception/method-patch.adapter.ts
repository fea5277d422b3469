// =============================================================================
// MethodPatchHookPoint — Hooks one method on an object by patching it in place
// =============================================================================

import { InterceptionError } from "../../errors.js";
import type { HookHandler, HookPointPort, InvocationMode } from "../../ports/interception.port.js";

const targetIds = new WeakMap<object, number>();
let nextTargetId = 1;

function targetId(target: object): number {
  let id = targetIds.get(target);
  if (id === undefined) {
    id = nextTargetId++;
    targetIds.set(target, id);
  }
  return id;
}

export interface MethodPatchOptions {
  /** "async" when the method returns a promise (default) */
  mode?: InvocationMode;
  /** Human-readable name of the target, used in error messages */
  label?: string;
}

/**
 * Patches `target[method]`, for example an SDK client's
 * `chat.completions` object and its `create` method:
 *
 * ```ts
 * const hook = new MethodPatchHookPoint(client.chat.completions, "create");
 * const breaker = new CircuitBreaker({ maxUsd: 2, hooks: [hook] });
 * await breaker.run(() => agent.solve(task));
 * ```
 *
 * Uninstalling restores the exact previous state: an own property gets its
 * original value back, an inherited method has the shadowing property removed.
 */
export class MethodPatchHookPoint implements HookPointPort {
  readonly id: string;
  readonly mode: InvocationMode;
  readonly label: string;
  private restore: (() => void) | null = null;

  constructor(
    private readonly target: object,
    private readonly method: string,
    options: MethodPatchOptions = {},
  ) {
    this.mode = options.mode ?? "async";
    this.label = options.label ?? "object";
    // One id per target and method, whatever the label
    this.id = `target#${targetId(target)}.${method}`;
  }

  get installed(): boolean {
    return this.restore !== null;
  }

  install(handler: HookHandler): void {
    if (this.restore) {
      throw new InterceptionError(`hook point "${this.label}.${this.method}" is already installed`);
    }

    const original: unknown = Reflect.get(this.target, this.method);
    if (typeof original !== "function") {
      throw new InterceptionError(`"${this.method}" is not a function on ${this.label}`);
    }

    const hadOwn = Object.prototype.hasOwnProperty.call(this.target, this.method);
    const patched = function (this: unknown, ...args: unknown[]): unknown {
      const receiver = this;
      return handler({ args, invoke: () => Reflect.apply(original, receiver, args) });
    };

    if (!Reflect.set(this.target, this.method, patched)) {
      throw new InterceptionError(`"${this.method}" is read-only on ${this.label}`);
    }

    this.restore = () => {
      if (hadOwn) {
        Reflect.set(this.target, this.method, original);
      } else {
        Reflect.deleteProperty(this.target, this.method);
      }
    };
  }

  uninstall(): void {
    const restore = this.restore;
    if (!restore) return;
    this.restore = null;
    restore();
  }
}
