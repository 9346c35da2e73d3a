/**
 * Test helper: an in-process operation invoker with scripted responses.
 */

import type { InvocationFault, InvocationResult, InvokeOptions, OperationInvoker } from "../transport/invoker.js";

export type ScriptedResponse = InvocationResult | ((args: Record<string, unknown>) => InvocationResult);

export interface RecordedCall {
  operation: string;
  args: Record<string, unknown>;
}

export function ok(payload: unknown): InvocationResult {
  return { ok: true, payload };
}

export function fault(code: string, message: string, status?: number): InvocationResult {
  const error: InvocationFault = { code, message };
  if (status !== undefined) error.status = status;
  return { ok: false, error };
}

/**
 * Responses are queued per operation; the last one repeats once the
 * others are used up.
 */
export class ScriptedInvoker implements OperationInvoker {
  readonly calls: RecordedCall[] = [];
  private readonly scripts = new Map<string, ScriptedResponse[]>();

  on(operation: string, ...responses: ScriptedResponse[]): this {
    const queue = this.scripts.get(operation) ?? [];
    queue.push(...responses);
    this.scripts.set(operation, queue);
    return this;
  }

  reply(operation: string, ...payloads: unknown[]): this {
    return this.on(operation, ...payloads.map(ok));
  }

  callsTo(operation: string): RecordedCall[] {
    return this.calls.filter(call => call.operation === operation);
  }

  async invoke(operation: string, args: Record<string, unknown>, options: InvokeOptions = {}): Promise<InvocationResult> {
    this.calls.push({ operation, args: { ...args } });
    if (options.signal?.aborted) {
      return fault("cancelled", `Request for '${operation}' was cancelled`);
    }

    const queue = this.scripts.get(operation) ?? [];
    const next = queue.length > 1 ? queue.shift() : queue[0];
    if (next === undefined) {
      return fault("unknown-operation", `No scripted response for '${operation}'`);
    }
    return typeof next === "function" ? next(args) : next;
  }
}
