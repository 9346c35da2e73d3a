/**
 * Invocation interface — the boundary to the remote platform.
 */

/** Error returned by the platform or the transport, passed through as-is. */
export interface InvocationFault {
  code: string;
  message: string;
  hint?: string;
  /** HTTP status, when the fault came from an HTTP response. */
  status?: number;
}

export type InvocationResult =
  | { ok: true; payload: unknown }
  | { ok: false; error: InvocationFault };

export interface InvokeOptions {
  signal?: AbortSignal;
}

/**
 * Performs one remote call per invocation. Implementations resolve with a
 * fault instead of rejecting for anything the platform reports.
 */
export interface OperationInvoker {
  invoke(operation: string, args: Record<string, unknown>, options?: InvokeOptions): Promise<InvocationResult>;
}
