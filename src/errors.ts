/**
 * Error taxonomy for the UI object layer.
 *
 * - ApiError: invalid arguments, detected locally before any RPC call
 * - UiObjectSearchError: a strict-mode existence/absence check failed
 * - SnippetRpcError: the snippet server or its socket failed
 */

export class UiAutomationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "UiAutomationError";
  }
}

export class ApiError extends UiAutomationError {
  readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "ApiError";
    this.details = details;
  }
}

export class UiObjectSearchError extends UiAutomationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "UiObjectSearchError";
  }
}

export class SnippetRpcError extends UiAutomationError {
  readonly method?: string;

  constructor(message: string, method?: string, options?: { cause?: unknown }) {
    super(method ? `${method}: ${message}` : message, options);
    this.name = "SnippetRpcError";
    this.method = method;
  }
}

/**
 * Map a socket-level failure to a readable SnippetRpcError
 */
export function classifySocketError(error: unknown, host: string, port: number): SnippetRpcError {
  const code = typeof error === "object" && error !== null && "code" in error ? String(error.code) : "";
  const message = error instanceof Error ? error.message : String(error);

  if (code === "ECONNREFUSED") {
    return new SnippetRpcError(
      `Connection refused at ${host}:${port}.\n` +
        "Is the snippet server running and its port forwarded (adb forward tcp:<port> tcp:<port>)?",
      undefined,
      { cause: error }
    );
  }
  if (code === "ECONNRESET" || code === "EPIPE") {
    return new SnippetRpcError(`Snippet server closed the connection (${code})`, undefined, { cause: error });
  }
  return new SnippetRpcError(message, undefined, { cause: error });
}
