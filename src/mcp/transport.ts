import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
  ErrorCode,
  isJSONRPCError,
  isJSONRPCRequest,
  isJSONRPCResponse,
  type JSONRPCError,
  type JSONRPCMessage,
  type RequestId,
} from "@modelcontextprotocol/sdk/types.js";

const DEFAULT_TIMEOUT_MS = 60_000;

interface Pending {
  resolve: (response: JSONRPCMessage) => void;
  timer: ReturnType<typeof setTimeout>;
}

function errorResponse(id: RequestId, code: number, message: string): JSONRPCError {
  return { jsonrpc: "2.0", id, error: { code, message } };
}

/**
 * A lightweight HTTP transport for MCP that works with Hono.
 *
 * Bridges individual HTTP requests to the MCP Server's transport interface.
 * Each JSON-RPC request gets a response via a Promise-based dispatch.
 */
export class HttpTransport implements Transport {
  private pendingResponses = new Map<RequestId, Pending>();

  onmessage?: (message: JSONRPCMessage) => void;
  onclose?: () => void;
  onerror?: (error: Error) => void;

  constructor(private readonly timeoutMs: number = DEFAULT_TIMEOUT_MS) {}

  async start(): Promise<void> {
    // No-op — HTTP transport is request-driven
  }

  async close(): Promise<void> {
    for (const id of [...this.pendingResponses.keys()]) {
      this.settle(id, errorResponse(id, ErrorCode.ConnectionClosed, "Transport closed"));
    }
    this.onclose?.();
  }

  async send(message: JSONRPCMessage): Promise<void> {
    // The MCP server sends a response — route it to the waiting HTTP request
    if (isJSONRPCResponse(message) || isJSONRPCError(message)) {
      this.settle(message.id, message);
    }
    // Server-initiated requests and notifications have no HTTP request to ride on
  }

  /**
   * Handle an incoming JSON-RPC message from an HTTP POST.
   * Resolves to the response, or null for notifications.
   */
  async handleJsonRpc(message: JSONRPCMessage): Promise<JSONRPCMessage | null> {
    if (!isJSONRPCRequest(message)) {
      this.onmessage?.(message);
      return null;
    }

    const id = message.id;
    return new Promise<JSONRPCMessage>((resolve) => {
      // Register the waiter BEFORE dispatching the message
      const timer = setTimeout(() => {
        this.settle(id, errorResponse(id, ErrorCode.RequestTimeout, "Request timed out"));
      }, this.timeoutMs);
      this.pendingResponses.set(id, { resolve, timer });

      this.onmessage?.(message);
    });
  }

  private settle(id: RequestId, response: JSONRPCMessage): void {
    const pending = this.pendingResponses.get(id);
    if (!pending) return;
    clearTimeout(pending.timer);
    this.pendingResponses.delete(id);
    pending.resolve(response);
  }
}
