/**
 * Snippet Client - talks to the on-device automation snippet over TCP.
 *
 * The snippet server speaks newline-delimited JSON: a handshake line, then
 * one request line per call answered by one response line with the same id.
 * The device port must already be forwarded to `host:port`.
 */

import * as net from "net";
import * as readline from "readline";
import { classifySocketError, SnippetRpcError } from "../errors.js";
import { DEFAULT_RPC_TIMEOUT_MS } from "../utils/time.js";
import type { RemoteAutomationService, UiRpcMethod, UiRpcParams, UiRpcResult } from "./service.js";
import {
  isHandshakeResponse,
  isSnippetResponse,
  type SnippetHandshakeRequest,
  type SnippetHandshakeResponse,
  type SnippetRequest,
  type SnippetResponse,
} from "./types.js";

export interface SnippetClientOptions {
  host?: string;
  port: number;
  rpcTimeoutMs?: number;
}

interface PendingRequest {
  method: string;
  resolve: (value: unknown) => void;
  reject: (error: Error) => void;
  timeout: NodeJS.Timeout;
}

interface PendingHandshake {
  resolve: (value: SnippetHandshakeResponse) => void;
  reject: (error: Error) => void;
  timeout: NodeJS.Timeout;
}

export class SnippetClient implements RemoteAutomationService {
  readonly host: string;
  readonly port: number;
  readonly rpcTimeoutMs: number;
  private socket: net.Socket | null = null;
  private readline: readline.Interface | null = null;
  private requestId = 0;
  private pendingRequests = new Map<number, PendingRequest>();
  private pendingHandshake: PendingHandshake | null = null;
  private sessionUid: number | null = null;

  constructor(options: SnippetClientOptions) {
    this.host = options.host ?? "127.0.0.1";
    this.port = options.port;
    this.rpcTimeoutMs = options.rpcTimeoutMs ?? DEFAULT_RPC_TIMEOUT_MS;
  }

  isConnected(): boolean {
    return this.socket !== null && this.sessionUid !== null;
  }

  get uid(): number | null {
    return this.sessionUid;
  }

  /**
   * Open the socket and start a new snippet session
   */
  async connect(): Promise<void> {
    if (this.socket) {
      throw new SnippetRpcError("Snippet client is already connected");
    }

    const socket = await this.openSocket();
    this.socket = socket;

    this.readline = readline.createInterface({ input: socket, crlfDelay: Infinity });
    this.readline.on("line", (line) => {
      this.handleLine(line);
    });

    socket.on("error", (error) => {
      this.rejectAll(classifySocketError(error, this.host, this.port));
    });
    socket.on("close", () => {
      this.rejectAll(new SnippetRpcError("Snippet server closed the connection"));
      this.socket = null;
      this.sessionUid = null;
    });

    try {
      const response = await this.handshake();
      this.sessionUid = response.uid;
    } catch (error) {
      await this.close();
      throw error;
    }

    console.error(`Connected to snippet server at ${this.host}:${this.port} (uid ${this.sessionUid})`);
  }

  /**
   * Close the connection; pending calls are rejected
   */
  async close(): Promise<void> {
    this.rejectAll(new SnippetRpcError("Snippet client closed"));

    if (this.readline) {
      this.readline.close();
      this.readline = null;
    }

    const socket = this.socket;
    this.socket = null;
    this.sessionUid = null;
    if (socket && !socket.destroyed) {
      await new Promise<void>((resolve) => {
        socket.once("close", () => resolve());
        socket.destroy();
      });
    }
  }

  async call<M extends UiRpcMethod>(method: M, ...params: UiRpcParams<M>): Promise<UiRpcResult<M>> {
    const result = await this.sendRequest(method, params);
    // Result shape is defined by the snippet server for each method
    return result as UiRpcResult<M>;
  }

  private openSocket(): Promise<net.Socket> {
    return new Promise((resolve, reject) => {
      const socket = net.createConnection({ host: this.host, port: this.port });
      const onError = (error: Error) => {
        socket.destroy();
        reject(classifySocketError(error, this.host, this.port));
      };
      socket.once("error", onError);
      socket.once("connect", () => {
        socket.off("error", onError);
        socket.setEncoding("utf8");
        resolve(socket);
      });
    });
  }

  private handshake(): Promise<SnippetHandshakeResponse> {
    return new Promise((resolve, reject) => {
      const timeout = setTimeout(() => {
        this.pendingHandshake = null;
        reject(new SnippetRpcError(`Handshake timed out after ${this.rpcTimeoutMs} ms`));
      }, this.rpcTimeoutMs);

      this.pendingHandshake = { resolve, reject, timeout };
      const request: SnippetHandshakeRequest = { cmd: "initiate", uid: -1 };
      this.write(request);
    });
  }

  private sendRequest(method: string, params: unknown[]): Promise<unknown> {
    if (!this.isConnected()) {
      return Promise.reject(new SnippetRpcError("Snippet client is not connected", method));
    }

    const id = this.requestId++;
    const request: SnippetRequest = { id, method, params };

    return new Promise<unknown>((resolve, reject) => {
      const timeout = setTimeout(() => {
        this.pendingRequests.delete(id);
        reject(new SnippetRpcError(`Request timed out after ${this.rpcTimeoutMs} ms`, method));
      }, this.rpcTimeoutMs);

      this.pendingRequests.set(id, { method, resolve, reject, timeout });
      this.write(request);
    });
  }

  private write(message: SnippetRequest | SnippetHandshakeRequest): void {
    this.socket?.write(JSON.stringify(message) + "\n");
  }

  /**
   * Handle one line from the server
   */
  private handleLine(line: string): void {
    const trimmed = line.trim();
    if (!trimmed) return;

    let message: unknown;
    try {
      message = JSON.parse(trimmed);
    } catch {
      console.error(`Ignoring non-JSON line from snippet server: ${trimmed}`);
      return;
    }

    if (this.pendingHandshake) {
      const { resolve, reject, timeout } = this.pendingHandshake;
      this.pendingHandshake = null;
      clearTimeout(timeout);
      if (isHandshakeResponse(message) && message.status) {
        resolve(message);
      } else {
        reject(new SnippetRpcError(`Snippet server refused the session: ${trimmed}`));
      }
      return;
    }

    if (isSnippetResponse(message)) {
      this.handleResponse(message);
    }
  }

  private handleResponse(response: SnippetResponse): void {
    const pending = this.pendingRequests.get(response.id);
    if (!pending) {
      return; // Unknown or timed-out request
    }

    this.pendingRequests.delete(response.id);
    clearTimeout(pending.timeout);

    if (response.error) {
      pending.reject(new SnippetRpcError(response.error, pending.method));
    } else {
      pending.resolve(response.result ?? null);
    }
  }

  private rejectAll(error: Error): void {
    if (this.pendingHandshake) {
      clearTimeout(this.pendingHandshake.timeout);
      this.pendingHandshake.reject(error);
      this.pendingHandshake = null;
    }
    for (const pending of this.pendingRequests.values()) {
      clearTimeout(pending.timeout);
      pending.reject(error);
    }
    this.pendingRequests.clear();
  }
}
