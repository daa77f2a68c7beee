import type { RemoteAutomationService, UiRpcMethod, UiRpcParams, UiRpcResult } from "../../rpc/service.js";
import { DEFAULT_RPC_TIMEOUT_MS } from "../../utils/time.js";

type Handler<M extends UiRpcMethod> = (...params: UiRpcParams<M>) => UiRpcResult<M> | Promise<UiRpcResult<M>>;
type HandlerMap = { [M in UiRpcMethod]?: Handler<M> };

export interface RecordedCall {
  method: UiRpcMethod;
  params: unknown[];
}

/**
 * In-process stand-in for the snippet server. Records every call and answers
 * from scripted handlers; a call without a handler fails the test.
 */
export class FakeAutomationService implements RemoteAutomationService {
  readonly calls: RecordedCall[] = [];
  private handlers: HandlerMap = {};

  constructor(readonly rpcTimeoutMs = DEFAULT_RPC_TIMEOUT_MS) {}

  on<M extends UiRpcMethod>(method: M, handler: Handler<M>): this {
    const handlers: { [K in M]?: Handler<K> } = this.handlers;
    handlers[method] = handler;
    return this;
  }

  returns<M extends UiRpcMethod>(method: M, value: UiRpcResult<M>): this {
    return this.on(method, () => value);
  }

  methods(): UiRpcMethod[] {
    return this.calls.map((call) => call.method);
  }

  async call<M extends UiRpcMethod>(method: M, ...params: UiRpcParams<M>): Promise<UiRpcResult<M>> {
    this.calls.push({ method, params: [...params] });
    const handler = this.handlers[method];
    if (!handler) {
      throw new Error(`Unexpected RPC call: ${method}`);
    }
    return handler(...params);
  }
}
