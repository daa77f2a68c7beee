import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { resolveConfig, toOverrides } from "../config.js";

describe("resolveConfig", () => {
  it("falls back to defaults", () => {
    assert.deepEqual(resolveConfig({}, {}), {
      transport: "stdio",
      httpHost: "127.0.0.1",
      httpPort: 3000,
      snippetHost: "127.0.0.1",
      snippetPort: 9008,
      rpcTimeoutMs: 60_000,
      raiseOnMissing: false,
    });
  });

  it("reads the environment", () => {
    const config = resolveConfig(
      {},
      {
        UIOBJECT_TRANSPORT: "http",
        UIOBJECT_HTTP_PORT: "8080",
        UIOBJECT_SNIPPET_HOST: "10.0.2.2",
        UIOBJECT_SNIPPET_PORT: "6790",
        UIOBJECT_RPC_TIMEOUT_MS: "30000",
        UIOBJECT_RAISE_ON_MISSING: "1",
      }
    );

    assert.equal(config.transport, "http");
    assert.equal(config.httpPort, 8080);
    assert.equal(config.snippetHost, "10.0.2.2");
    assert.equal(config.snippetPort, 6790);
    assert.equal(config.rpcTimeoutMs, 30_000);
    assert.equal(config.raiseOnMissing, true);
  });

  it("lets overrides win over the environment", () => {
    const config = resolveConfig({ snippetPort: 7000, raiseOnMissing: false }, {
      UIOBJECT_SNIPPET_PORT: "6790",
      UIOBJECT_RAISE_ON_MISSING: "1",
    });

    assert.equal(config.snippetPort, 7000);
    assert.equal(config.raiseOnMissing, false);
  });

  it("rejects malformed numbers", () => {
    assert.throws(() => resolveConfig({}, { UIOBJECT_SNIPPET_PORT: "abc" }), {
      name: "ApiError",
      message: "UIOBJECT_SNIPPET_PORT must be a positive integer, got 'abc'",
    });
    assert.throws(() => resolveConfig({}, { UIOBJECT_RPC_TIMEOUT_MS: "0" }), {
      name: "ApiError",
      message: "UIOBJECT_RPC_TIMEOUT_MS must be a positive integer, got '0'",
    });
  });

  it("rejects unknown transports", () => {
    assert.throws(() => resolveConfig({}, { UIOBJECT_TRANSPORT: "websocket" }), {
      name: "ApiError",
      message: "Unknown transport 'websocket' (expected stdio or http)",
    });
  });
});

describe("toOverrides", () => {
  it("keeps only the flags that were given", () => {
    assert.deepEqual(toOverrides({}), {});
    assert.deepEqual(toOverrides({ port: "8080", snippetPort: "7000", strict: true, host: "0.0.0.0" }), {
      httpHost: "0.0.0.0",
      httpPort: 8080,
      snippetPort: 7000,
      raiseOnMissing: true,
    });
  });

  it("names the flag in parse errors", () => {
    assert.throws(() => toOverrides({ rpcTimeout: "soon" }), {
      name: "ApiError",
      message: "--rpc-timeout must be a positive integer, got 'soon'",
    });
  });
});
