import { beforeEach, describe, it } from "node:test";
import assert from "node:assert/strict";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";

import { createServer } from "../server.js";
import { ToolHandler, tools } from "../tool-handlers.js";
import { UiDevice } from "../ui/device.js";
import { FakeAutomationService } from "./helpers/fake-service.js";

const OK_STEPS = [{ criteria: { text: "OK" } }];
const OK = { "0:self": { text: "OK" } };

describe("tool list", () => {
  it("exposes every tool once", () => {
    const names = tools.map((tool) => tool.name);
    assert.deepEqual(names, [
      "ui_exists",
      "ui_info",
      "ui_count",
      "ui_children",
      "ui_find",
      "ui_click",
      "ui_long_click",
      "ui_set_text",
      "ui_drag",
      "ui_swipe",
      "ui_fling",
      "ui_pinch",
      "ui_scroll",
      "ui_wait",
    ]);
  });

});

describe("ToolHandler", () => {
  let service: FakeAutomationService;
  let handler: ToolHandler;

  beforeEach(() => {
    service = new FakeAutomationService();
    handler = new ToolHandler(new UiDevice(service));
  });

  it("resolves nested selector steps", async () => {
    service.returns("exists", true);
    const result = await handler.handle("ui_exists", {
      selector: [{ criteria: { res: "list" } }, { relation: "child", criteria: { index: 0 } }],
    });

    assert.deepEqual(result, { text: "exists: true" });
    assert.deepEqual(service.calls, [
      { method: "exists", params: [{ "0:self": { res: "list" }, "1:child": { index: 0 } }] },
    ]);
  });

  it("waits when ui_exists has a timeout", async () => {
    service.returns("waitForExists", false);

    assert.deepEqual(await handler.handle("ui_exists", { selector: OK_STEPS, timeoutMs: 2500 }), {
      text: "exists: false",
    });
    assert.deepEqual(service.calls, [{ method: "waitForExists", params: [OK, 2500] }]);
  });

  it("formats info as JSON", async () => {
    service.returns("getObjInfo", { text: "OK", enabled: true });

    const result = await handler.handle("ui_info", { selector: OK_STEPS });
    assert.equal(result.text, '{\n  "text": "OK",\n  "enabled": true\n}');
  });

  it("counts matches", async () => {
    service.returns("findObjects", [{}, {}]);
    assert.deepEqual(await handler.handle("ui_count", { selector: OK_STEPS }), { text: "count: 2" });
  });

  it("clicks with no options", async () => {
    service.returns("clickObj", true);

    assert.deepEqual(await handler.handle("ui_click", { selector: OK_STEPS }), { text: "clicked: true" });
    assert.deepEqual(service.calls, [{ method: "clickObj", params: [OK, null] }]);
  });

  it("clicks and waits for a transition", async () => {
    service.returns("clickObjAndWait", true);

    assert.deepEqual(await handler.handle("ui_click", { selector: OK_STEPS, waitForTransitionMs: 3000 }), {
      text: "window changed: true",
    });
  });

  it("rejects a click with one coordinate", async () => {
    await assert.rejects(handler.handle("ui_click", { selector: OK_STEPS, x: 10 }), {
      name: "ApiError",
      message: "Must provide both x and y to click on point",
    });
  });

  it("rejects conflicting click arguments before calling the device", async () => {
    const mixed = {
      name: "ApiError",
      message: "corner, waitForTransitionMs and x/y/durationMs cannot be mixed",
    };
    await assert.rejects(handler.handle("ui_click", { selector: OK_STEPS, corner: "top_left", x: 1, y: 2 }), mixed);
    await assert.rejects(
      handler.handle("ui_click", { selector: OK_STEPS, waitForTransitionMs: 3000, durationMs: 200 }),
      mixed
    );
    await assert.rejects(
      handler.handle("ui_click", { selector: OK_STEPS, corner: "bottom_right", waitForTransitionMs: 3000 }),
      mixed
    );
    assert.equal(service.calls.length, 0);
  });

  it("clears the field when text is empty", async () => {
    service.returns("clear", true);

    assert.deepEqual(await handler.handle("ui_set_text", { selector: OK_STEPS, text: "" }), {
      text: "text cleared: true",
    });
    assert.deepEqual(service.methods(), ["clear"]);
  });

  it("swipes in the requested direction", async () => {
    service.returns("swipeObj", true);

    assert.deepEqual(
      await handler.handle("ui_swipe", { selector: OK_STEPS, direction: "left", percent: 60, marginPercent: 5 }),
      { text: "swiped: true" }
    );
    assert.deepEqual(service.calls, [{ method: "swipeObj", params: [OK, "LEFT", 60, null, null, 5] }]);
  });

  it("rejects an unknown direction", async () => {
    await assert.rejects(handler.handle("ui_swipe", { selector: OK_STEPS, direction: "sideways" }), {
      name: "ApiError",
      message: "'direction' must be one of down, left, right, up",
    });
  });

  it("scrolls until criteria match", async () => {
    service.returns("scrollUntil", true);

    assert.deepEqual(
      await handler.handle("ui_scroll", { selector: OK_STEPS, direction: "down", until: { text: "About" } }),
      { text: "scrolled: true" }
    );
    assert.deepEqual(service.calls, [
      { method: "scrollUntil", params: [OK, { "0:self": { text: "About" } }, "DOWN", null, null] },
    ]);
  });

  it("rejects scroll-and-click mixed with other scroll shapes", async () => {
    await assert.rejects(
      handler.handle("ui_scroll", {
        selector: OK_STEPS,
        direction: "down",
        click: { text: "Settings" },
        percent: 50,
      }),
      { name: "ApiError", message: "Scroll and click cannot be mixed with percent, speed or until" }
    );
    assert.equal(service.calls.length, 0);
  });

  it("pinches open", async () => {
    service.returns("pinchOpen", true);

    assert.deepEqual(await handler.handle("ui_pinch", { selector: OK_STEPS, mode: "open", percent: 50 }), {
      text: "pinched: true",
    });
  });

  it("waits for an object to go away", async () => {
    service.returns("waitUntilGone", true);

    assert.deepEqual(await handler.handle("ui_wait", { selector: OK_STEPS, condition: "gone", timeoutMs: 3000 }), {
      text: "gone: true",
    });
    assert.deepEqual(service.calls, [{ method: "waitUntilGone", params: [OK, 3000] }]);
  });

  it("fails a wait assertion with the given message", async () => {
    service.returns("waitForExists", false);

    await assert.rejects(
      handler.handle("ui_wait", { selector: OK_STEPS, condition: "exists", assertMessage: "still loading" }),
      { name: "UiObjectSearchError", message: "still loading" }
    );
  });

  it("validates the selector argument", async () => {
    await assert.rejects(handler.handle("ui_count", {}), {
      name: "ApiError",
      message: "'selector' must be a non-empty array of steps",
    });
    await assert.rejects(handler.handle("ui_count", { selector: [{ criteria: { text: ["a"] } }] }), {
      name: "ApiError",
      message: "Criteria 'text' must be a string, number or boolean",
    });
  });

  it("rejects unknown tools", async () => {
    await assert.rejects(handler.handle("ui_teleport", { selector: OK_STEPS }), {
      message: "Unknown tool: ui_teleport",
    });
  });
});

describe("MCP server", () => {
  it("lists tools and reports errors as tool results", async () => {
    const service = new FakeAutomationService();
    service.returns("findObjects", [{}, {}, {}]);
    const server = createServer(new ToolHandler(new UiDevice(service)));
    const client = new Client({ name: "test-client", version: "0.0.0" });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();

    await server.connect(serverTransport);
    await client.connect(clientTransport);

    try {
      const listed = await client.listTools();
      assert.equal(listed.tools.length, tools.length);

      const counted = await client.callTool({ name: "ui_count", arguments: { selector: OK_STEPS } });
      assert.deepEqual(counted.content, [{ type: "text", text: "count: 3" }]);

      const failed = await client.callTool({ name: "ui_click", arguments: { selector: OK_STEPS, y: 4 } });
      assert.equal(failed.isError, true);
      assert.deepEqual(failed.content, [
        { type: "text", text: "Error: Must provide both x and y to click on point" },
      ]);
    } finally {
      await client.close();
      await server.close();
    }
  });
});
