import { beforeEach, describe, it } from "node:test";
import assert from "node:assert/strict";

import { ApiError } from "../errors.js";
import { UiDevice } from "../ui/device.js";
import type { UiObject } from "../ui/ui-object.js";
import { FakeAutomationService } from "./helpers/fake-service.js";

const PAGER = { "0:self": { res: "pager" } };

describe("swipe and fling", () => {
  let service: FakeAutomationService;
  let pager: UiObject;

  beforeEach(() => {
    service = new FakeAutomationService();
    service.returns("swipeObj", true).returns("fling", true);
    pager = new UiDevice(service).select({ res: "pager" });
  });

  it("swipes with no margins by default", async () => {
    assert.equal(await pager.swipe().down().perform({ percent: 50 }), true);
    assert.deepEqual(service.calls, [{ method: "swipeObj", params: [PAGER, "DOWN", 50, null, null, null] }]);
  });

  it("sends percentage margins and speed", async () => {
    await pager.swipe({ percent: 20 }).left().perform({ percent: 30, speed: 1000 });
    assert.deepEqual(service.calls, [{ method: "swipeObj", params: [PAGER, "LEFT", 30, 1000, null, 20] }]);
  });

  it("accepts the bounds of the percent range", async () => {
    await pager.swipe().up().perform({ percent: 0 });
    await pager.swipe().up().perform({ percent: 100 });
    assert.deepEqual(service.calls.map((call) => call.params[2]), [0, 100]);
  });

  it("rejects a swipe percent outside 0 to 100", async () => {
    const expected = { name: "ApiError", message: "swipe gesture requires percent to be between 0 and 100" };
    await assert.rejects(pager.swipe().down().perform({ percent: 150 }), expected);
    await assert.rejects(pager.swipe().down().perform({ percent: -1 }), expected);
    assert.equal(service.calls.length, 0);
  });

  it("flings with pixel margins", async () => {
    assert.equal(await pager.fling({ margin: 12 }).right().perform({ speed: 4000 }), true);
    assert.deepEqual(service.calls, [{ method: "fling", params: [PAGER, "RIGHT", 4000, 12, null] }]);
  });

  it("accepts an explicit zero percent on fling", async () => {
    await pager.fling().up().perform({ percent: 0 });
    assert.deepEqual(service.calls, [{ method: "fling", params: [PAGER, "UP", null, null, null] }]);
  });

  it("rejects any other percent on fling", async () => {
    await assert.rejects(pager.fling().up().perform({ percent: 10 }), {
      name: "ApiError",
      message: "fling gesture does not support changing the percent",
    });
    assert.equal(service.calls.length, 0);
  });

  it("rejects mixed margins when the builder is created", () => {
    assert.throws(() => pager.swipe({ margin: 10, percent: 5 }), {
      name: "ApiError",
      message: "Pixel-based and percentage-based margin cannot be mixed",
    });
    assert.throws(() => pager.fling().margins({ margin: 1, percent: 1 }), ApiError);
  });

  it("fixes margins when the direction is chosen", async () => {
    const swipe = pager.swipe();
    const right = swipe.right();
    swipe.margins({ margin: 5 });

    await right.perform();
    await swipe.right().perform();
    assert.deepEqual(service.calls, [
      { method: "swipeObj", params: [PAGER, "RIGHT", 0, null, null, null] },
      { method: "swipeObj", params: [PAGER, "RIGHT", 0, null, 5, null] },
    ]);
  });
});

describe("pinch", () => {
  it("sends open and close with the object's selector", async () => {
    const service = new FakeAutomationService();
    service.returns("pinchOpen", true).returns("pinchClose", false);
    const map = new UiDevice(service).select({ res: "map" });

    assert.equal(await map.pinch().open(80, 600), true);
    assert.equal(await map.pinch().close(40), false);
    assert.deepEqual(service.calls, [
      { method: "pinchOpen", params: [{ "0:self": { res: "map" } }, 80, 600] },
      { method: "pinchClose", params: [{ "0:self": { res: "map" } }, 40, null] },
    ]);
  });
});
