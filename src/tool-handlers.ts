import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { ApiError } from "./errors.js";
import { RELATIONS, type Criteria, type CriteriaValue } from "./selector/criteria.js";
import type { SelectorStepInput, UiDevice } from "./ui/device.js";
import type { GestureMargins } from "./ui/types.js";
import type { UiObject } from "./ui/ui-object.js";

export interface ToolResult {
  text: string;
}

type ToolArgs = Record<string, unknown>;

const DIRECTIONS = ["down", "left", "right", "up"] as const;
type DirectionName = (typeof DIRECTIONS)[number];

// Reused across tools
const selectorParam = {
  type: "array",
  minItems: 1,
  description:
    "Navigation steps to the target. First step: {criteria} for the starting object. " +
    "Following steps: {relation, criteria?} where relation is one of " +
    RELATIONS.join("|") +
    ". Criteria keys: text, textContains, desc, res, clazz, pkg, checked, enabled, ...",
  items: {
    type: "object",
    properties: {
      relation: { type: "string", enum: [...RELATIONS] },
      criteria: {
        type: "object",
        additionalProperties: { type: ["string", "number", "boolean"] },
      },
    },
  },
};

const criteriaParam = {
  type: "object",
  additionalProperties: { type: ["string", "number", "boolean"] },
};

const directionParam = {
  type: "string",
  enum: [...DIRECTIONS],
};

const marginParams = {
  margin: { type: "number", description: "Pixel margin from the object's edges" },
  marginPercent: { type: "number", description: "Margin as a percentage of the object's size (exclusive with margin)" },
};

export const tools: Tool[] = [
  {
    name: "ui_exists",
    description: "Check whether a UI object exists. With timeoutMs, wait up to that long for it to appear.",
    inputSchema: {
      type: "object",
      properties: {
        selector: selectorParam,
        timeoutMs: { type: "number", description: "Wait up to this long (must be below the RPC timeout)" },
      },
      required: ["selector"],
    },
  },
  {
    name: "ui_info",
    description: "Get all properties of a UI object (text, class, bounds, state flags)",
    inputSchema: {
      type: "object",
      properties: { selector: selectorParam },
      required: ["selector"],
    },
  },
  {
    name: "ui_count",
    description: "Count UI objects matching the selector",
    inputSchema: {
      type: "object",
      properties: { selector: selectorParam },
      required: ["selector"],
    },
  },
  {
    name: "ui_children",
    description: "List the direct children of a UI object",
    inputSchema: {
      type: "object",
      properties: { selector: selectorParam },
      required: ["selector"],
    },
  },
  {
    name: "ui_find",
    description: "Find all objects under a UI object matching the criteria",
    inputSchema: {
      type: "object",
      properties: { selector: selectorParam, criteria: criteriaParam },
      required: ["selector", "criteria"],
    },
  },
  {
    name: "ui_click",
    description:
      "Click a UI object. Optionally at a point (x and y together), holding for durationMs, " +
      "on a corner, or waiting for a window transition afterwards.",
    inputSchema: {
      type: "object",
      properties: {
        selector: selectorParam,
        x: { type: "number" },
        y: { type: "number" },
        durationMs: { type: "number", description: "Hold the click this long" },
        corner: { type: "string", enum: ["bottom_right", "top_left"] },
        waitForTransitionMs: { type: "number", description: "Click, then wait up to this long for a window change" },
      },
      required: ["selector"],
    },
  },
  {
    name: "ui_long_click",
    description: "Long click a UI object",
    inputSchema: {
      type: "object",
      properties: { selector: selectorParam },
      required: ["selector"],
    },
  },
  {
    name: "ui_set_text",
    description: "Set the text of an editable field. An empty or missing text clears the field.",
    inputSchema: {
      type: "object",
      properties: { selector: selectorParam, text: { type: "string" } },
      required: ["selector"],
    },
  },
  {
    name: "ui_drag",
    description: "Drag a UI object to a point (x, y) or onto the object matching target criteria",
    inputSchema: {
      type: "object",
      properties: {
        selector: selectorParam,
        x: { type: "number" },
        y: { type: "number" },
        speed: { type: "number", description: "Pixels per second" },
        target: criteriaParam,
      },
      required: ["selector"],
    },
  },
  {
    name: "ui_swipe",
    description: "Swipe on a UI object in a direction",
    inputSchema: {
      type: "object",
      properties: {
        selector: selectorParam,
        direction: directionParam,
        percent: { type: "number", description: "Swipe length as % of the object's size (0-100)" },
        speed: { type: "number" },
        ...marginParams,
      },
      required: ["selector", "direction"],
    },
  },
  {
    name: "ui_fling",
    description: "Fling a UI object in a direction",
    inputSchema: {
      type: "object",
      properties: {
        selector: selectorParam,
        direction: directionParam,
        speed: { type: "number" },
        ...marginParams,
      },
      required: ["selector", "direction"],
    },
  },
  {
    name: "ui_pinch",
    description: "Pinch open or close on a UI object",
    inputSchema: {
      type: "object",
      properties: {
        selector: selectorParam,
        mode: { type: "string", enum: ["open", "close"] },
        percent: { type: "number", description: "Pinch size as % of the object's size" },
        speed: { type: "number" },
      },
      required: ["selector", "mode", "percent"],
    },
  },
  {
    name: "ui_scroll",
    description:
      "Scroll a UI object. Give percent (and speed) for a fixed distance, until criteria to scroll until " +
      "an object is visible, click criteria to scroll to an object and click it, or nothing to scroll to the end.",
    inputSchema: {
      type: "object",
      properties: {
        selector: selectorParam,
        direction: directionParam,
        percent: { type: "number" },
        speed: { type: "number" },
        until: criteriaParam,
        click: criteriaParam,
        ...marginParams,
      },
      required: ["selector", "direction"],
    },
  },
  {
    name: "ui_wait",
    description:
      "Wait for a UI object to appear (exists), disappear (gone), or appear and then click it (click). " +
      "With assertMessage, fail with that message instead of returning false.",
    inputSchema: {
      type: "object",
      properties: {
        selector: selectorParam,
        condition: { type: "string", enum: ["exists", "gone", "click"] },
        timeoutMs: { type: "number" },
        assertMessage: { type: "string" },
      },
      required: ["selector", "condition"],
    },
  },
];

/**
 * Dispatches MCP tool calls onto UI object handles
 */
export class ToolHandler {
  constructor(private readonly device: UiDevice) {}

  async handle(name: string, args: ToolArgs): Promise<ToolResult> {
    const element = (): UiObject => this.device.fromSteps(readSelector(args));

    switch (name) {
      case "ui_exists": {
        const timeoutMs = optionalNumber(args, "timeoutMs");
        const found = timeoutMs === undefined ? await element().exists() : await element().wait().exists(timeoutMs);
        return { text: `exists: ${found}` };
      }

      case "ui_info":
        return { text: JSON.stringify(await element().info(), null, 2) };

      case "ui_count":
        return { text: `count: ${await element().count()}` };

      case "ui_children":
        return { text: JSON.stringify(await element().children(), null, 2) };

      case "ui_find": {
        const criteria = requireCriteria(args, "criteria");
        return { text: JSON.stringify(await element().find(criteria), null, 2) };
      }

      case "ui_click":
        return this.click(element(), args);

      case "ui_long_click":
        return { text: `long clicked: ${await element().longClick()}` };

      case "ui_set_text": {
        const text = optionalString(args, "text");
        if (!text) {
          return { text: `text cleared: ${await element().clearText()}` };
        }
        return { text: `text set: ${await element().setText(text)}` };
      }

      case "ui_drag": {
        const dragged = await element()
          .drag()
          .to({
            x: optionalNumber(args, "x"),
            y: optionalNumber(args, "y"),
            speed: optionalNumber(args, "speed"),
            target: optionalCriteria(args, "target"),
          });
        return { text: `dragged: ${dragged}` };
      }

      case "ui_swipe": {
        const swipe = element().swipe(readMargins(args));
        const swiped = await swipe[readDirection(args)]().perform({
          percent: optionalNumber(args, "percent"),
          speed: optionalNumber(args, "speed"),
        });
        return { text: `swiped: ${swiped}` };
      }

      case "ui_fling": {
        const fling = element().fling(readMargins(args));
        const flung = await fling[readDirection(args)]().perform({ speed: optionalNumber(args, "speed") });
        return { text: `flung: ${flung}` };
      }

      case "ui_pinch": {
        const mode = optionalString(args, "mode");
        const percent = optionalNumber(args, "percent");
        if (percent === undefined) {
          throw new ApiError("'percent' is required for ui_pinch");
        }
        const speed = optionalNumber(args, "speed");
        if (mode === "open") {
          return { text: `pinched: ${await element().pinch().open(percent, speed)}` };
        }
        if (mode === "close") {
          return { text: `pinched: ${await element().pinch().close(percent, speed)}` };
        }
        throw new ApiError(`'mode' must be open or close, got '${String(mode)}'`, { mode });
      }

      case "ui_scroll":
        return this.scroll(element(), args);

      case "ui_wait":
        return this.wait(element(), args);

      default:
        throw new Error(`Unknown tool: ${name}`);
    }
  }

  private async click(element: UiObject, args: ToolArgs): Promise<ToolResult> {
    const corner = optionalString(args, "corner");
    const waitMs = optionalNumber(args, "waitForTransitionMs");
    const x = optionalNumber(args, "x");
    const y = optionalNumber(args, "y");
    const durationMs = optionalNumber(args, "durationMs");

    const pointOrHold = x !== undefined || y !== undefined || durationMs !== undefined;
    if ([corner !== undefined, waitMs !== undefined, pointOrHold].filter(Boolean).length > 1) {
      throw new ApiError("corner, waitForTransitionMs and x/y/durationMs cannot be mixed", {
        corner,
        waitForTransitionMs: waitMs,
        x,
        y,
        durationMs,
      });
    }

    if (corner === "bottom_right") {
      return { text: `clicked: ${await element.click().bottomRight()}` };
    }
    if (corner === "top_left") {
      return { text: `clicked: ${await element.click().topLeft()}` };
    }
    if (corner !== undefined) {
      throw new ApiError(`'corner' must be bottom_right or top_left, got '${corner}'`, { corner });
    }
    if (waitMs !== undefined) {
      return { text: `window changed: ${await element.click().wait(waitMs)}` };
    }

    const clicked = await element.click().perform({ x, y, duration: durationMs });
    return { text: `clicked: ${clicked}` };
  }

  private async scroll(element: UiObject, args: ToolArgs): Promise<ToolResult> {
    const to = element.scroll(readMargins(args))[readDirection(args)]();
    const clickCriteria = optionalCriteria(args, "click");
    const percent = optionalNumber(args, "percent");
    const speed = optionalNumber(args, "speed");
    const until = optionalCriteria(args, "until");

    if (clickCriteria !== undefined) {
      if (percent !== undefined || speed !== undefined || until !== undefined) {
        throw new ApiError("Scroll and click cannot be mixed with percent, speed or until", {
          click: clickCriteria,
          percent,
          speed,
          until,
        });
      }
      return { text: `clicked: ${await to.click(clickCriteria)}` };
    }

    const scrolled = await to.perform({ percent, speed, until });
    return { text: `scrolled: ${scrolled}` };
  }

  private async wait(element: UiObject, args: ToolArgs): Promise<ToolResult> {
    const condition = optionalString(args, "condition");
    const timeoutMs = optionalNumber(args, "timeoutMs");
    const assertMessage = optionalString(args, "assertMessage");
    const wait = element.wait();

    switch (condition) {
      case "exists":
        if (assertMessage !== undefined) {
          await wait.assertExists(assertMessage, timeoutMs);
          return { text: "exists: true" };
        }
        return { text: `exists: ${await wait.exists(timeoutMs)}` };
      case "gone":
        if (assertMessage !== undefined) {
          await wait.assertGone(assertMessage, timeoutMs);
          return { text: "gone: true" };
        }
        return { text: `gone: ${await wait.gone(timeoutMs)}` };
      case "click":
        return { text: `clicked: ${await wait.click(timeoutMs)}` };
      default:
        throw new ApiError(`'condition' must be exists, gone or click, got '${String(condition)}'`, { condition });
    }
  }
}

// ============ Argument readers ============

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isCriteriaValue(value: unknown): value is CriteriaValue {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

function readSelector(args: ToolArgs): SelectorStepInput[] {
  const value = args.selector;
  if (!Array.isArray(value) || value.length === 0) {
    throw new ApiError("'selector' must be a non-empty array of steps");
  }
  return value.map((step: unknown, index: number) => {
    if (!isRecord(step)) {
      throw new ApiError(`selector[${index}] must be an object`);
    }
    return {
      relation: optionalString(step, "relation"),
      criteria: optionalCriteria(step, "criteria"),
    };
  });
}

function optionalCriteria(args: ToolArgs, key: string): Criteria | undefined {
  const value = args[key];
  if (value === undefined) return undefined;
  if (!isRecord(value)) {
    throw new ApiError(`'${key}' must be an object of criteria`);
  }
  const criteria: Record<string, CriteriaValue> = {};
  for (const [name, entry] of Object.entries(value)) {
    if (!isCriteriaValue(entry)) {
      throw new ApiError(`Criteria '${name}' must be a string, number or boolean`);
    }
    criteria[name] = entry;
  }
  return criteria;
}

function requireCriteria(args: ToolArgs, key: string): Criteria {
  const criteria = optionalCriteria(args, key);
  if (criteria === undefined) {
    throw new ApiError(`'${key}' is required`);
  }
  return criteria;
}

function optionalNumber(args: ToolArgs, key: string): number | undefined {
  const value = args[key];
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ApiError(`'${key}' must be a number`);
  }
  return value;
}

function optionalString(args: ToolArgs, key: string): string | undefined {
  const value = args[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    throw new ApiError(`'${key}' must be a string`);
  }
  return value;
}

function readDirection(args: ToolArgs): DirectionName {
  const value = args.direction;
  const direction = DIRECTIONS.find((name) => name === value);
  if (!direction) {
    throw new ApiError(`'direction' must be one of ${DIRECTIONS.join(", ")}`, { direction: value });
  }
  return direction;
}

function readMargins(args: ToolArgs): GestureMargins | undefined {
  const margin = optionalNumber(args, "margin");
  const percent = optionalNumber(args, "marginPercent");
  if (margin === undefined && percent === undefined) return undefined;
  return { margin, percent };
}
