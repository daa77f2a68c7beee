export { Selector, type SelectorStep, type SelectorWire } from "./selector/selector.js";
export { RELATIONS, isRelation, type Criteria, type CriteriaValue, type Relation } from "./selector/criteria.js";

export type { RemoteAutomationService, UiRpcMethods, UiRpcMethod, UiRpcParams, UiRpcResult } from "./rpc/service.js";
export { SnippetClient, type SnippetClientOptions } from "./rpc/snippet-client.js";

export { UiDevice, type UiDeviceOptions, type SelectorStepInput } from "./ui/device.js";
export { UiObject } from "./ui/ui-object.js";
export { ClickAction, type ClickOptions } from "./ui/actions/click.js";
export { DragAction, type DragOptions } from "./ui/actions/drag.js";
export { GestureAction, GestureTo, type GestureKind, type GestureOptions } from "./ui/actions/gesture.js";
export { PinchAction } from "./ui/actions/pinch.js";
export { ScrollAction, ScrollTo, type ScrollOptions } from "./ui/actions/scroll.js";
export { WaitAction } from "./ui/actions/wait.js";
export type { Direction, GestureMargins, Point, Rect, UiObjectInfo } from "./ui/types.js";

export { ApiError, SnippetRpcError, UiAutomationError, UiObjectSearchError } from "./errors.js";
export {
  DEFAULT_RPC_TIMEOUT_MS,
  DEFAULT_UI_WAIT_MS,
  assertWithinRpcTimeout,
  toMilliseconds,
  type Duration,
  type TimeUnit,
} from "./utils/time.js";

export { resolveConfig, type AppConfig } from "./config.js";
export { ToolHandler, tools, type ToolResult } from "./tool-handlers.js";
export { UiObjectMcpServer, createServer } from "./server.js";
