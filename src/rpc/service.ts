import type { SelectorWire } from "../selector/selector.js";
import type { Direction, Point, Rect, UiObjectInfo } from "../ui/types.js";

type Method<P extends unknown[], R> = { params: P; result: R };

type Ms = number | null;
type Speed = number | null;
type Margin = number | null;
type MarginPercent = number | null;

/**
 * RPC surface of the on-device snippet server, one entry per method.
 * Absent optional scalars travel as null.
 */
export interface UiRpcMethods {
  exists: Method<[selector: SelectorWire], boolean>;
  findObjects: Method<[selector: SelectorWire], UiObjectInfo[]>;
  getObjInfo: Method<[selector: SelectorWire], UiObjectInfo>;
  getChildren: Method<[selector: SelectorWire], UiObjectInfo[]>;
  findChildObjects: Method<[selector: SelectorWire, sub: SelectorWire], UiObjectInfo[]>;
  hasChildObject: Method<[selector: SelectorWire, sub: SelectorWire], boolean>;

  getVisibleBounds: Method<[selector: SelectorWire], Rect | null>;
  getVisibleCenter: Method<[selector: SelectorWire], Point | null>;
  getDisplayId: Method<[selector: SelectorWire], number>;
  getText: Method<[selector: SelectorWire], string>;
  getClassName: Method<[selector: SelectorWire], string>;
  getContentDescription: Method<[selector: SelectorWire], string>;
  getHint: Method<[selector: SelectorWire], string>;
  getApplicationPackage: Method<[selector: SelectorWire], string>;
  getResourceName: Method<[selector: SelectorWire], string>;

  isCheckable: Method<[selector: SelectorWire], boolean>;
  isChecked: Method<[selector: SelectorWire], boolean>;
  isClickable: Method<[selector: SelectorWire], boolean>;
  isEnabled: Method<[selector: SelectorWire], boolean>;
  isFocusable: Method<[selector: SelectorWire], boolean>;
  isFocused: Method<[selector: SelectorWire], boolean>;
  isLongClickable: Method<[selector: SelectorWire], boolean>;
  isScrollable: Method<[selector: SelectorWire], boolean>;
  isSelected: Method<[selector: SelectorWire], boolean>;

  clear: Method<[selector: SelectorWire], boolean>;
  setText: Method<[selector: SelectorWire, text: string], boolean>;
  longClick: Method<[selector: SelectorWire], boolean>;

  click: Method<[x: number, y: number], boolean>;
  clickObj: Method<[selector: SelectorWire, durationMs: Ms], boolean>;
  clickObjPoint: Method<[selector: SelectorWire, x: number, y: number, durationMs: Ms], boolean>;
  clickObjAndWait: Method<[selector: SelectorWire, timeoutMs: number], boolean>;

  dragObj: Method<[selector: SelectorWire, x: number, y: number, speed: Speed], boolean>;
  dragObjToObj: Method<[selector: SelectorWire, target: SelectorWire, speed: Speed], boolean>;

  fling: Method<[selector: SelectorWire, direction: Direction, speed: Speed, margin: Margin, percent: MarginPercent], boolean>;
  swipeObj: Method<
    [selector: SelectorWire, direction: Direction, percent: number, speed: Speed, margin: Margin, marginPercent: MarginPercent],
    boolean
  >;
  pinchClose: Method<[selector: SelectorWire, percent: number, speed: Speed], boolean>;
  pinchOpen: Method<[selector: SelectorWire, percent: number, speed: Speed], boolean>;

  scroll: Method<
    [selector: SelectorWire, direction: Direction, percent: number, speed: Speed, margin: Margin, marginPercent: MarginPercent],
    boolean
  >;
  scrollUntil: Method<
    [selector: SelectorWire, target: SelectorWire, direction: Direction, margin: Margin, marginPercent: MarginPercent],
    boolean
  >;
  scrollUntilFinished: Method<[selector: SelectorWire, direction: Direction, margin: Margin, marginPercent: MarginPercent], boolean>;

  waitForExists: Method<[selector: SelectorWire, timeoutMs: number], boolean>;
  waitUntilGone: Method<[selector: SelectorWire, timeoutMs: number], boolean>;
}

export type UiRpcMethod = keyof UiRpcMethods;
export type UiRpcParams<M extends UiRpcMethod> = UiRpcMethods[M]["params"];
export type UiRpcResult<M extends UiRpcMethod> = UiRpcMethods[M]["result"];

/**
 * Request/response channel to a connected automation service.
 *
 * Implementations own connection handling; failures of the channel itself
 * propagate to callers untouched.
 */
export interface RemoteAutomationService {
  /** Longest round trip the channel tolerates; wait-style calls must stay below it. */
  readonly rpcTimeoutMs: number;
  call<M extends UiRpcMethod>(method: M, ...params: UiRpcParams<M>): Promise<UiRpcResult<M>>;
}
