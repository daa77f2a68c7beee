/**
 * Matching criteria understood by the on-device snippet server.
 *
 * The layer does not validate keys; the snippet server translates them to
 * native BySelector matchers and rejects unknown ones. The commonly used keys:
 *
 * | key | matches |
 * |---|---|
 * | `text`, `textContains`, `textStartsWith`, `textEndsWith` | visible text |
 * | `desc`, `descContains`, `descStartsWith`, `descEndsWith` | content description |
 * | `res` | fully qualified resource id (`com.example:id/title`) |
 * | `clazz` | widget class name |
 * | `pkg` | application package |
 * | `checkable`, `checked`, `clickable`, `enabled`, `focusable`, `focused`, `longClickable`, `scrollable`, `selected` | state flags |
 * | `depth` | depth in the hierarchy |
 */

export type CriteriaValue = string | number | boolean;

export type Criteria = Readonly<Record<string, CriteriaValue>>;

export const RELATIONS = [
  "parent",
  "ancestor",
  "child",
  "sibling",
  "bottom",
  "left",
  "right",
  "top",
] as const;

export type Relation = (typeof RELATIONS)[number];

export function isRelation(value: unknown): value is Relation {
  return typeof value === "string" && (RELATIONS as readonly string[]).includes(value);
}

export function isEmptyCriteria(criteria: Criteria | undefined): boolean {
  return criteria === undefined || Object.keys(criteria).length === 0;
}
