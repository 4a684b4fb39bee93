/**
 * Declarations the compiler must reject. Checked by `tsc --noEmit` (the first
 * step of `npm test`); an `@ts-expect-error` with no error under it fails the
 * build.
 */

import { t } from "../src/compat.js";
import { fullType } from "../src/full-type.js";
import { nested, plain, projection } from "../src/projection.js";

const IssueFull = fullType("Issue", {
  id: t.optional(t.string),
  priority: t.optional(t.boxed(t.string)),
  createdAt: t.optional(t.timestamp),
  state: t.optional(t.boxed(t.named("WorkflowState"))),
});

const StateRef = projection({
  name: "StateRef",
  fields: { id: plain(t.string) },
});

export function acceptedDeclarations() {
  return [
    projection({ name: "Ok", fullType: IssueFull, fields: { id: plain(t.string), priority: plain(t.string) } }),
    projection({ name: "OkTimestamp", fullType: IssueFull, fields: { created_at: plain(t.optional(t.string)) } }),
    projection({ name: "OkNested", fullType: IssueFull, fields: { state: nested(StateRef, "optional") } }),
  ];
}

export function rejectedDeclarations() {
  return [
    // @ts-expect-error severity does not exist on Issue
    projection({ name: "Missing", fullType: IssueFull, fields: { severity: plain(t.string) } }),
    // @ts-expect-error Int is not a narrowing of Optional<Boxed<String>>
    projection({ name: "BadPriority", fullType: IssueFull, fields: { priority: plain(t.int) } }),
    // @ts-expect-error stat does not exist on Issue
    projection({ name: "Misspelled", fullType: IssueFull, fields: { stat: nested(StateRef) } }),
    // @ts-expect-error a projection may not add an Optional the full type lacks
    projection({ name: "Widened", fullType: fullType("Tag", { id: t.string }), fields: { id: plain(t.optional(t.string)) } }),
  ];
}
