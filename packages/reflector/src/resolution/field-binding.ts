/**
 * Field fallback: fields not covered by an accessor method become
 * direct field-access invokers.
 */

import { resolveMemberType, type FieldDescriptor } from "@proplens/metadata";
import type { FieldLevel } from "../member-enumerator.js";
import { isValidPropertyName } from "../property-namer.js";
import type { FieldAccessInvoker, FieldAccessMode } from "../invokers/types.js";
import { isReachable, type InvokerTable, type ResolutionContext } from "./context.js";

const fieldInvoker = (
  ctx: ResolutionContext,
  level: FieldLevel,
  field: FieldDescriptor,
  mode: FieldAccessMode
): FieldAccessInvoker => ({
  kind: "fieldAccess",
  mode,
  field,
  declaringType: level.declaringType,
  type: resolveMemberType(ctx.catalog, ctx.subject, level.declaringType, field.type),
  reachable: isReachable(ctx, field.accessibility),
});

/**
 * Fill both tables in place, subject level first so a subclass field
 * shadows an inherited one of the same name.
 * Static readonly fields are never written.
 */
export const bindFields = (
  ctx: ResolutionContext,
  levels: readonly FieldLevel[],
  getters: InvokerTable,
  setters: InvokerTable
): void => {
  for (const level of levels) {
    for (const field of level.fields) {
      if (!isValidPropertyName(field.name)) continue;

      if (!setters.has(field.name) && !(field.isReadonly && field.isStatic)) {
        setters.set(field.name, fieldInvoker(ctx, level, field, "write"));
      }
      if (!getters.has(field.name)) {
        getters.set(field.name, fieldInvoker(ctx, level, field, "read"));
      }
    }
  }
};
