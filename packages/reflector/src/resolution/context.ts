/**
 * Shared state and helpers for accessor resolution
 */

import {
  resolveMemberType,
  type Accessibility,
  type TypeCatalog,
  type TypeDescriptor,
  type TypeRef,
} from "@proplens/metadata";
import type { AccessorCandidate } from "../accessor-classifier.js";
import type { Invoker, MethodCallInvoker } from "../invokers/types.js";

export type ResolutionContext = {
  readonly catalog: TypeCatalog;
  readonly subject: TypeDescriptor;
  readonly canBypassVisibility: boolean;
};

/** Property name → invoker; the invoker carries the side's type */
export type InvokerTable = Map<string, Invoker>;

export const isReachable = (
  ctx: ResolutionContext,
  accessibility: Accessibility
): boolean => accessibility === "public" || ctx.canBypassVisibility;

/**
 * The candidate's value type as seen from the subject type.
 */
export const resolveCandidateType = (
  ctx: ResolutionContext,
  candidate: AccessorCandidate
): TypeRef =>
  resolveMemberType(
    ctx.catalog,
    ctx.subject,
    candidate.entry.declaringType,
    candidate.declaredType,
    candidate.entry.method.typeParameters
  );

export const methodCallInvoker = (
  ctx: ResolutionContext,
  candidate: AccessorCandidate
): MethodCallInvoker => ({
  kind: "methodCall",
  method: candidate.entry.method,
  declaringType: candidate.entry.declaringType,
  type: resolveCandidateType(ctx, candidate),
  reachable: isReachable(ctx, candidate.entry.method.accessibility),
});
