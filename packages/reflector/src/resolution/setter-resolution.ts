/**
 * Setter conflict resolution
 *
 * Runs after getters. A setter whose parameter type equals the resolved
 * getter type wins outright; otherwise candidates are reduced pairwise,
 * keeping the narrower parameter type.
 */

import { formatTypeRef, isAssignableFrom, typeRefsEqual } from "@proplens/metadata";
import type { AccessorCandidate, CandidateGroups } from "../accessor-classifier.js";
import type { AmbiguousInvoker, Invoker } from "../invokers/types.js";
import {
  methodCallInvoker,
  resolveCandidateType,
  type InvokerTable,
  type ResolutionContext,
} from "./context.js";

const matchGetter = (
  candidates: readonly AccessorCandidate[],
  getter: Invoker | undefined
): AccessorCandidate | undefined => {
  if (!getter || getter.kind === "ambiguous") return undefined;
  return candidates.find((c) => typeRefsEqual(c.erasedType, getter.type));
};

const ambiguousSetter = (
  ctx: ResolutionContext,
  propertyName: string,
  best: AccessorCandidate,
  incoming: AccessorCandidate
): AmbiguousInvoker => {
  const declaringType = incoming.entry.declaringType.name;
  return {
    kind: "ambiguous",
    propertyName,
    subjectType: ctx.subject.name,
    declaringType,
    candidateTypes: [best.erasedType, incoming.erasedType],
    message: `Ambiguous setters defined for property '${propertyName}' in type '${declaringType}' with types '${formatTypeRef(best.erasedType)}' and '${formatTypeRef(incoming.erasedType)}'.`,
    type: resolveCandidateType(ctx, best),
  };
};

const resolveSetter = (
  ctx: ResolutionContext,
  propertyName: string,
  candidates: readonly AccessorCandidate[],
  getter: Invoker | undefined
): Invoker | undefined => {
  const exact = matchGetter(candidates, getter);
  if (exact) return methodCallInvoker(ctx, exact);

  let best: AccessorCandidate | undefined;
  for (const candidate of candidates) {
    if (!best) {
      best = candidate;
    } else if (isAssignableFrom(ctx.catalog, best.erasedType, candidate.erasedType)) {
      best = candidate;
    } else if (!isAssignableFrom(ctx.catalog, candidate.erasedType, best.erasedType)) {
      return ambiguousSetter(ctx, propertyName, best, candidate);
    }
  }

  return best ? methodCallInvoker(ctx, best) : undefined;
};

export const resolveSetters = (
  ctx: ResolutionContext,
  groups: CandidateGroups,
  getters: InvokerTable
): InvokerTable => {
  const table: InvokerTable = new Map();
  for (const [propertyName, candidates] of groups) {
    const invoker = resolveSetter(
      ctx,
      propertyName,
      candidates,
      getters.get(propertyName)
    );
    if (invoker) table.set(propertyName, invoker);
  }
  return table;
};
