/**
 * Getter conflict resolution
 *
 * Candidates for one property are reduced in discovery order. A narrower
 * return type replaces a wider one; `isX` wins over `getX` for boolean;
 * anything else is ambiguous and stops the reduction.
 */

import {
  isAssignableFrom,
  isBooleanType,
  typeRefsEqual,
} from "@proplens/metadata";
import type { AccessorCandidate, CandidateGroups } from "../accessor-classifier.js";
import type { AmbiguousInvoker, Invoker } from "../invokers/types.js";
import {
  methodCallInvoker,
  resolveCandidateType,
  type InvokerTable,
  type ResolutionContext,
} from "./context.js";

type Reduction = {
  readonly winner: AccessorCandidate;
  readonly conflict?: AccessorCandidate;
};

const reduce = (
  ctx: ResolutionContext,
  first: AccessorCandidate,
  rest: readonly AccessorCandidate[]
): Reduction => {
  let winner = first;

  for (const candidate of rest) {
    const winnerType = winner.erasedType;
    const candidateType = candidate.erasedType;

    if (typeRefsEqual(candidateType, winnerType)) {
      if (!isBooleanType(candidateType)) {
        return { winner, conflict: candidate };
      }
      if (candidate.entry.method.name.startsWith("is")) {
        winner = candidate;
      }
    } else if (isAssignableFrom(ctx.catalog, candidateType, winnerType)) {
      // winner is the narrower type
    } else if (isAssignableFrom(ctx.catalog, winnerType, candidateType)) {
      winner = candidate;
    } else {
      return { winner, conflict: candidate };
    }
  }

  return { winner };
};

const ambiguousGetter = (
  ctx: ResolutionContext,
  propertyName: string,
  winner: AccessorCandidate,
  conflict: AccessorCandidate
): AmbiguousInvoker => {
  const declaringType = winner.entry.declaringType.name;
  return {
    kind: "ambiguous",
    propertyName,
    subjectType: ctx.subject.name,
    declaringType,
    candidateTypes: [winner.erasedType, conflict.erasedType],
    message:
      `Illegal overloaded getter method with ambiguous type for property '${propertyName}' in type '${declaringType}'. ` +
      "This breaks the expected accessor specification and can cause unpredictable results.",
    type: resolveCandidateType(ctx, winner),
  };
};

const resolveGetter = (
  ctx: ResolutionContext,
  propertyName: string,
  candidates: readonly AccessorCandidate[]
): Invoker | undefined => {
  const [first, ...rest] = candidates;
  if (!first) return undefined;

  const { winner, conflict } = reduce(ctx, first, rest);
  return conflict
    ? ambiguousGetter(ctx, propertyName, winner, conflict)
    : methodCallInvoker(ctx, winner);
};

export const resolveGetters = (
  ctx: ResolutionContext,
  groups: CandidateGroups
): InvokerTable => {
  const table: InvokerTable = new Map();
  for (const [propertyName, candidates] of groups) {
    const invoker = resolveGetter(ctx, propertyName, candidates);
    if (invoker) table.set(propertyName, invoker);
  }
  return table;
};
