/**
 * Modifier helpers for declaration nodes
 */

import * as ts from "typescript";
import type { Accessibility } from "../types/descriptor.js";

const hasModifier = (node: ts.Node, kind: ts.SyntaxKind): boolean => {
  if (!ts.canHaveModifiers(node)) return false;
  const modifiers = ts.getModifiers(node);
  return modifiers?.some((m) => m.kind === kind) ?? false;
};

export const hasStaticModifier = (node: ts.Node): boolean =>
  hasModifier(node, ts.SyntaxKind.StaticKeyword);

export const hasReadonlyModifier = (node: ts.Node): boolean =>
  hasModifier(node, ts.SyntaxKind.ReadonlyKeyword);

export const hasAbstractModifier = (node: ts.Node): boolean =>
  hasModifier(node, ts.SyntaxKind.AbstractKeyword);

/**
 * Get accessibility modifier
 */
export const getAccessibility = (node: ts.Node): Accessibility => {
  if (hasModifier(node, ts.SyntaxKind.PrivateKeyword)) return "private";
  if (hasModifier(node, ts.SyntaxKind.ProtectedKeyword)) return "protected";
  return "public";
};

/**
 * A constructor parameter with an explicit accessibility or readonly
 * modifier declares a field.
 */
export const isParameterProperty = (param: ts.ParameterDeclaration): boolean =>
  hasModifier(param, ts.SyntaxKind.PublicKeyword) ||
  hasModifier(param, ts.SyntaxKind.PrivateKeyword) ||
  hasModifier(param, ts.SyntaxKind.ProtectedKeyword) ||
  hasModifier(param, ts.SyntaxKind.ReadonlyKeyword);
