/**
 * Accessor naming convention
 *
 * `getX()` / `isX()` read, `setX(v)` writes. The property name is the
 * remainder with its first character lower-cased, unless the remainder
 * starts with two capitals (`getURL` → `URL`).
 */

/** Names that never denote a property */
const RESERVED_NAMES: ReadonlySet<string> = new Set([
  "serialVersionUID", // serialization-version marker
  "class", // identity reflection (getClass)
]);

const INTERNAL_MARKER = "$";

export const isValidPropertyName = (name: string): boolean =>
  !(name.startsWith(INTERNAL_MARKER) || RESERVED_NAMES.has(name));

/**
 * `is` only names a getter when the method returns boolean.
 */
export const isGetterName = (name: string, returnsBoolean: boolean): boolean =>
  (name.startsWith("get") && name.length > 3) ||
  (returnsBoolean && name.startsWith("is") && name.length > 2);

export const isSetterName = (name: string): boolean =>
  name.startsWith("set") && name.length > 3;

const isUpperCase = (char: string): boolean =>
  char !== char.toLowerCase() && char === char.toUpperCase();

/**
 * Derive the property name from an accessor method name.
 * Returns undefined when the name carries no accessor prefix.
 */
export const methodToProperty = (methodName: string): string | undefined => {
  let name: string;
  if (methodName.startsWith("is")) {
    name = methodName.slice(2);
  } else if (methodName.startsWith("get") || methodName.startsWith("set")) {
    name = methodName.slice(3);
  } else {
    return undefined;
  }

  const second = name.charAt(1);
  if (name.length === 1 || (name.length > 1 && !isUpperCase(second))) {
    return name.charAt(0).toLowerCase() + name.slice(1);
  }
  return name;
};
