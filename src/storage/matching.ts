/**
 * Value comparison shared by the in-process stores. Mirrors Cypher: a `null`
 * on either side never matches, and case-insensitive modes only apply to
 * strings.
 */

import type {
  MatchCriteria,
  MatchTerm,
  PropertyMap,
  PropertyValue,
  RowValue,
  ScalarValue,
} from "../types.js";

export function valuesEqual(a: PropertyValue, b: PropertyValue): boolean {
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b)) return false;
    const left: ScalarValue[] = a;
    const right: ScalarValue[] = b;
    return left.length === right.length && left.every((value, i) => value === right[i]);
  }
  return a === b;
}

export function termMatches(actual: PropertyValue | undefined, term: MatchTerm): boolean {
  if (actual === undefined || term.value === null) return false;
  switch (term.mode) {
    case "exact":
      return valuesEqual(actual, term.value);
    case "ignoreCase":
      return (
        typeof actual === "string" &&
        typeof term.value === "string" &&
        actual.toLowerCase() === term.value.toLowerCase()
      );
    case "contains":
      return (
        typeof actual === "string" &&
        typeof term.value === "string" &&
        actual.toLowerCase().includes(term.value.toLowerCase())
      );
  }
}

export function criteriaMatch(properties: PropertyMap, criteria: MatchCriteria): boolean {
  return criteria.every((term) => termMatches(properties[term.property], term));
}

/** `lastupdated <> tag`; a missing `lastupdated` is never stale. */
export function isStale(properties: PropertyMap, tag: RowValue): boolean {
  const current = properties.lastupdated;
  if (current === undefined || tag === null) return false;
  return !valuesEqual(current, tag);
}

/** Apply SET semantics: `null` removes the property, anything else overwrites it. */
export function applyProperties(
  target: PropertyMap,
  values: Readonly<Record<string, RowValue>>,
): void {
  for (const [name, value] of Object.entries(values)) {
    if (value === null) delete target[name];
    else target[name] = Array.isArray(value) ? [...value] : value;
  }
}
