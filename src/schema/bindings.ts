/**
 * schemagraph — Property Bindings
 *
 * A binding says where a property value comes from when a row is written:
 * a field of the row, a constant passed once per load call, or a list field
 * that fans a relationship match out to several target nodes.
 */

// =============================================================================
// Binding Union
// =============================================================================

/** How a matcher term compares the resolved value with the graph property. */
export type MatchMode = "exact" | "ignoreCase" | "contains";

/** Value pulled from the current row. Absent fields resolve to `null`. */
export type FromRowBinding = {
  kind: "row";
  field: string;
  /** Ask the index manager for a lookup index on this property. */
  extraIndex: boolean;
  /** Only meaningful inside a target matcher. */
  match: MatchMode;
};

/** Constant supplied once for the whole call. Missing names are a configuration error. */
export type FromKwargsBinding = {
  kind: "kwargs";
  name: string;
  extraIndex: boolean;
};

/** Row field holding a list; each element matches separately (one-to-many). */
export type FromRowListBinding = {
  kind: "rowList";
  field: string;
};

export type Binding = FromRowBinding | FromKwargsBinding | FromRowListBinding;

/** Ordered `[graphProperty, binding]` pairs. */
export type BindingList = ReadonlyArray<readonly [string, Binding]>;

// =============================================================================
// Constructors
// =============================================================================

export type FromRowOptions = {
  extraIndex?: boolean;
  /** Compare case-insensitively when matching a target. */
  ignoreCase?: boolean;
  /** Match when the target property contains the value, case-insensitively. */
  fuzzyAndIgnoreCase?: boolean;
};

export function fromRow(field: string, opts: FromRowOptions = {}): FromRowBinding {
  let match: MatchMode = "exact";
  if (opts.fuzzyAndIgnoreCase) match = "contains";
  else if (opts.ignoreCase) match = "ignoreCase";
  return Object.freeze({ kind: "row", field, extraIndex: opts.extraIndex ?? false, match });
}

export function fromKwargs(name: string, opts: { extraIndex?: boolean } = {}): FromKwargsBinding {
  return Object.freeze({ kind: "kwargs", name, extraIndex: opts.extraIndex ?? false });
}

export function fromRowList(field: string): FromRowListBinding {
  return Object.freeze({ kind: "rowList", field });
}

/** Accepts a record (insertion order kept) or an explicit pair list. */
export type BindingInput = Readonly<Record<string, Binding>> | BindingList;

function isBindingList(input: BindingInput): input is BindingList {
  return Array.isArray(input);
}

export function toBindingList(input: BindingInput): BindingList {
  const pairs: Array<readonly [string, Binding]> = isBindingList(input)
    ? [...input]
    : Object.entries(input);
  return Object.freeze(pairs.map(([name, binding]) => Object.freeze([name, binding] as const)));
}

/** Short human form used in error messages and CLI output. */
export function describeBinding(binding: Binding): string {
  switch (binding.kind) {
    case "row":
      return binding.match === "exact"
        ? `row.${binding.field}`
        : `row.${binding.field} (${binding.match})`;
    case "kwargs":
      return `$${binding.name}`;
    case "rowList":
      return `row.${binding.field}[]`;
  }
}

export function bindingExtraIndex(binding: Binding): boolean {
  return binding.kind === "rowList" ? false : binding.extraIndex;
}
