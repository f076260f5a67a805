/** Immutable `name -> value` view of a form, rebuilt for every check. */
export type FormSnapshot = Readonly<Record<string, unknown>>;

/**
 * Visibility condition over a form snapshot. Predicates are plain data plus
 * a pure `test`, so they can be evaluated in isolation.
 */
export interface AppearPredicate {
  readonly description: string;
  test(snapshot: FormSnapshot): boolean;
}

function predicate(description: string, test: (snapshot: FormSnapshot) => boolean): AppearPredicate {
  return Object.freeze({ description, test });
}

const isSet = (value: unknown) => value !== null && value !== undefined;

/**
 * Builds predicates keyed on one field name.
 *
 * ```ts
 * when("allow_exchange").equals(true)
 * ```
 */
export function when(name: string) {
  return {
    equals: (expected: unknown) =>
      predicate(`${name} == ${String(expected)}`, (s) => s[name] === expected),
    notEquals: (expected: unknown) =>
      predicate(`${name} != ${String(expected)}`, (s) => s[name] !== expected),
    oneOf: (options: readonly unknown[]) =>
      predicate(`${name} in [${options.map(String).join(", ")}]`, (s) =>
        options.includes(s[name]),
      ),
    isSet: () => predicate(`${name} is set`, (s) => isSet(s[name])),
    isUnset: () => predicate(`${name} is unset`, (s) => !isSet(s[name])),
  };
}

export function allOf(...predicates: AppearPredicate[]): AppearPredicate {
  return predicate(
    predicates.map((p) => p.description).join(" and "),
    (s) => predicates.every((p) => p.test(s)),
  );
}

export function anyOf(...predicates: AppearPredicate[]): AppearPredicate {
  return predicate(
    predicates.map((p) => p.description).join(" or "),
    (s) => predicates.some((p) => p.test(s)),
  );
}
