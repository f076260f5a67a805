/** Variables substituted into `{name}` placeholders. */
export type MessageVars = Readonly<Record<string, string | number>>;

/**
 * Translation hook. Every string shown to a user passes through one of these
 * before reaching Discord; the form context carries the active one.
 */
export type Translate = (text: string, vars?: MessageVars) => string;

const PLACEHOLDER = /\{(\w+)\}/g;

/**
 * Default translator: no catalog, only placeholder substitution. Unknown
 * placeholders are left as written.
 */
export const formatMessage: Translate = (text, vars) => {
  if (!vars) return text;
  return text.replace(PLACEHOLDER, (match, key: string) =>
    key in vars ? String(vars[key]) : match,
  );
};
