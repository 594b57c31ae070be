/**
 * Binding annotations: `source=key[,source=key...]`, first match wins.
 *
 *   "query=page,default=1"
 *   "header=X-Correlation-Id"
 *   "path=id,query=id"
 */

export const SOURCE_QUERY = "query";
export const SOURCE_HEADER = "header";
export const SOURCE_PATH = "path";
export const SOURCE_DEFAULT = "default";

export type SourceKind =
  | typeof SOURCE_QUERY
  | typeof SOURCE_HEADER
  | typeof SOURCE_PATH
  | typeof SOURCE_DEFAULT;

export interface TagPart {
  readonly source: string;
  /** Lookup key, or the literal value for a `default` part */
  readonly key: string;
}

export interface FieldDescriptor {
  /** Key of the first non-default part, or "default" when only defaults exist */
  readonly canonicalName: string;
  /** Source of the first non-default part, "" when there is none */
  readonly firstSource: string;
  readonly parts: readonly TagPart[];
}

/**
 * Parse a binding annotation. Parts without a `=` are skipped; a part is
 * split on its first `=` so default literals may contain more of them.
 * Returns null when nothing bindable remains.
 */
export const parseTag = (annotation: string | undefined): FieldDescriptor | null => {
  if (annotation === undefined || annotation === "") return null;

  const parts: TagPart[] = [];
  let canonicalName = "";
  let firstSource = "";

  for (const raw of annotation.split(",")) {
    const trimmed = raw.trim();
    const eq = trimmed.indexOf("=");
    if (eq === -1) continue;

    const source = trimmed.slice(0, eq).trim();
    const key = trimmed.slice(eq + 1).trim();
    parts.push({ source, key });

    if (canonicalName === "" && source !== SOURCE_DEFAULT) {
      canonicalName = key;
      firstSource = source;
    }
  }

  if (parts.length === 0) return null;

  if (canonicalName === "") canonicalName = SOURCE_DEFAULT;

  return { canonicalName, firstSource, parts };
};
