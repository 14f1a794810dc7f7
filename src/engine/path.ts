const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export const ROOT_PATH = "$";

/**
 * Append a field name or index to a path: `$.user`, `$.items[2]`, `$["a b"]`.
 */
export function joinPath(path: string, segment?: string | number): string {
  if (segment === undefined) return path;
  if (typeof segment === "number") return `${path}[${segment}]`;
  if (IDENTIFIER.test(segment)) return `${path}.${segment}`;
  return `${path}[${JSON.stringify(segment)}]`;
}
