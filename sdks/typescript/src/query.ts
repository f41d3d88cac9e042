export type QueryParams = Record<string, string | number | undefined>;

/** Appends the defined parameters to a relative path as a query string. */
export function withQuery(path: string, params: QueryParams): string {
  const searchParams = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined || value === "") continue;
    searchParams.set(key, String(value));
  }
  const qs = searchParams.toString();
  return qs ? `${path}?${qs}` : path;
}
