// pattern: Functional Core

function nonBlank(value: string | null | undefined): string | null {
  return value != null && value.trim() !== "" ? value : null;
}

/**
 * Builds the `q` parameter for the repository search endpoint.
 * Qualifiers appear in a fixed order: language, creation date, then free text.
 */
export function buildSearchQuery(
  language: string | null,
  since: string | null,
  extraQuery: string | null,
): string {
  const parts: Array<string> = [];

  const lang = nonBlank(language);
  if (lang !== null) parts.push(`language:${lang}`);

  const created = nonBlank(since);
  if (created !== null) parts.push(`created:>${created}`);

  const extra = nonBlank(extraQuery);
  if (extra !== null) parts.push(extra);

  return parts.join(" ").trim();
}

/**
 * Cache key shared by the raw and scored result caches.
 * A blank extra query and an absent one produce the same key.
 */
export function buildQuerySignature(
  language: string,
  since: string,
  extraQuery: string | null,
  limit: number,
): string {
  return [language, since, nonBlank(extraQuery) ?? "", String(limit)].join("|");
}
