/**
 * Selection (callback data) addressing:
 *   "tag", "tag:id", "tag:page", "tag:param1:param2"
 * Parameter count and position are fixed per tag and checked before use.
 */

export interface Selection {
  tag: string;
  params: string[];
}

export function parseSelection(data: string): Selection {
  const [tag = '', ...params] = data.trim().split(':');
  return { tag: tag.toLowerCase(), params };
}

export function formatSelection(tag: string, ...params: Array<string | number>): string {
  return [tag, ...params.map(String)].join(':');
}

/** Parse a positive integer id parameter; null when malformed. */
export function parseIdParam(raw: string | undefined): number | null {
  if (raw === undefined || !/^\d{1,15}$/.test(raw)) return null;
  const id = Number(raw);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}
