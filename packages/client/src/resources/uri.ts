import { FormatError } from '@predictkit/utils';

/**
 * The trailing integer id of a resource URI, e.g. `http://example.com/api/forecast/71/` -> 71.
 * Empty path segments (trailing or doubled slashes) are ignored.
 */
export function idForUri(uri: string): number {
  const segments = uri.split('/').filter((segment) => segment !== '');
  const last = segments[segments.length - 1];
  if (last === undefined || !/^\d+$/.test(last)) {
    throw new FormatError(`No trailing integer id in URI '${uri}'`, { uri });
  }
  return Number(last);
}
