import { URLParseError } from './errors';
import type { ParamMap } from './multimap';

export interface BuildUrlInput {
  rawUrl: string;
  baseUrl?: string;
  pathParams?: ReadonlyMap<string, string>;
  queryParams?: ParamMap;
  clientPathParams?: ReadonlyMap<string, string>;
  clientQueryParams?: ParamMap;
}

const PLACEHOLDER = /\{([^{}]+)\}/g;

/**
 * Builds the final request URL.
 *
 * Relative URLs are joined onto the base URL, `{name}` placeholders are replaced
 * verbatim (request path params win over client ones, unknown placeholders stay),
 * and query params are appended after the URL's own query: client pairs first,
 * then request pairs, without deduplication.
 */
export function buildUrl(input: BuildUrlInput): URL {
  let target = input.rawUrl;
  if (!target.startsWith('http') && input.baseUrl) {
    target = `${input.baseUrl}/${target.replace(/^\/+/, '')}`;
  }

  const pathParams = new Map<string, string>([
    ...(input.clientPathParams ?? []),
    ...(input.pathParams ?? []),
  ]);
  if (pathParams.size > 0) {
    target = target.replace(PLACEHOLDER, (match: string, key: string) => pathParams.get(key) ?? match);
  }

  let url: URL;
  try {
    url = new URL(target);
  } catch (error) {
    throw new URLParseError(target, error);
  }

  const query = new URLSearchParams(url.search);
  for (const source of [input.clientQueryParams, input.queryParams]) {
    if (!source) continue;
    for (const [key, value] of source.entries()) {
      query.append(key, value);
    }
  }
  url.search = query.toString();
  return url;
}

export function normalizeBaseUrl(value?: string): string {
  if (!value) {
    return '';
  }
  return value.trim().replace(/\/+$/, '');
}
