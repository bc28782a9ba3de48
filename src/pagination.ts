/**
 * GitHub paginates list endpoints with RFC 8288 Link headers:
 *
 *   Link: <https://api.github.com/app/installations?page=2>; rel="next",
 *         <https://api.github.com/app/installations?page=5>; rel="last"
 *
 * @module pagination
 */

/**
 * Pagination links extracted from Link header
 */
export interface PaginationLinks {
  next?: string;
  prev?: string;
  first?: string;
  last?: string;
}

/**
 * Parse a Link header into its known relations. Unknown relations and
 * malformed entries are ignored.
 */
export function parseLinkHeader(linkHeader: string | null | undefined): PaginationLinks {
  const links: PaginationLinks = {};

  if (!linkHeader || linkHeader.trim() === '') {
    return links;
  }

  for (const part of linkHeader.split(',')) {
    const match = part.trim().match(/^<([^>]+)>;\s*rel="([^"]+)"/);
    if (!match) {
      continue;
    }

    const [, url, rel] = match;
    switch (rel) {
      case 'next':
      case 'prev':
      case 'first':
      case 'last':
        links[rel] = url;
        break;
    }
  }

  return links;
}

/**
 * Returns the `rel="next"` URL of a response, if any.
 */
export function nextPageUrl(headers: { get(name: string): string | null }): string | undefined {
  return parseLinkHeader(headers.get('link')).next;
}
