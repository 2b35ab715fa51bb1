import type { VcdTransport } from './client.js';
import { findChildren, localName, type XmlElement } from './xml.js';

export const QUERY_PAGE_SIZE = 128;

// `;` joins conditions with AND, `,` with OR, parentheses group, `*` matches anything.
const FILTER_RESERVED = /[;,()*]/g;

/** Percent-encodes the characters the filter grammar reserves, so a value only ever matches itself. */
export function escapeFilterValue(value: string): string {
  return value.replace(FILTER_RESERVED, (ch) => `%${ch.charCodeAt(0).toString(16).toUpperCase()}`);
}

/**
 * Runs a typed query in records format and returns every record across
 * all pages, in the order the server reports them.
 */
export async function queryRecords(
  transport: VcdTransport,
  type: string,
  filter?: string
): Promise<XmlElement[]> {
  const records: XmlElement[] = [];
  for (let page = 1; ; page++) {
    const params: Record<string, string> = {
      type,
      format: 'records',
      page: String(page),
      pageSize: String(QUERY_PAGE_SIZE),
    };
    if (filter) {
      params.filter = filter;
    }
    const result = await transport.get('/api/query', params);
    records.push(...result.children.filter((child) => localName(child.name).endsWith('Record')));

    const hasNextPage = findChildren(result, 'Link').some((link) => link.attributes.rel === 'nextPage');
    if (!hasNextPage) {
      return records;
    }
  }
}
