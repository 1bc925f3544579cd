import type { OktaClient } from './client.js';

export type PageReducer<A> = (acc: A, body: unknown) => A;

/**
 * Pull the `rel="next"` URL out of an RFC 5988 Link header, e.g.
 * `<https://x.okta.com/api/v1/users?after=00u2>; rel="next"`.
 */
export const parseNextLink = (header: string | null | undefined): string | null => {
  if (!header) return null;
  const part = header.split(',').find((segment) => segment.includes('rel="next"'));
  if (part === undefined) return null;
  const start = part.indexOf('<');
  const end = part.indexOf('>');
  if (start < 0 || end <= start) return null;
  return part.slice(start + 1, end);
};

/**
 * Walk every page starting at `url`, folding each parsed body into the accumulator.
 * Stops at the first response without a next link.
 */
export const paginate = async <A>(
  client: OktaClient,
  url: string,
  initial: A,
  onPage: PageReducer<A>,
): Promise<A> => {
  const iterate = async (next: string | null, acc: A): Promise<A> => {
    if (next === null) return acc;
    const response = await client.getJson(next);
    const folded = onPage(acc, response.data);
    return iterate(parseNextLink(response.headers.get('link')), folded);
  };

  return iterate(url, initial);
};

// Appends in place; the accumulator is created fresh for each collectPages call.
const appendBody = (acc: unknown[], body: unknown): unknown[] => {
  if (Array.isArray(body)) {
    body.forEach((item) => acc.push(item));
  } else {
    acc.push(body);
  }
  return acc;
};

export const collectPages = (client: OktaClient, url: string): Promise<readonly unknown[]> =>
  paginate<unknown[]>(client, url, [], appendBody);
