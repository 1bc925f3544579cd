import test from 'ava';

import { collectPages, paginate, parseNextLink } from '../okta/pagination.js';

import { createTestClient, DOMAIN, nextLink, selfLink, type StubResponse } from './helpers/okta-stub.js';

const page1 = `${DOMAIN}/api/v1/users?limit=200`;
const page2 = `${DOMAIN}/api/v1/users?after=00u2&limit=200`;
const page3 = `${DOMAIN}/api/v1/users?after=00u4&limit=200`;

test('parseNextLink picks the rel="next" segment', (t) => {
  t.is(parseNextLink(`<${page1}>; rel="self", <${page2}>; rel="next"`), page2);
  t.is(parseNextLink(`<${page2}>; rel="next"`), page2);
});

test('parseNextLink returns null without a next relation', (t) => {
  t.is(parseNextLink(`<${page1}>; rel="self"`), null);
  t.is(parseNextLink(''), null);
  t.is(parseNextLink(null), null);
  t.is(parseNextLink(undefined), null);
  t.is(parseNextLink('rel="next"'), null);
});

test('collectPages accumulates every page in order and stops without a next link', async (t) => {
  const { client, calls } = createTestClient({
    [page1]: [{ body: [{ id: '00u1' }, { id: '00u2' }], headers: nextLink(page1, page2) }],
    [page2]: [{ body: [{ id: '00u3' }, { id: '00u4' }], headers: nextLink(page2, page3) }],
    [page3]: [{ body: [{ id: '00u5' }], headers: selfLink(page3) }],
  });

  const items = await collectPages(client, page1);

  t.deepEqual(items, [
    { id: '00u1' },
    { id: '00u2' },
    { id: '00u3' },
    { id: '00u4' },
    { id: '00u5' },
  ]);
  t.deepEqual(
    calls.map((call) => call.url),
    [page1, page2, page3],
  );
});

test('collectPages appends a single object body as one item', async (t) => {
  const { client } = createTestClient({
    [page1]: [{ body: { id: '0oa1', label: 'HiBob' } }],
  });

  const items = await collectPages(client, page1);

  t.deepEqual(items, [{ id: '0oa1', label: 'HiBob' }]);
});

test('collectPages keeps empty pages empty', async (t) => {
  const { client, calls } = createTestClient({
    [page1]: [{ body: [], headers: nextLink(page1, page2) }],
    [page2]: [{ body: [] }],
  });

  t.deepEqual(await collectPages(client, page1), []);
  t.is(calls.length, 2);
});

test('paginate folds each page body through the reducer', async (t) => {
  const { client } = createTestClient({
    [page1]: [{ body: [1, 2], headers: nextLink(page1, page2) }],
    [page2]: [{ body: [3] }],
  });

  const pageSizes = await paginate<readonly number[]>(client, page1, [], (acc, body) => [
    ...acc,
    Array.isArray(body) ? body.length : 0,
  ]);

  t.deepEqual(pageSizes, [2, 1]);
});

test('collectPages gathers a long run of pages in order', async (t) => {
  const pageUrl = (n: number): string => `${DOMAIN}/api/v1/users?after=p${n}&limit=200`;
  const pageCount = 60;
  const routes = Object.fromEntries(
    Array.from({ length: pageCount }, (_, n): [string, readonly StubResponse[]] => [
      pageUrl(n),
      [
        {
          body: [{ id: `00u${n}a` }, { id: `00u${n}b` }],
          headers: n + 1 < pageCount ? nextLink(pageUrl(n), pageUrl(n + 1)) : selfLink(pageUrl(n)),
        },
      ],
    ]),
  );
  const { client, calls } = createTestClient(routes);

  const items = await collectPages(client, pageUrl(0));

  t.is(items.length, pageCount * 2);
  t.deepEqual(items[0], { id: '00u0a' });
  t.deepEqual(items[117], { id: '00u58b' });
  t.deepEqual(items[119], { id: '00u59b' });
  t.is(calls.length, pageCount);
});

test('collectPages starts from an empty result on every call', async (t) => {
  const { client } = createTestClient({
    [page1]: [{ body: [{ id: '00u1' }] }, { body: [{ id: '00u2' }] }],
  });

  t.deepEqual(await collectPages(client, page1), [{ id: '00u1' }]);
  t.deepEqual(await collectPages(client, page1), [{ id: '00u2' }]);
});
