import type { OktaClient } from './client.js';
import { paginate } from './pagination.js';
import { isJsonObject, type JsonObject } from './types.js';
import { PAGE_SIZE } from './users.js';

const USER_PATH_MARKER = '/users/';
const OKTA_USER_ID_PREFIX = '00u';

export const appUsersUrl = (domain: string, appId: string): string =>
  `${domain}/api/v1/apps/${encodeURIComponent(appId)}/users?limit=${PAGE_SIZE}`;

const field = (value: unknown, key: string): unknown => (isJsonObject(value) ? value[key] : undefined);

const nonEmptyString = (value: unknown): string | null =>
  typeof value === 'string' && value.length > 0 ? value : null;

// `_links.user` is an object on most app types and a one-element array on some.
const userLinkHref = (item: JsonObject): string | null => {
  const user = field(item._links, 'user');
  const link = Array.isArray(user) ? user[0] : user;
  return nonEmptyString(field(link, 'href'));
};

const fromUserLink = (item: JsonObject): string | null => {
  const href = userLinkHref(item);
  if (!href || !href.includes(USER_PATH_MARKER)) return null;
  return nonEmptyString(href.split(USER_PATH_MARKER).at(-1));
};

const fromEmbeddedUser = (item: JsonObject): string | null =>
  nonEmptyString(field(field(item._embedded, 'user'), 'id'));

const fromOwnId = (item: JsonObject): string | null => {
  const id = item.id;
  return typeof id === 'string' && id.startsWith(OKTA_USER_ID_PREFIX) ? id : null;
};

/**
 * Okta user id behind one app-user record. Tried in order: `_links.user.href`,
 * `_embedded.user.id`, then the record's own id if it looks like a user id (`00u...`).
 */
export const extractUserId = (item: unknown): string | null => {
  if (!isJsonObject(item)) return null;
  return fromUserLink(item) ?? fromEmbeddedUser(item) ?? fromOwnId(item);
};

const addPageIds = (acc: Set<string>, body: unknown): Set<string> => {
  const items: readonly unknown[] = Array.isArray(body) ? body : [body];
  items.forEach((item) => {
    const id = extractUserId(item);
    if (id !== null) acc.add(id);
  });
  return acc;
};

export const collectBobUserIds = (
  client: OktaClient,
  bobAppId: string,
): Promise<ReadonlySet<string>> =>
  paginate<Set<string>>(
    client,
    appUsersUrl(client.domain, bobAppId),
    new Set<string>(),
    addPageIds,
  );
