import { z } from 'zod';

import type { OktaClient } from './client.js';
import { collectPages } from './pagination.js';
import { OktaUserSchema, type OktaUser } from './types.js';

export const PAGE_SIZE = 200;

export const usersUrl = (domain: string): string => `${domain}/api/v1/users?limit=${PAGE_SIZE}`;

export const collectOktaUsers = async (client: OktaClient): Promise<readonly OktaUser[]> => {
  const items = await collectPages(client, usersUrl(client.domain));
  return z.array(OktaUserSchema).parse(items);
};
