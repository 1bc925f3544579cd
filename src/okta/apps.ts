import { z } from 'zod';

import type { AppConfig } from '../config/load-config.js';

import type { OktaClient } from './client.js';
import { ConfigurationError, ResolutionError } from './errors.js';
import { collectPages } from './pagination.js';
import { OktaAppSchema, type OktaApp } from './types.js';
import { PAGE_SIZE } from './users.js';

const BOB_MARKER = 'bob';

export const appSearchUrl = (domain: string, label: string): string =>
  `${domain}/api/v1/apps?q=${encodeURIComponent(label)}&limit=${PAGE_SIZE}`;

/**
 * Pick the Bob app from a search result. An exact label match (ignoring case) wins;
 * otherwise the first label containing "bob".
 */
export const selectBobApp = (apps: readonly OktaApp[], label: string): OktaApp | undefined => {
  const wanted = label.toLowerCase();
  const labelOf = (app: OktaApp): string => (app.label ?? '').toLowerCase();
  return (
    apps.find((app) => labelOf(app) === wanted) ??
    apps.find((app) => labelOf(app).includes(BOB_MARKER))
  );
};

export const resolveBobAppId = async (
  client: OktaClient,
  config: Pick<AppConfig, 'bobAppId' | 'bobAppLabel'>,
): Promise<string> => {
  if (config.bobAppId) return config.bobAppId;

  const label = config.bobAppLabel;
  if (!label) {
    throw new ConfigurationError(
      "Set BOB_APP_ID or BOB_APP_LABEL in your .env to identify the 'bob' app",
    );
  }

  const items = await collectPages(client, appSearchUrl(client.domain, label));
  const apps = z.array(OktaAppSchema).parse(items);
  const match = selectBobApp(apps, label);

  if (!match) {
    throw new ResolutionError(
      `Could not find a bob app by label '${label}'. Set BOB_APP_ID to the exact application ID.`,
      label,
    );
  }

  return match.id;
};
