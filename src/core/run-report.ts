import type { AppConfig } from '../config/load-config.js';
import { collectBobUserIds } from '../okta/app-users.js';
import { resolveBobAppId } from '../okta/apps.js';
import { createOktaClient } from '../okta/client.js';
import { collectOktaUsers } from '../okta/users.js';
import { writeReport } from '../report/export.js';
import { IMPORTED_FROM_BOB, reconcileUsers } from '../report/reconcile.js';

import type { RunContext } from './types.js';

export type ReportSummary = Readonly<{
  outputPath: string;
  rowCount: number;
  bobAppId: string;
  importedCount: number;
  manualCount: number;
}>;

/**
 * Resolve the Bob app, pull users and Bob app members, classify, then write the report.
 * Nothing is written unless every fetch succeeded.
 */
export const runReport = async (config: AppConfig, ctx: RunContext): Promise<ReportSummary> => {
  const client = createOktaClient(config, ctx);

  const bobAppId = await resolveBobAppId(client, config);
  ctx.logger.info(`bob app id: ${bobAppId}`);

  const users = await collectOktaUsers(client);
  ctx.logger.info(`fetched ${users.length} users`);

  const bobUserIds = await collectBobUserIds(client, bobAppId);
  ctx.logger.info(`fetched ${bobUserIds.size} bob app members`);

  const rows = reconcileUsers(users, bobUserIds);
  const outputPath = await writeReport(rows, config.outputPath);
  const importedCount = rows.filter((row) => row.origin === IMPORTED_FROM_BOB).length;

  return {
    outputPath,
    rowCount: rows.length,
    bobAppId,
    importedCount,
    manualCount: rows.length - importedCount,
  };
};
