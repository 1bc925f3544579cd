export { DEFAULT_OUTPUT_FILE, loadConfig, normalizeDomain, type AppConfig } from './config/load-config.js';
export { createConsoleLogger, isDebugEnabled, silentLogger } from './core/logger.js';
export { runReport, type ReportSummary } from './core/run-report.js';
export { defaultDelay, type Delay, type Logger, type RunContext } from './core/types.js';
export { collectBobUserIds, extractUserId } from './okta/app-users.js';
export { resolveBobAppId, selectBobApp } from './okta/apps.js';
export {
  createOktaClient,
  rateLimitDelayMs,
  type OktaClient,
  type OktaJsonResponse,
  type OktaResponse,
} from './okta/client.js';
export { ConfigurationError, OktaApiError, ResolutionError } from './okta/errors.js';
export { collectPages, paginate, parseNextLink, type PageReducer } from './okta/pagination.js';
export type { OktaApp, OktaUser } from './okta/types.js';
export { collectOktaUsers } from './okta/users.js';
export { buildWorkbook, writeReport } from './report/export.js';
export {
  IMPORTED_FROM_BOB,
  MANUAL_OKTA,
  providerStatus,
  reconcileUser,
  reconcileUsers,
  type Origin,
  type ReconciledRow,
} from './report/reconcile.js';
