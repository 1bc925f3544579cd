import type { OktaUser } from '../okta/types.js';

export const IMPORTED_FROM_BOB = 'Imported (bob)';
export const MANUAL_OKTA = 'Manual (OKTA)';

export type Origin = typeof IMPORTED_FROM_BOB | typeof MANUAL_OKTA;

export type ReconciledRow = Readonly<{
  userId: string;
  firstName: string;
  lastName: string;
  email: string;
  origin: Origin;
  configurationStatus: string;
}>;

const UNKNOWN = 'UNKNOWN';
const PROVISIONED_TYPES: ReadonlySet<string> = new Set(['FEDERATION', 'IMPORT']);

// What Okta itself says about where the account came from.
export const providerStatus = (user: OktaUser): string => {
  const provider = user.credentials?.provider;
  const type = provider?.type ?? UNKNOWN;
  const name = provider?.name ?? UNKNOWN;

  if (type === 'OKTA') return MANUAL_OKTA;
  if (PROVISIONED_TYPES.has(type)) return `Provisioned (${name})`;
  return name;
};

/**
 * Membership in the Bob app decides the origin; when it does, it also overrides the
 * provider-reported configuration status.
 */
export const reconcileUser = (user: OktaUser, bobUserIds: ReadonlySet<string>): ReconciledRow => {
  const imported = bobUserIds.has(user.id);
  return Object.freeze({
    userId: user.id,
    firstName: user.profile?.firstName ?? '',
    lastName: user.profile?.lastName ?? '',
    email: user.profile?.email ?? '',
    origin: imported ? IMPORTED_FROM_BOB : MANUAL_OKTA,
    configurationStatus: imported ? IMPORTED_FROM_BOB : providerStatus(user),
  });
};

export const reconcileUsers = (
  users: readonly OktaUser[],
  bobUserIds: ReadonlySet<string>,
): readonly ReconciledRow[] => users.map((user) => reconcileUser(user, bobUserIds));
