import { z } from 'zod';

import { ConfigurationError } from '../okta/errors.js';

export const DEFAULT_OUTPUT_FILE = 'okta_user_source_report.xlsx';

// Blank env entries (`BOB_APP_ID=` in a .env file) count as unset.
const OptionalText = z.preprocess(
  (value) => (typeof value === 'string' && value.trim().length === 0 ? undefined : value),
  z.string().trim().optional(),
);

const EnvConfig = z.object({
  OKTA_DOMAIN: OptionalText,
  OKTA_API_TOKEN: OptionalText,
  BOB_APP_ID: OptionalText,
  BOB_APP_LABEL: OptionalText,
  REPORT_OUTPUT: OptionalText,
});

export type AppConfig = Readonly<{
  oktaDomain: string;
  apiToken: string;
  bobAppId?: string;
  bobAppLabel?: string;
  outputPath: string;
}>;

const isFlagValue = (value: string | undefined): value is string =>
  value !== undefined && value.length > 0 && !value.startsWith('-');

// Accepts `--flag value`, `-f value`, `--flag=value` and `-f=value`.
const getArgValue = (
  argv: readonly string[],
  flag: string,
  short?: string,
): string | undefined => {
  const names = short ? [flag, short] : [flag];
  for (const name of names) {
    const idx = argv.indexOf(name);
    if (idx >= 0) {
      const value = argv[idx + 1];
      if (!isFlagValue(value)) {
        throw new ConfigurationError(`Missing value for ${name}`);
      }
      return value;
    }
    const eq = argv.find((a) => a.startsWith(`${name}=`));
    if (eq) return eq.slice(name.length + 1);
  }
  return undefined;
};

const unquote = (value: string | undefined): string | undefined => {
  const stripped = value?.trim().replace(/^['"]|['"]$/g, '');
  return stripped ? stripped : undefined;
};

export const normalizeDomain = (raw: string): string => {
  const trimmed = raw.trim().replace(/\/+$/, '');
  if (trimmed.startsWith('http://') || trimmed.startsWith('https://')) return trimmed;
  return `https://${trimmed}`;
};

/**
 * Resolve the run configuration. Command-line flags win over the environment:
 * --app-id, --app-label, -o/--output.
 */
export const loadConfig = (
  env: Readonly<Record<string, string | undefined>>,
  argv: readonly string[] = process.argv,
): AppConfig => {
  const parsed = EnvConfig.parse(env);

  if (!parsed.OKTA_DOMAIN || !parsed.OKTA_API_TOKEN) {
    throw new ConfigurationError('Missing OKTA_DOMAIN or OKTA_API_TOKEN in the environment');
  }

  const bobAppId = unquote(getArgValue(argv, '--app-id')) ?? parsed.BOB_APP_ID;
  const bobAppLabel = unquote(getArgValue(argv, '--app-label')) ?? parsed.BOB_APP_LABEL;
  const outputPath =
    unquote(getArgValue(argv, '--output', '-o')) ?? parsed.REPORT_OUTPUT ?? DEFAULT_OUTPUT_FILE;

  return {
    oktaDomain: normalizeDomain(parsed.OKTA_DOMAIN),
    apiToken: parsed.OKTA_API_TOKEN,
    ...(bobAppId === undefined ? {} : { bobAppId }),
    ...(bobAppLabel === undefined ? {} : { bobAppLabel }),
    outputPath,
  };
};
