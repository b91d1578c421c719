import { z } from 'zod';
import { ConfigError, isRegion } from '@workdrive-upload/sdk';
import type { Credentials, Region } from '@workdrive-upload/sdk';

const REQUIRED_VARS = ['ZOHO_CLIENT_ID', 'ZOHO_CLIENT_SECRET', 'ZOHO_REFRESH_TOKEN', 'ZOHO_FOLDER_ID'] as const;

// Empty strings count as unset, the way CI runners pass blank inputs
const optional = z
  .string()
  .optional()
  .transform(value => (value && value.trim() !== '' ? value.trim() : undefined));

const envSchema = z.object({
  ZOHO_CLIENT_ID: optional,
  ZOHO_CLIENT_SECRET: optional,
  ZOHO_REFRESH_TOKEN: optional,
  ZOHO_FOLDER_ID: optional,
  ZOHO_REGION: optional,
  ZOHO_API_BASE: optional,
  ZOHO_ACCOUNTS_BASE: optional,
  GITHUB_WORKSPACE: optional,
  GITHUB_OUTPUT: optional,
});

export interface EnvironmentConfig {
  credentials: Credentials;
  region?: Region;
  apiBaseURL?: string;
  accountsBaseURL?: string;
  workspace?: string;
  githubOutput?: string;
}

export function loadEnvironment(env: NodeJS.ProcessEnv): EnvironmentConfig {
  const vars = envSchema.parse(env);

  const missing = REQUIRED_VARS.filter(name => !vars[name]);
  const { ZOHO_CLIENT_ID, ZOHO_CLIENT_SECRET, ZOHO_REFRESH_TOKEN, ZOHO_FOLDER_ID } = vars;
  if (!ZOHO_CLIENT_ID || !ZOHO_CLIENT_SECRET || !ZOHO_REFRESH_TOKEN || !ZOHO_FOLDER_ID) {
    throw new ConfigError(`Missing env vars: ${missing.join(', ')}`);
  }

  let region: Region | undefined;
  if (vars.ZOHO_REGION) {
    const code = vars.ZOHO_REGION.toLowerCase();
    if (!isRegion(code)) {
      throw new ConfigError(`Unknown ZOHO_REGION: ${vars.ZOHO_REGION}`);
    }
    region = code;
  }

  return {
    credentials: {
      clientId: ZOHO_CLIENT_ID,
      clientSecret: ZOHO_CLIENT_SECRET,
      refreshToken: ZOHO_REFRESH_TOKEN,
      folderId: ZOHO_FOLDER_ID,
    },
    region,
    apiBaseURL: vars.ZOHO_API_BASE,
    accountsBaseURL: vars.ZOHO_ACCOUNTS_BASE,
    workspace: vars.GITHUB_WORKSPACE,
    githubOutput: vars.GITHUB_OUTPUT,
  };
}
