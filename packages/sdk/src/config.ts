import type winston from 'winston';

export const DEFAULT_TIMEOUT = 120000; // 120 seconds in milliseconds
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_RETRY_DELAY_SECONDS = 2;

export const REGIONS = ['us', 'eu', 'in', 'au', 'jp', 'ca', 'cn'] as const;
export type Region = (typeof REGIONS)[number];

export interface RegionEndpoints {
  accountsUrl: string;
  apiUrl: string;
}

const REGION_ENDPOINTS: Record<Region, RegionEndpoints> = {
  us: { accountsUrl: 'https://accounts.zoho.com', apiUrl: 'https://www.zohoapis.com/workdrive/api/v1' },
  eu: { accountsUrl: 'https://accounts.zoho.eu', apiUrl: 'https://www.zohoapis.eu/workdrive/api/v1' },
  in: { accountsUrl: 'https://accounts.zoho.in', apiUrl: 'https://www.zohoapis.in/workdrive/api/v1' },
  au: { accountsUrl: 'https://accounts.zoho.com.au', apiUrl: 'https://www.zohoapis.com.au/workdrive/api/v1' },
  jp: { accountsUrl: 'https://accounts.zoho.jp', apiUrl: 'https://www.zohoapis.jp/workdrive/api/v1' },
  ca: { accountsUrl: 'https://accounts.zohocloud.ca', apiUrl: 'https://www.zohoapis.ca/workdrive/api/v1' },
  cn: { accountsUrl: 'https://accounts.zoho.com.cn', apiUrl: 'https://www.zohoapis.com.cn/workdrive/api/v1' },
};

export function isRegion(value: string): value is Region {
  return REGIONS.some(region => region === value);
}

export function regionEndpoints(region: Region): RegionEndpoints {
  return REGION_ENDPOINTS[region];
}

export interface Credentials {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
  folderId: string;
}

export interface WorkDriveClientConfig {
  credentials: Credentials;
  region?: Region;
  /** Overrides the region's API base, e.g. for a proxy. */
  apiBaseURL?: string;
  /** Overrides the region's accounts host. */
  accountsBaseURL?: string;
  timeout?: number;
  logger?: { // Group logger configurations
    transports?: winston.transport[];
    level?: string;
  };
}
