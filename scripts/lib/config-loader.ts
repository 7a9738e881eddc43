import * as path from 'path';
import * as sql from 'mssql';
import { ConfigError } from './error-handler';
import { readConfigDocument } from './mapping-store';
import { DEFAULT_GLOBAL, GlobalSettings, parseGlobalSettings } from './sections';

export type { GlobalSettings } from './sections';

export interface EavsConfig {
  configPath: string;
  document: Record<string, unknown>;
  global: GlobalSettings;
  warehouse: {
    connectionString: string;
  };
  storage: {
    containerUrl: string;
    endpoint: string;
    sasToken: string;
  };
  paths: {
    generatedDir: string;
    manualReviewDir: string;
    backupDir: string;
  };
  retry: {
    maxRetries: number;
    baseDelay: number;
  };
}

export interface ConfigOverrides {
  configPath?: string;
  global?: Partial<GlobalSettings>;
  paths?: Partial<EavsConfig['paths']>;
  retry?: Partial<EavsConfig['retry']>;
}

export interface BlobSettings {
  /** Container URL including the SAS query string. */
  containerUrl: string;
  /** Container URL without the SAS token, as used by an external data source. */
  containerLocation: string;
  sasToken: string;
  containerName: string;
}

export const DEFAULT_CONFIG_PATH = path.join('config', 'field-mappings.json');

/**
 * Parse a SQL Server connection string into mssql config
 * Format: Server=...;Database=...;User Id=...;Password=...;TrustServerCertificate=...;Encrypt=...;
 */
function parseConnectionString(connStr: string): Partial<sql.config> {
  const parts: Record<string, string> = {};
  connStr.split(';').forEach(part => {
    const [key, ...valueParts] = part.split('=');
    if (key && valueParts.length > 0) {
      parts[key.trim().toLowerCase()] = valueParts.join('=').trim();
    }
  });

  return {
    server: parts['server'] || parts['data source'],
    database: parts['database'] || parts['initial catalog'],
    user: parts['user id'] || parts['uid'] || parts['user'],
    password: parts['password'] || parts['pwd'],
    options: {
      encrypt: parts['encrypt']?.toLowerCase() !== 'false',
      trustServerCertificate: parts['trustservercertificate']?.toLowerCase() === 'true',
    },
  };
}

/**
 * Load configuration from the config document and environment variables
 *
 * Priority:
 * 1. Overrides (command-line flags)
 * 2. Environment variables
 * 3. The config document's "global" section
 * 4. Default values
 */
export function loadConfig(overrides: ConfigOverrides = {}): EavsConfig {
  const configPath = path.resolve(overrides.configPath || process.env.EAVS_CONFIG || DEFAULT_CONFIG_PATH);
  const document = readConfigDocument(configPath);
  const fileGlobal = parseGlobalSettings(document);

  let connectionString = process.env.SQLSERVER || '';
  if (!connectionString && (process.env.SQLSERVER_HOST || process.env.SQLSERVER_DATABASE)) {
    const server = process.env.SQLSERVER_HOST;
    const database = process.env.SQLSERVER_DATABASE;
    const user = process.env.SQLSERVER_USER;
    const password = process.env.SQLSERVER_PASSWORD;

    if (server && database && user && password) {
      connectionString = `Server=${server};Database=${database};User Id=${user};Password=${password};TrustServerCertificate=True;Encrypt=True;`;
    }
  }

  const config: EavsConfig = {
    configPath,
    document,
    global: {
      projectId: overrides.global?.projectId || process.env.EAVS_PROJECT_ID || fileGlobal.projectId || DEFAULT_GLOBAL.projectId,
      analyticsDataset:
        overrides.global?.analyticsDataset ||
        process.env.EAVS_ANALYTICS_DATASET ||
        fileGlobal.analyticsDataset ||
        DEFAULT_GLOBAL.analyticsDataset,
      bucket: overrides.global?.bucket || process.env.EAVS_BUCKET || fileGlobal.bucket || DEFAULT_GLOBAL.bucket,
    },
    warehouse: {
      connectionString,
    },
    storage: {
      containerUrl: process.env.BLOB_CONTAINER_URL || '',
      endpoint: process.env.BLOB_ENDPOINT || '',
      sasToken: process.env.BLOB_SAS_TOKEN || '',
    },
    paths: {
      generatedDir: overrides.paths?.generatedDir || path.join('sql', 'generated'),
      manualReviewDir: overrides.paths?.manualReviewDir || path.join('sql', 'generated'),
      backupDir: overrides.paths?.backupDir || path.join('data', 'backups', 'staging_tables'),
    },
    retry: {
      maxRetries: overrides.retry?.maxRetries ?? (parseInt(process.env.EAVS_MAX_RETRIES || '', 10) || 3),
      baseDelay: overrides.retry?.baseDelay ?? 1000,
    },
  };

  return config;
}

/**
 * Convert config to mssql config. The database defaults to the project id.
 */
export function getSqlConfig(config: EavsConfig): sql.config {
  if (!config.warehouse.connectionString) {
    throw new ConfigError('SQL Server connection not configured: set $SQLSERVER or SQLSERVER_HOST/DATABASE/USER/PASSWORD');
  }

  const parsed = parseConnectionString(config.warehouse.connectionString);
  const database = parsed.database || config.global.projectId;

  if (!parsed.server || !parsed.user || !parsed.password) {
    throw new ConfigError(
      'Invalid connection string. Expected format: Server=...;Database=...;User Id=...;Password=...;TrustServerCertificate=True;Encrypt=True;'
    );
  }

  return {
    server: parsed.server,
    database,
    user: parsed.user,
    password: parsed.password,
    options: {
      encrypt: parsed.options?.encrypt ?? true,
      trustServerCertificate: parsed.options?.trustServerCertificate ?? true,
    },
    requestTimeout: 300000,
    connectionTimeout: 30000,
    pool: {
      max: 4,
      min: 0,
      idleTimeoutMillis: 30000,
    },
  };
}

/**
 * Resolve the blob container from BLOB_CONTAINER_URL, or BLOB_ENDPOINT + bucket + BLOB_SAS_TOKEN.
 */
export function getBlobSettings(config: EavsConfig): BlobSettings {
  const { containerUrl, endpoint, sasToken } = config.storage;

  if (containerUrl) {
    const parsed = new URL(containerUrl);
    const pathParts = parsed.pathname.split('/').filter(Boolean);
    const containerName = pathParts[pathParts.length - 1] || '';
    if (!containerName) {
      throw new ConfigError('BLOB_CONTAINER_URL must include the container path');
    }
    return {
      containerUrl,
      containerLocation: `${parsed.origin}${parsed.pathname}`.replace(/\/$/, ''),
      sasToken: parsed.search.startsWith('?') ? parsed.search.slice(1) : parsed.search,
      containerName,
    };
  }

  if (endpoint && sasToken) {
    const containerLocation = `${endpoint.replace(/\/$/, '')}/${config.global.bucket}`;
    const token = sasToken.replace(/^\?/, '');
    return {
      containerUrl: `${containerLocation}?${token}`,
      containerLocation,
      sasToken: token,
      containerName: config.global.bucket,
    };
  }

  throw new ConfigError('Blob storage not configured: set BLOB_CONTAINER_URL or BLOB_ENDPOINT and BLOB_SAS_TOKEN');
}

/**
 * Validate configuration
 */
export function validateConfig(
  config: EavsConfig,
  needs: { warehouse?: boolean; storage?: boolean } = {}
): { valid: boolean; errors: string[] } {
  const errors: string[] = [];
  const identifier = /^[A-Za-z_][A-Za-z0-9_-]*$/;

  if (!identifier.test(config.global.projectId)) {
    errors.push(`Invalid project id: "${config.global.projectId}"`);
  }
  if (!identifier.test(config.global.analyticsDataset)) {
    errors.push(`Invalid analytics dataset: "${config.global.analyticsDataset}"`);
  }
  if (!config.global.bucket) {
    errors.push('Bucket name is required');
  }

  if (needs.warehouse) {
    try {
      getSqlConfig(config);
    } catch (error) {
      errors.push(error instanceof Error ? error.message : String(error));
    }
  }

  if (needs.storage) {
    try {
      getBlobSettings(config);
    } catch (error) {
      errors.push(error instanceof Error ? error.message : String(error));
    }
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Print configuration (masks sensitive data)
 */
export function printConfig(config: EavsConfig): void {
  const masked = {
    configPath: config.configPath,
    global: config.global,
    warehouse: {
      connectionString: config.warehouse.connectionString.replace(/(Password|Pwd)=[^;]+/i, '$1=***'),
    },
    storage: {
      containerUrl: config.storage.containerUrl.replace(/\?.*$/, '?***'),
      endpoint: config.storage.endpoint,
      sasToken: config.storage.sasToken ? '***' : '',
    },
    paths: config.paths,
    retry: config.retry,
  };

  console.log('\n📋 EAVS Configuration:');
  console.log('════════════════════════════════════════════════════════════════');
  console.log(JSON.stringify(masked, null, 2));
  console.log('════════════════════════════════════════════════════════════════\n');
}
