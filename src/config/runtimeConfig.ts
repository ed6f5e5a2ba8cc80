/**
 * Unified runtime configuration loader.
 *
 * Every environment-driven behavior of the catalog is parsed here once into a typed
 * surface. Call sites read `getRuntimeConfig()`; tests that mutate `process.env`
 * call `reloadRuntimeConfig()` afterwards.
 */
import os from 'os';
import path from 'path';
import { getBooleanEnv, numberFromEnv, optionalStringFromEnv, stringFromEnv } from '../utils/envUtils';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';
export type StoreDriver = 'file' | 's3';

interface CatalogConfig {
  path: string;
  basePrefix: string;
  arrayThreshold: number;
  tmpDir: string;
}

interface S3StoreConfig {
  bucket?: string;
  region: string;
  endpoint?: string;
  forcePathStyle: boolean;
}

interface StoreConfig {
  driver: StoreDriver;
  rootDir: string;
  s3: S3StoreConfig;
}

interface LoggingConfig {
  level: LogLevel;
  json: boolean;
  file?: string;
}

interface AtomicFsConfig {
  retries: number;
  backoffMs: number;
}

export interface RuntimeConfig {
  catalog: CatalogConfig;
  store: StoreConfig;
  logging: LoggingConfig;
  atomicFs: AtomicFsConfig;
}

const CWD = process.cwd();

function toAbsolute(raw: string): string {
  return path.isAbsolute(raw) ? raw : path.resolve(CWD, raw);
}

function parseLogLevel(): LogLevel {
  const raw = process.env.CATALOG_LOG_LEVEL?.toLowerCase().trim();
  switch(raw){
    case 'error':
    case 'warn':
    case 'info':
    case 'debug':
      return raw;
    default:
      return 'info';
  }
}

function parseStoreDriver(): StoreDriver {
  const raw = stringFromEnv('CATALOG_STORE_DRIVER', 'file').toLowerCase();
  if(raw === 'file' || raw === 's3') return raw;
  throw new Error(`Unsupported object store driver: ${raw}`);
}

function parseCatalogConfig(): CatalogConfig {
  const threshold = numberFromEnv('CATALOG_ARRAY_THRESHOLD', 10);
  return {
    path: toAbsolute(stringFromEnv('CATALOG_PATH', path.join('data', 'catalog.json'))),
    basePrefix: stringFromEnv('CATALOG_BASE_PREFIX', ''),
    arrayThreshold: Number.isInteger(threshold) && threshold >= 0 ? threshold : 10,
    tmpDir: toAbsolute(stringFromEnv('CATALOG_TMP_DIR', os.tmpdir())),
  };
}

function parseStoreConfig(): StoreConfig {
  return {
    driver: parseStoreDriver(),
    rootDir: toAbsolute(stringFromEnv('CATALOG_STORE_ROOT', 'store')),
    s3: {
      bucket: optionalStringFromEnv('CATALOG_S3_BUCKET'),
      region: stringFromEnv('CATALOG_S3_REGION', 'us-east-1'),
      endpoint: optionalStringFromEnv('CATALOG_S3_ENDPOINT'),
      forcePathStyle: getBooleanEnv('CATALOG_S3_FORCE_PATH_STYLE'),
    },
  };
}

function parseLoggingConfig(): LoggingConfig {
  const file = optionalStringFromEnv('CATALOG_LOG_FILE');
  return {
    level: parseLogLevel(),
    json: getBooleanEnv('CATALOG_LOG_JSON'),
    file: file ? toAbsolute(file) : undefined,
  };
}

function parseAtomicFsConfig(): AtomicFsConfig {
  return {
    retries: numberFromEnv('CATALOG_ATOMIC_WRITE_RETRIES', 5),
    backoffMs: numberFromEnv('CATALOG_ATOMIC_WRITE_BACKOFF_MS', 10),
  };
}

export function loadRuntimeConfig(): RuntimeConfig {
  return {
    catalog: parseCatalogConfig(),
    store: parseStoreConfig(),
    logging: parseLoggingConfig(),
    atomicFs: parseAtomicFsConfig(),
  };
}

let _cached: RuntimeConfig | undefined;
export function getRuntimeConfig(): RuntimeConfig {
  if(!_cached) _cached = loadRuntimeConfig();
  return _cached;
}

export function reloadRuntimeConfig(): RuntimeConfig {
  _cached = loadRuntimeConfig();
  return _cached;
}

if(require.main === module){
  // eslint-disable-next-line no-console
  console.log(JSON.stringify(getRuntimeConfig(), null, 2));
}
