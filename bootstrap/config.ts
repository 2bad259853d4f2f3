export type ServiceEnv = 'dev' | 'staging' | 'prod';
export type BlobStoreType = 'memory' | 's3';
export type MetadataStoreType = 'memory' | 'supabase';

export interface S3Config {
  bucket: string;
  region: string;
  endpoint?: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  forcePathStyle: boolean;
}

export interface SupabaseConfig {
  url: string;
  serviceKey: string;
  table: string;
}

export interface Config {
  serviceEnv: ServiceEnv;
  port: number;
  jwtSecret?: string;
  blobStore: { type: 'memory'; bucket: string } | ({ type: 's3' } & S3Config);
  metadataStore: { type: 'memory' } | ({ type: 'supabase' } & SupabaseConfig);
  urlTtl: {
    defaultSeconds: number;
    maxSeconds: number;
  };
  store: {
    timeoutMs: number;
    maxAttempts: number;
  };
}

const SERVICE_ENVS: ReadonlyArray<ServiceEnv> = ['dev', 'staging', 'prod'];
const BLOB_STORE_TYPES: ReadonlyArray<BlobStoreType> = ['memory', 's3'];
const METADATA_STORE_TYPES: ReadonlyArray<MetadataStoreType> = ['memory', 'supabase'];

function oneOf<T extends string>(name: string, value: string, allowed: ReadonlyArray<T>): T {
  const match = allowed.find(candidate => candidate === value);
  if (match === undefined) {
    throw new Error(`Invalid ${name}: "${value}". Supported: ${allowed.join(', ')}`);
  }
  return match;
}

export class ConfigProvider {
  private config: Config | null = null;

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  load(): Config {
    if (this.config) {
      return this.config;
    }

    const serviceEnv = oneOf('SERVICE_ENV', this.getEnv('SERVICE_ENV', 'dev'), SERVICE_ENVS);
    const blobStoreType = oneOf('BLOB_STORE_TYPE', this.getEnv('BLOB_STORE_TYPE', 'memory'), BLOB_STORE_TYPES);
    const metadataStoreType = oneOf(
      'METADATA_STORE_TYPE',
      this.getEnv('METADATA_STORE_TYPE', 'memory'),
      METADATA_STORE_TYPES,
    );

    const defaultSeconds = this.getInt('UPLOAD_URL_TTL_SECONDS', 900);
    const maxSeconds = this.getInt('MAX_URL_TTL_SECONDS', 3600);
    if (defaultSeconds > maxSeconds) {
      throw new Error(
        `UPLOAD_URL_TTL_SECONDS (${defaultSeconds}) must not exceed MAX_URL_TTL_SECONDS (${maxSeconds})`,
      );
    }

    this.config = {
      serviceEnv,
      port: this.getInt('PORT', 3000),
      jwtSecret: this.env.AUTH_JWT_SECRET || undefined,
      blobStore: this.buildBlobStore(blobStoreType),
      metadataStore: this.buildMetadataStore(metadataStoreType),
      urlTtl: { defaultSeconds, maxSeconds },
      store: {
        timeoutMs: this.getInt('STORE_TIMEOUT_MS', 5000),
        maxAttempts: this.getInt('STORE_MAX_ATTEMPTS', 3),
      },
    };

    return this.config;
  }

  private getEnv(key: string, defaultValue?: string): string {
    const value = this.env[key];
    if (!value && !defaultValue) {
      throw new Error(`Missing required environment variable: ${key}`);
    }
    return value || defaultValue || '';
  }

  private getInt(key: string, defaultValue: number): number {
    const raw = this.env[key];
    if (!raw) {
      return defaultValue;
    }
    const value = Number(raw);
    if (!Number.isInteger(value) || value <= 0) {
      throw new Error(`Invalid ${key}: "${raw}". Expected a positive integer`);
    }
    return value;
  }

  private buildBlobStore(type: BlobStoreType): Config['blobStore'] {
    if (type === 's3') {
      return {
        type,
        bucket: this.getEnv('S3_BUCKET'),
        region: this.getEnv('S3_REGION', 'us-east-1'),
        endpoint: this.env.S3_ENDPOINT || undefined,
        accessKeyId: this.env.S3_ACCESS_KEY || undefined,
        secretAccessKey: this.env.S3_SECRET_KEY || undefined,
        forcePathStyle: this.env.S3_FORCE_PATH_STYLE === 'true',
      };
    }

    return { type, bucket: this.getEnv('S3_BUCKET', 'image-records') };
  }

  private buildMetadataStore(type: MetadataStoreType): Config['metadataStore'] {
    if (type === 'supabase') {
      return {
        type,
        url: this.getEnv('SUPABASE_URL'),
        serviceKey: this.getEnv('SUPABASE_SERVICE_KEY'),
        table: this.getEnv('SUPABASE_TABLE', 'image_records'),
      };
    }

    return { type };
  }
}

export const configProvider = new ConfigProvider();
