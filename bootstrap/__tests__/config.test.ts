import { ConfigProvider } from '../config';

describe('ConfigProvider', () => {
  test('defaults to in-memory stores', () => {
    const config = new ConfigProvider({}).load();

    expect(config).toEqual({
      serviceEnv: 'dev',
      port: 3000,
      jwtSecret: undefined,
      blobStore: { type: 'memory', bucket: 'image-records' },
      metadataStore: { type: 'memory' },
      urlTtl: { defaultSeconds: 900, maxSeconds: 3600 },
      store: { timeoutMs: 5000, maxAttempts: 3 },
    });
  });

  test('reads S3 and Supabase settings', () => {
    const config = new ConfigProvider({
      SERVICE_ENV: 'prod',
      AUTH_JWT_SECRET: 'test-secret',
      BLOB_STORE_TYPE: 's3',
      S3_BUCKET: 'media',
      S3_ENDPOINT: 'http://localhost:9000',
      S3_FORCE_PATH_STYLE: 'true',
      METADATA_STORE_TYPE: 'supabase',
      SUPABASE_URL: 'http://localhost:54321',
      SUPABASE_SERVICE_KEY: 'test-key',
    }).load();

    expect(config.jwtSecret).toBe('test-secret');
    expect(config.blobStore).toEqual({
      type: 's3',
      bucket: 'media',
      region: 'us-east-1',
      endpoint: 'http://localhost:9000',
      accessKeyId: undefined,
      secretAccessKey: undefined,
      forcePathStyle: true,
    });
    expect(config.metadataStore).toEqual({
      type: 'supabase',
      url: 'http://localhost:54321',
      serviceKey: 'test-key',
      table: 'image_records',
    });
  });

  test('caches the loaded configuration', () => {
    const provider = new ConfigProvider({});
    expect(provider.load()).toBe(provider.load());
  });

  test('rejects unknown store types', () => {
    expect(() => new ConfigProvider({ BLOB_STORE_TYPE: 'gcs' }).load()).toThrow(
      'Invalid BLOB_STORE_TYPE: "gcs". Supported: memory, s3',
    );
  });

  test('requires the bucket for S3', () => {
    expect(() => new ConfigProvider({ BLOB_STORE_TYPE: 's3' }).load()).toThrow(
      'Missing required environment variable: S3_BUCKET',
    );
  });

  test('rejects non-numeric and inconsistent limits', () => {
    expect(() => new ConfigProvider({ STORE_TIMEOUT_MS: 'soon' }).load()).toThrow(
      'Invalid STORE_TIMEOUT_MS: "soon". Expected a positive integer',
    );
    expect(() => new ConfigProvider({ UPLOAD_URL_TTL_SECONDS: '7200' }).load()).toThrow(
      'UPLOAD_URL_TTL_SECONDS (7200) must not exceed MAX_URL_TTL_SECONDS (3600)',
    );
  });
});
