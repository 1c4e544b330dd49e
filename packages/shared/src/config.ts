/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 * Loaded once at process start; extraction code only ever reads it.
 */

export interface CloudinaryConfig {
  cloudName: string;
  apiKey: string;
  apiSecret: string;
  folder: string;
}

export interface Config {
  // HTTP
  apiHost: string;
  apiPort: number;
  corsOrigins: string[];

  // Logging
  logLevel: string;

  // File Processing
  maxFileSize: number;
  mapPageIndex: number;
  renderDpi: number;

  // Asset host (null when credentials are missing: uploads are skipped)
  cloudinary: CloudinaryConfig | null;
}

type Env = Record<string, string | undefined>;

/**
 * Parse a comma-separated CORS origin list. "*" allows any origin.
 */
export function parseCorsOrigins(raw: string | undefined): string[] {
  if (!raw || raw.trim() === '*') return ['*'];
  return raw
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}

function loadCloudinaryConfig(env: Env): CloudinaryConfig | null {
  const cloudName = env.CLOUDINARY_CLOUD_NAME;
  const apiKey = env.CLOUDINARY_API_KEY;
  const apiSecret = env.CLOUDINARY_API_SECRET;

  if (!cloudName || !apiKey || !apiSecret) return null;

  return {
    cloudName,
    apiKey,
    apiSecret,
    folder: env.CLOUDINARY_FOLDER || 'drone-map-images',
  };
}

export function loadConfig(env: Env = process.env): Config {
  return {
    // HTTP
    apiHost: env.API_HOST || '0.0.0.0',
    apiPort: parseInt(env.PORT || '8000', 10),
    corsOrigins: parseCorsOrigins(env.CORS_ORIGINS),

    // Logging
    logLevel: (env.LOG_LEVEL || 'info').toLowerCase(),

    // File Processing
    maxFileSize: parseInt(env.MAX_FILE_SIZE || String(10 * 1024 * 1024), 10),
    mapPageIndex: parseInt(env.MAP_PAGE_INDEX || '1', 10),
    renderDpi: parseInt(env.RENDER_DPI || '150', 10),

    // Asset host
    cloudinary: loadCloudinaryConfig(env),
  };
}

export const config: Config = loadConfig();
