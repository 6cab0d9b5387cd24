/**
 * Node configuration.
 */

function env(key: string, fallback?: string): string {
  const val = process.env[key] ?? fallback;
  if (val === undefined) throw new Error(`Missing env: ${key}`);
  return val;
}

export const config = {
  port: parseInt(env("NODE_PORT", "3200"), 10),
  host: env("NODE_HOST", "0.0.0.0"),
  /** Path to the deploy file (constructor bundle + genesis). */
  deployConfig: env("DEPLOY_CONFIG", "config/deploy.dev.json"),
  /** Block interval (ms). 0 = blocks advance only on demand. Default: 2000. */
  blockIntervalMs: parseInt(env("BLOCK_INTERVAL_MS", "2000"), 10),
  logLevel: env("LOG_LEVEL", "info"),
} as const;
