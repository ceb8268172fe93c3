import type { PollPolicy } from './utils/retry'

export const constants = {
  STATE_DIR: '.tierdeploy',
  STATE_FILE: 'state.json',
  CONFIG_FILE: 'deploy.config.json',
  ENV_FILE_DIR: 'deploy/config',
  PLATFORM_BIN: 'railway',
  DEFAULT_APP_NAME: 'crud-app',
  DEFAULT_BOOTSTRAP_FILE: 'db/init.sql',
  DEFAULT_TABLE: 'items',
  DEFAULT_REQUIRED_COLUMNS: ['id', 'title', 'category', 'quantity'] as readonly string[],
  DEFAULT_API_PATHS: ['/items'] as readonly string[],
  DEFAULT_HEALTH_PATH: '/health',
  DEFAULT_SETTLE_MS: 30_000,
  HTTP_TIMEOUT_MS: 10_000,
  /** Ceiling for one `railway` invocation; `up` uploads the source tree */
  PLATFORM_TIMEOUT_MS: 600_000
} as const

export const defaultPolicies: Readonly<Record<'deploy' | 'database' | 'health' | 'smoke', PollPolicy>> = {
  deploy: { intervalMs: 10_000, maxAttempts: 30 },
  database: { intervalMs: 15_000, maxAttempts: 20 },
  health: { intervalMs: 10_000, maxAttempts: 30 },
  smoke: { intervalMs: 5_000, maxAttempts: 6 }
}
