import { z } from 'zod';
import { loadConfig } from 'zod-config';
import { dotEnvAdapter } from 'zod-config/dotenv-adapter';
import { envAdapter } from 'zod-config/env-adapter';
import { duplicatePolicy, indexVariant, snapshotFormat } from '../schemas/taxon.js';

// Env values arrive as strings; only "true" and "1" switch a flag on
const booleanish = z.preprocess(
  (value) => (typeof value === 'string' ? value === 'true' || value === '1' : value),
  z.boolean()
);

const logLevel = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

/**
 * Centralised configuration schema for taxindex.
 *
 * All hard-coded defaults belong here; this doubles as live documentation.
 */
export const configSchema = z.object({
  // Runtime environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Log verbosity
  LOG_LEVEL: logLevel.default('info'),

  // File receiving the log lines instead of stderr
  LOG_OUTPUT: z.string().min(1).optional(),

  // CLI mode - when true, reduces logging verbosity for better user experience
  CLI_MODE: booleanish.default(false),

  // Log verbosity in CLI mode, set from the --loglevel and --quiet flags
  CLI_LOG_LEVEL: logLevel.default('warn'),

  // Id of the self-parented node that anchors the hierarchy
  TAXONOMY_ROOT_ID: z.string().min(1).default('1'),

  // Which index implementation build/load produce
  TAXONOMY_INDEX_VARIANT: indexVariant.default('adjacency'),

  // What to do when a dump declares the same id twice with different data
  TAXONOMY_DUPLICATE_POLICY: duplicatePolicy.default('reject'),

  // Snapshot encoding used by write/load when none is given
  TAXONOMY_SNAPSHOT_FORMAT: snapshotFormat.default('msgpack'),

  // Field separator of the nodes.dmp records
  TAXONOMY_DUMP_DELIMITER: z.string().min(1).default('\t|'),
});

export type AppConfig = z.infer<typeof configSchema>;

// The resolved configuration object, fully validated & typed.
// Top-level await makes sure that every importer sees a ready-to-use value.
export const cfg: AppConfig = configSchema.parse(
  await loadConfig({
    schema: configSchema,
    adapters: [
      // Order matters: later adapters win -> env overrides `.env` defaults.
      dotEnvAdapter({ path: '.env', silent: true }),
      envAdapter(),
    ],
  })
);

/**
 * Validate an ad-hoc configuration object (tests, embedding applications)
 * against the same schema and defaults as the global `cfg`.
 */
export function parseConfig(input: Record<string, unknown>): AppConfig {
  return configSchema.parse(input);
}
