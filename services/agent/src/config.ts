/**
 * Service configuration, read once from the environment at start-up.
 * Completion provider settings live in @rxdesk/shared (loadModelConfig).
 */
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

export const DEFAULT_SYSTEM_PROMPT_PATH = fileURLToPath(new URL('../prompts/system.md', import.meta.url));

const flag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65_535).default(3000),
  DATA_DIR: z.string().min(1).default('./data'),
  MAX_TOOL_ROUNDS: z.coerce.number().int().positive().default(10),
  COMPLETION_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  TOOL_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  SEED_DATABASE: flag.default('true'),
  CORS_ORIGINS: z.string().optional(),
  AUTH_TOKEN: z.string().min(1).optional(),
  SYSTEM_PROMPT_PATH: z.string().min(1).default(DEFAULT_SYSTEM_PROMPT_PATH),
});

export interface AgentConfig {
  port: number;
  dataDir: string;
  maxToolRounds: number;
  completionTimeoutMs: number;
  toolTimeoutMs: number;
  seedDatabase: boolean;
  /** undefined = every origin allowed */
  corsOrigins?: string[];
  /** undefined = no authentication on /api */
  authToken?: string;
  systemPromptPath: string;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AgentConfig {
  // Empty strings count as unset
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ''));
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`invalid configuration: ${detail}`);
  }

  const e = parsed.data;
  const corsOrigins = e.CORS_ORIGINS?.split(',')
    .map((o) => o.trim())
    .filter(Boolean);

  return {
    port: e.PORT,
    dataDir: e.DATA_DIR,
    maxToolRounds: e.MAX_TOOL_ROUNDS,
    completionTimeoutMs: e.COMPLETION_TIMEOUT_MS,
    toolTimeoutMs: e.TOOL_TIMEOUT_MS,
    seedDatabase: e.SEED_DATABASE,
    corsOrigins: corsOrigins && corsOrigins.length > 0 ? corsOrigins : undefined,
    authToken: e.AUTH_TOKEN,
    systemPromptPath: e.SYSTEM_PROMPT_PATH,
  };
}
