import { z } from 'zod';


const BoolString = z
  .string()
  .transform((v) => v.trim())
  .transform((v) => (v === '1' || v.toLowerCase() === 'true' ? 'true' : 'false'))
  .pipe(z.enum(['true', 'false']))
  .transform((v) => v === 'true');

const BigintString = z
  .string()
  .transform((v) => v.trim().replace(/_/g, ''))
  .pipe(z.string().regex(/^\d+$/))
  .transform((v) => BigInt(v));

const NumberString = z
  .string()
  .transform((v) => v.trim())
  .pipe(z.string().regex(/^\d+$/))
  .transform((v) => Number(v));

const EnvSchema = z.object({
  LOG_LEVEL: z
    .string()
    .optional()
    .default('info')
    .pipe(z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])),
  LOG_PRETTY: z.string().optional().default('0').pipe(BoolString),
  /** gas given to a transaction when the sender does not set one */
  TX_GAS_LIMIT: z.string().optional().default('30_000_000').pipe(BigintString),
  MAX_CALL_DEPTH: z.string().optional().default('1024').pipe(NumberString),
});

export type EngineConfig = z.infer<typeof EnvSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('\n');
    throw new Error(`Invalid environment:\n${issues}`);
  }
  return parsed.data;
}

let current: EngineConfig | null = null;

/** process wide configuration, read from the environment on first use */
export function getConfig(): EngineConfig {
  if (current === null) current = loadConfig();
  return current;
}
