import { z } from 'zod';
import { DEFAULT_AGENT_API_BASE_URL } from '../utils/constants';
import { ConfigurationError } from '../errors/configuration.error';

const blankAsUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(blankAsUndefined, z.string().optional());

const optionalHttpUrl = z.preprocess(
  blankAsUndefined,
  z.string().url('Invalid URL (expected http:// or https://)').optional(),
);

const seconds = (fallback: number) =>
  z.preprocess(blankAsUndefined, z.coerce.number().min(0).default(fallback));

export const relayEnvSchema = z
  .object({
    TELEGRAM_BOT_TOKEN: z.string().trim().min(1, 'TELEGRAM_BOT_TOKEN is required'),
    TELEGRAM_TRANSPORT: z.preprocess(
      blankAsUndefined,
      z.enum(['webhook', 'polling']).default('polling'),
    ),
    TELEGRAM_WEBHOOK_URL: optionalHttpUrl,
    TELEGRAM_WEBHOOK_SECRET: optionalString,

    AGENT_API_KEY: optionalString,
    AGENT_ID: optionalString,
    AGENT_API_BASE_URL: z.preprocess(
      blankAsUndefined,
      z.string().url().default(DEFAULT_AGENT_API_BASE_URL),
    ),
    AGENT_ENDPOINT: optionalHttpUrl,
    AGENT_ACCESS_KEY: optionalString,
    AGENT_API_TIMEOUT: z.preprocess(
      blankAsUndefined,
      z.coerce.number().positive().default(30),
    ),
    AGENT_API_MAX_RETRIES: z.preprocess(
      blankAsUndefined,
      z.coerce.number().int().min(0).default(3),
    ),
    AGENT_API_BASE_BACKOFF: seconds(0.5),
    AGENT_API_MAX_BACKOFF: seconds(60),

    AGENT_RATE_LIMIT_QPS: z.preprocess(
      blankAsUndefined,
      z.coerce.number().positive().optional(),
    ),
    AGENT_RATE_LIMIT_BURST: z.preprocess(
      blankAsUndefined,
      z.coerce.number().int().min(1).default(1),
    ),
    AGENT_RATE_LIMIT_COOLDOWN: seconds(5),

    SESSION_STORE: z.preprocess(
      blankAsUndefined,
      z.enum(['memory', 'redis']).default('memory'),
    ),
    REDIS_URL: optionalString,

    PORT: z.preprocess(
      blankAsUndefined,
      z.coerce.number().int().min(1).max(65535).default(3000),
    ),
  })
  .superRefine((env, ctx) => {
    const endpointMode = Boolean(env.AGENT_ENDPOINT && env.AGENT_ACCESS_KEY);
    if (!endpointMode && !env.AGENT_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['AGENT_API_KEY'],
        message: 'required unless AGENT_ENDPOINT and AGENT_ACCESS_KEY are set',
      });
    }
    if (!endpointMode && !env.AGENT_ID) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['AGENT_ID'],
        message: 'required unless AGENT_ENDPOINT and AGENT_ACCESS_KEY are set',
      });
    }
    if (env.SESSION_STORE === 'redis' && !env.REDIS_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['REDIS_URL'],
        message: 'required when SESSION_STORE is redis',
      });
    }
  });

export type RelayEnv = z.infer<typeof relayEnvSchema>;

/**
 * Validate process environment variables
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function parseRelayEnv(
  env: Record<string, string | undefined>,
): RelayEnv {
  const result = relayEnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid environment: ${issues}`);
  }
  return result.data;
}
