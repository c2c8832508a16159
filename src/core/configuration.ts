import { z } from 'zod';

/**
 * Harness configuration schema
 *
 * "Parse, don't validate": every field carries a default, so after parse()
 * the configuration is complete and no field is undefined.
 */
export const HarnessConfigurationSchema = z.object({
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('warn'),
  // Top-level command family the simulated handlers answer to
  toolName: z.string().min(1).max(32).regex(/^\S+$/).default('wit'),
  // Per-channel byte limit for one captured invocation (max 16MB)
  maxCaptureBytes: z.number().int().min(1024).max(16 * 1024 * 1024).default(1048576),
  // Attribution for history entries when no user role was set
  defaultUserRole: z.string().min(1).default('system'),
});

export type HarnessConfiguration = z.infer<typeof HarnessConfigurationSchema>;

export type LogLevelName = HarnessConfiguration['logLevel'];

function parseEnvNumber(value: string): number | undefined {
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Build the configuration from environment variables
 * Invalid values fall back to the schema defaults as a whole.
 */
export function loadConfiguration(env: NodeJS.ProcessEnv = process.env): HarnessConfiguration {
  const envConfig: Record<string, unknown> = {};

  if (env.HARNESS_LOG_LEVEL) envConfig.logLevel = env.HARNESS_LOG_LEVEL.toLowerCase();
  if (env.HARNESS_TOOL_NAME) envConfig.toolName = env.HARNESS_TOOL_NAME;
  if (env.HARNESS_MAX_CAPTURE_BYTES) envConfig.maxCaptureBytes = parseEnvNumber(env.HARNESS_MAX_CAPTURE_BYTES);
  if (env.HARNESS_USER_ROLE) envConfig.defaultUserRole = env.HARNESS_USER_ROLE;

  const parseResult = HarnessConfigurationSchema.safeParse(envConfig);

  if (parseResult.success) {
    return parseResult.data;
  }
  return HarnessConfigurationSchema.parse({});
}
