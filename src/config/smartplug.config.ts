import { z } from 'zod';

/** Unset and empty are the same thing for the address variables */
const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value === '' ? undefined : value));

/**
 * Environment schema for the smart-plug forwarder.
 *
 * Every address can also be given on the command line; flags take
 * precedence over the values read here. The presence of VERBOSE (with any
 * value, even empty) turns verbose mode on, mirroring the container
 * entrypoint; see isVerboseEnvironment().
 */
export const smartplugEnvSchema = z.object({
  SMARTPLUG_HOST: optionalText,
  ZBX_SERVER: optionalText,
  ZBX_HOST: optionalText,
  VERBOSE: z.string().optional(),
  KASA_BIN: z.string().trim().min(1).default('kasa'),
  ZABBIX_SENDER_BIN: z.string().trim().min(1).default('zabbix_sender'),
  ZBX_ITEM_NAMESPACE: z
    .string()
    .trim()
    .regex(/^[A-Za-z0-9_.-]+$/, 'must be a valid Zabbix item key prefix')
    .default('tplink_smartplug'),
  SMARTPLUG_MODEL_CATALOG: optionalText,
});

export type SmartplugEnv = z.infer<typeof smartplugEnvSchema>;

/**
 * Validation hook for ConfigModule.forRoot().
 *
 * Throws with every offending variable listed so the process can stop
 * before any device is contacted.
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): SmartplugEnv {
  const result = smartplugEnvSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return result.data;
}

export function isVerboseEnvironment(
  env: Pick<SmartplugEnv, 'VERBOSE'>,
): boolean {
  return env.VERBOSE !== undefined;
}
