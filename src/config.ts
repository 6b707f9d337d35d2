import { getAddress, isAddress } from 'viem';
import { z } from 'zod';
import { MAX_VALIDATORS, UNKNOWN_LOSER_POLICY } from './constants.js';
import { ConfigError } from './errors.js';

const addressSchema = z
    .string()
    .refine(value => isAddress(value, { strict: false }), { message: 'Invalid address' })
    .transform(value => getAddress(value));

export const validatorManagerConfigSchema = z.object({
    orchestrator: addressSchema,
    validators: z.array(addressSchema).min(1).max(MAX_VALIDATORS),
    unknownLoserPolicy: z
        .enum([UNKNOWN_LOSER_POLICY.SKIP, UNKNOWN_LOSER_POLICY.REJECT])
        .default(UNKNOWN_LOSER_POLICY.SKIP),
});

export type RawValidatorManagerConfig = z.input<typeof validatorManagerConfigSchema>;
export type ValidatorManagerConfig = z.output<typeof validatorManagerConfigSchema>;

/** @notice Validate a raw config object, throwing `ConfigError` with one entry per issue. */
export const parseValidatorManagerConfig = (raw: unknown): ValidatorManagerConfig => {
    const parsed = validatorManagerConfigSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(
            issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`
        );
        throw new ConfigError('Invalid validator manager config', issues);
    }
    return parsed.data;
};

export const ENV_KEYS = {
    ORCHESTRATOR: 'VALIDATOR_MANAGER_ORCHESTRATOR',
    VALIDATORS: 'VALIDATOR_MANAGER_VALIDATORS',
    UNKNOWN_LOSER_POLICY: 'VALIDATOR_MANAGER_UNKNOWN_LOSER_POLICY',
} as const;

const parseList = (value: string | undefined): string[] | undefined =>
    value === undefined
        ? undefined
        : value
              .split(',')
              .map(entry => entry.trim())
              .filter(entry => entry.length > 0);

/** @notice Read the config from environment variables (validators comma-separated). */
export const loadValidatorManagerConfigFromEnv = (
    env: Readonly<Record<string, string | undefined>>
): ValidatorManagerConfig =>
    parseValidatorManagerConfig({
        orchestrator: env[ENV_KEYS.ORCHESTRATOR],
        validators: parseList(env[ENV_KEYS.VALIDATORS]),
        unknownLoserPolicy: env[ENV_KEYS.UNKNOWN_LOSER_POLICY] || undefined,
    });
