export * from './types/index.js';
export * from './constants.js';
export * from './errors.js';
export { ValidatorBitmask } from './bitmask.js';
export { ValidatorRoster } from './roster.js';
export { ValidatorManager, normalizeClaim } from './validator_manager.js';
export {
    ENV_KEYS,
    loadValidatorManagerConfigFromEnv,
    parseValidatorManagerConfig,
    validatorManagerConfigSchema,
} from './config.js';
export type { RawValidatorManagerConfig, ValidatorManagerConfig } from './config.js';
export { VALIDATOR_MANAGER_ABI } from './abis/index.js';
export {
    claimResultFromCode,
    claimResultToCode,
    decodeValidatorManagerLog,
    encodeValidatorManagerEvent,
    parseValidatorManagerLogs,
} from './events.js';
export { computeEpochHash } from './epoch_hash.js';
export type { EpochDriveHashes } from './epoch_hash.js';
export { ClaimIndexer, EPOCH_PHASE } from './claim_indexer.js';
export type { ClaimIndexerOptions, ClaimIndexState, EpochPhase, FinalizedEpoch } from './claim_indexer.js';
export { MemoryCache } from './cache.js';
