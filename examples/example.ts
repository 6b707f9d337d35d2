// examples/example.ts
import {
  ClaimIndexer,
  MemoryCache,
  ValidatorManager,
  computeEpochHash,
  loadValidatorManagerConfigFromEnv,
  ENV_KEYS,
} from '../src/index.js';
import type { ClaimOutcome, ValidatorManagerConfig } from '../src/index.js';
import type { Address, Hex } from 'viem';
import { fileURLToPath } from 'url';

const DEFAULT_ORCHESTRATOR: Address = '0x00000000000000000000000000000000000000f0';
const DEFAULT_VALIDATORS: Address[] = [
  '0x00000000000000000000000000000000000000a1',
  '0x00000000000000000000000000000000000000b2',
  '0x00000000000000000000000000000000000000c3',
];

const COLORS = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  cyan: '\x1b[36m',
  magenta: '\x1b[35m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  gray: '\x1b[90m',
};

const ui = {
  heading: (text: string) =>
    console.log(`${COLORS.bold}${COLORS.cyan}${text}${COLORS.reset}`),
  section: (title: string) =>
    console.log(`\n${COLORS.bold}${COLORS.magenta}=== ${title} ===${COLORS.reset}`),
  info: (label: string, value: unknown) =>
    console.log(`${COLORS.bold}${label}:${COLORS.reset} ${value}`),
  success: (message: string) =>
    console.log(`${COLORS.green}✔ ${message}${COLORS.reset}`),
  warn: (message: string) =>
    console.log(`${COLORS.yellow}⚠ ${message}${COLORS.reset}`),
  error: (message: string) =>
    console.log(`${COLORS.red}✘ ${message}${COLORS.reset}`),
  bullet: (text: string) =>
    console.log(`  ${COLORS.gray}•${COLORS.reset} ${text}`),
  blank: () => console.log(),
};

/**
 * Walks one epoch: a conflicting claim, its dispute, consensus and rollover.
 */
async function main() {
  ui.heading('🚀 Initializing validator manager...');

  const config = resolveConfig();
  ui.info('Orchestrator', config.orchestrator);
  ui.info('Validators', config.validators.length);
  ui.info('Unknown Loser Policy', config.unknownLoserPolicy);

  if (config.validators.length < 3) {
    ui.warn('This walkthrough needs at least three validators');
    return;
  }

  const manager = new ValidatorManager(config);
  const cache = new MemoryCache();
  const indexer = new ClaimIndexer({ cache });
  const unwatch = indexer.attach(manager);
  const account = config.orchestrator;
  const [alice, bob, carol] = config.validators;

  const honestClaim = computeEpochHash({
    outputDriveHash: word(1),
    messageDriveHash: word(2),
    machineFinalState: word(3),
  });
  const dishonestClaim = computeEpochHash({
    outputDriveHash: word(1),
    messageDriveHash: word(2),
    machineFinalState: word(4),
  });
  ui.info('Honest Claim', honestClaim);
  ui.info('Dishonest Claim', dishonestClaim);

  ui.section('Claims');
  displayOutcome('First claim', manager.submitClaim({ account, validator: alice, claim: honestClaim }));
  const conflict = manager.submitClaim({ account, validator: bob, claim: dishonestClaim });
  displayOutcome('Conflicting claim', conflict);

  ui.section('Dispute');
  displayOutcome(
    'Dispute resolved',
    manager.resolveDispute({ account, winner: alice, loser: bob, winningClaim: honestClaim }),
  );
  ui.info('Goal Mask', manager.consensusGoalMask().toString());
  ui.info('Agreement Mask', manager.agreementMask().toString());

  displayOutcome('Last claim', manager.submitClaim({ account, validator: carol, claim: honestClaim }));

  ui.section('Epoch Rollover');
  const finalized = manager.advanceEpoch({ account });
  ui.success(`Epoch finalized with ${finalized}`);
  await indexer.flush();
  unwatch();

  const snapshot = indexer.snapshot();
  ui.info('Next Epoch', snapshot.epoch);
  ui.info('Cached Claim (epoch 0)', await cache.get(0, 'finalizedClaim'));
  snapshot.finalizedEpochs.forEach((entry) => {
    ui.bullet(`Epoch ${entry.epoch} · ${entry.claim}`);
  });
  ui.blank();
}

function resolveConfig(): ValidatorManagerConfig {
  return loadValidatorManagerConfigFromEnv({
    [ENV_KEYS.ORCHESTRATOR]: process.env[ENV_KEYS.ORCHESTRATOR] ?? DEFAULT_ORCHESTRATOR,
    [ENV_KEYS.VALIDATORS]: process.env[ENV_KEYS.VALIDATORS] ?? DEFAULT_VALIDATORS.join(','),
    [ENV_KEYS.UNKNOWN_LOSER_POLICY]: process.env[ENV_KEYS.UNKNOWN_LOSER_POLICY],
  });
}

function displayOutcome(label: string, outcome: ClaimOutcome) {
  ui.info(label, outcome.result);
  outcomeBullets(outcome).forEach((line) => ui.bullet(line));
}

function outcomeBullets(outcome: ClaimOutcome): string[] {
  return [
    `claims ${outcome.claims.map((claim) => shortHex(claim)).join(' · ')}`,
    `validators ${outcome.validators.map((validator) => shortHex(validator)).join(' · ')}`,
  ];
}

function word(value: number): Hex {
  return `0x${value.toString(16).padStart(64, '0')}`;
}

function shortHex(value: string, maxLength: number = 18): string {
  if (value.length <= maxLength) {
    return value;
  }
  const half = Math.floor((maxLength - 3) / 2);
  if (half <= 0) {
    return '...';
  }
  return `${value.slice(0, half)}...${value.slice(-half)}`;
}

function formatError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Run the example (ESM-friendly main check)
const isMainModule = process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1];
if (isMainModule) {
  main().catch((error: unknown) => {
    ui.error(formatError(error));
    process.exitCode = 1;
  });
}

export { main, outcomeBullets, shortHex };
