import { getAddress, type Address, type Hex } from 'viem';
import { parseValidatorManagerConfig } from '../src/config.js';
import type { UnknownLoserPolicy } from '../src/constants.js';
import { ValidatorManager } from '../src/validator_manager.js';

export const ORCHESTRATOR: Address = getAddress('0x00000000000000000000000000000000000000f0');
export const OUTSIDER: Address = getAddress('0x00000000000000000000000000000000000000ee');
export const ALICE: Address = getAddress('0x00000000000000000000000000000000000000a1');
export const BOB: Address = getAddress('0x00000000000000000000000000000000000000b2');
export const CAROL: Address = getAddress('0x00000000000000000000000000000000000000c3');
export const DAVE: Address = getAddress('0x00000000000000000000000000000000000000d4');

export const CLAIM_X: Hex = `0x${'11'.repeat(32)}`;
export const CLAIM_Y: Hex = `0x${'22'.repeat(32)}`;
export const CLAIM_Z: Hex = `0x${'33'.repeat(32)}`;

export const createManager = (
    validators: readonly Address[] = [ALICE, BOB, CAROL],
    unknownLoserPolicy: UnknownLoserPolicy = 'skip'
): ValidatorManager =>
    new ValidatorManager(
        parseValidatorManagerConfig({ orchestrator: ORCHESTRATOR, validators, unknownLoserPolicy })
    );
