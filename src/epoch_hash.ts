import { encodeAbiParameters, hexToBigInt, isHex, keccak256, size, type Hex } from 'viem';
import { InvalidClaimError } from './errors.js';

/** @notice Per-epoch drive hashes that fold into the epoch claim. */
export interface EpochDriveHashes {
    outputDriveHash: Hex;
    messageDriveHash: Hex;
    machineFinalState: Hex;
}

const toWord = (value: string): bigint => {
    if (!isHex(value, { strict: true }) || size(value) !== 32) {
        throw new InvalidClaimError(value, 'drive hash must be 32-byte hex');
    }
    return hexToBigInt(value);
};

/**
 * @notice Claim for an epoch: keccak256 over the three drive hashes ABI-encoded as uint256 words.
 * Output proofs for the epoch are checked against this value.
 */
export const computeEpochHash = (hashes: EpochDriveHashes): Hex =>
    keccak256(
        encodeAbiParameters(
            [
                { name: 'outputDriveHash', type: 'uint256' },
                { name: 'messageDriveHash', type: 'uint256' },
                { name: 'machineFinalState', type: 'uint256' },
            ],
            [toWord(hashes.outputDriveHash), toWord(hashes.messageDriveHash), toWord(hashes.machineFinalState)]
        )
    );
