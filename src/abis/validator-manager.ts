export const VALIDATOR_MANAGER_ABI = [
    {
        type: 'event',
        name: 'ClaimReceived',
        inputs: [
            { name: 'result', type: 'uint8', indexed: false, internalType: 'enum IValidatorManager.Result' },
            { name: 'claims', type: 'bytes32[2]', indexed: false, internalType: 'bytes32[2]' },
            { name: 'validators', type: 'address[2]', indexed: false, internalType: 'address payable[2]' },
        ],
        anonymous: false,
    },
    {
        type: 'event',
        name: 'DisputeEnded',
        inputs: [
            { name: 'result', type: 'uint8', indexed: false, internalType: 'enum IValidatorManager.Result' },
            { name: 'claims', type: 'bytes32[2]', indexed: false, internalType: 'bytes32[2]' },
            { name: 'validators', type: 'address[2]', indexed: false, internalType: 'address payable[2]' },
        ],
        anonymous: false,
    },
    {
        type: 'event',
        name: 'NewEpoch',
        inputs: [{ name: 'claim', type: 'bytes32', indexed: false, internalType: 'bytes32' }],
        anonymous: false,
    },
] as const;
