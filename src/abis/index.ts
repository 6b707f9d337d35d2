export { VALIDATOR_MANAGER_ABI } from './validator-manager.js';
