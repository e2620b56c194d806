// ABI fragments of the bridge contracts on each side of the relay

export const SOURCE_BRIDGE_ABI = [
  'event TokensLocked(address indexed sender, address indexed recipient, uint256 amount, uint256 nonce)'
];

export const DESTINATION_BRIDGE_ABI = [
  'function unlockTokens(address recipient, uint256 amount, uint256 sourceNonce)'
];

export const LOCK_EVENT_NAME = 'TokensLocked';
export const UNLOCK_FUNCTION_NAME = 'unlockTokens';
