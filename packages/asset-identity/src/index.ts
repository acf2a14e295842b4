export { AssetIdentityResolver, resolve, type ResolveOptions } from './resolver.js';

export { DEFAULT_NETWORK_ALIAS_GROUPS, type NetworkAliasGroup } from './network/network-aliases.js';
export {
  cleanNetworkLabel,
  defaultNetworkStandardizer,
  NetworkNameStandardizer,
  standardizeNetwork,
} from './network/network-standardizer.js';

export { matchesDenomination } from './matching/denomination.js';
export { buildContractKey, normalizeContractAddress } from './matching/contract-key.js';
export { ContractIdentityIndex, type ContractIndexEntry } from './matching/contract-identity-index.js';
export { matchTraditional } from './matching/traditional-matcher.js';
export {
  matchByContractClosure,
  type ContractClosureOutcome,
  type ContractClosureTrace,
} from './matching/contract-closure-matcher.js';
export { dedupeMatches, mergeMatches } from './matching/result-merger.js';
