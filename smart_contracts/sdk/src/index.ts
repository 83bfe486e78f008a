/**
 * Claim Lock SDK - Main Entrypoint
 *
 * Exports Operator and Holder APIs, call builders and the box layout they
 * read.
 */

// Configuration
export { getNetworkConfig, isNetworkType, LOCALNET, MAINNET, TESTNET } from './config/networks'
export type { AlgorandNetworkConfig, NetworkType } from './config/networks'
export {
  DEFAULT_PROJECT_ID,
  loadClaimTypeSettings,
  loadProjectConfig,
  parseAppId,
  parseClaimTypeSettings,
} from './config/project'
export type { ClaimLockProjectConfig } from './config/project'

// Types
export type { ClaimTypeSetting, ClaimTypeState, LockStatus } from './types/claims'

// Lib utilities
export { createChainAccess, createClients, waitForConfirmation } from './lib/algod'
export type { AlgorandClients, ChainAccess } from './lib/algod'
export { decodeBitmap, encodeBitmap, isOutstanding } from './lib/bitmap'
export {
  BITMAP_BYTES,
  BOX_PREFIX,
  boxName,
  CLAIM_TYPE_COUNT,
  FLAG_FORCE_DEFAULT,
  FLAG_HAS_DEFAULT_HELPER,
  FLAG_REVERT_IF_OVERRIDDEN,
  MAX_UINT64,
  ZERO_ADDRESS,
} from './lib/constants'
export { decodeClaimInstructions, encodeClaimInstructions } from './lib/instructions'
export type { ClaimInstruction } from './lib/instructions'
export { readClaimType, readOutstanding } from './lib/lock-state'
export {
  ValidationError,
  validateAccount,
  validateAddress,
  validateAppId,
  validateClaimTypeId,
  validateClaimTypeSetting,
  validatePositionId,
  validateProjectConfig,
} from './lib/validate'

// Builders
export {
  buildConfigureTxn,
  buildCreateClaimTxn,
  buildDestroyClaimTxn,
  buildSetAdminTxn,
  decodeLockCall,
  LOCK_METHODS,
} from './builders/lock-calls'
export type { CreateClaimArgs, DestroyClaimArgs, LockCallParams, LockMethodName } from './builders/lock-calls'
export { buildRegistrationPayload } from './builders/registration'
export type { RegistrationPayload } from './builders/registration'

// Operations
export { ClaimLockOperator, MAX_GROUP_SIZE } from './ops/operator'
export type { ApplyClaimTypesResult } from './ops/operator'
export { ClaimLockHolder, resolveHelperApp } from './ops/holder'
export type { CreateClaimOptions, CreateClaimResult } from './ops/holder'

/**
 * SDK Version
 */
export const SDK_VERSION = '1.0.0'
