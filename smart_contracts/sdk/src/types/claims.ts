/**
 * Claim Type Settings
 *
 * Off-chain description of how a claim type should be configured on the lock,
 * and what the lock's boxes say back.
 */

/**
 * One claim type as the operator wants it configured
 */
export interface ClaimTypeSetting {
  /** Claim-type id (0-255), also the bit index in every position bitmap */
  claimTypeId: number

  /** Derivative token app minted for this claim type */
  derivativeContract: bigint

  /** Default helper app (required when hasDefaultHelper is set) */
  defaultHelper?: bigint

  /** Route supply through the default helper unless overridden */
  hasDefaultHelper: boolean

  /** Ignore caller overrides */
  forceDefault: boolean

  /** Reject a differing override instead of ignoring it */
  revertIfDefaultForcedAndOverridden: boolean
}

/**
 * Claim type as stored on the lock
 */
export interface ClaimTypeState {
  claimTypeId: number
  derivativeContract: bigint
  /** 0n when none */
  defaultHelper: bigint
  /** FLAG_* bits */
  flags: bigint
}

/**
 * Lock status of a single position
 */
export interface LockStatus {
  positionId: bigint

  /** True when the staking authority may release the position */
  unlocked: boolean

  /** Outstanding claim-type ids, ascending */
  outstanding: number[]
}
