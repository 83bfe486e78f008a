/**
 * Claim Lock Holder API
 *
 * **Interface for position owners and approved operators**
 *
 * Creates and destroys claims against a position and reports whether the
 * position is free to withdraw. Calls are signed by the holder's account.
 */

import type { Account } from 'algosdk'
import type { ClaimLockProjectConfig } from '../config/project'
import type { ClaimTypeState, LockStatus } from '../types/claims'
import type { ChainAccess } from '../lib/algod'
import { decodeBitmap, isOutstanding } from '../lib/bitmap'
import { FLAG_FORCE_DEFAULT, FLAG_HAS_DEFAULT_HELPER, FLAG_REVERT_IF_OVERRIDDEN } from '../lib/constants'
import { readClaimType, readOutstanding } from '../lib/lock-state'
import { validateAccount, validateAppId, validateClaimTypeId, validatePositionId, ValidationError } from '../lib/validate'
import { buildCreateClaimTxn, buildDestroyClaimTxn } from '../builders/lock-calls'

export interface CreateClaimOptions {
  /** Receives the supply (or the helper's distribution); the holder by default */
  beneficiary?: string

  /** Helper app to request; the claim type's policy may ignore or reject it */
  helperOverride?: bigint
}

export interface CreateClaimResult {
  txId: string

  /** Helper app the lock routes supply through, if any */
  helper?: bigint
}

/**
 * Helper app the lock will pick for `override`; 0n means none. Mirrors the
 * on-chain decision table so the call can reference the right app.
 */
export function resolveHelperApp(claimType: ClaimTypeState, override: bigint): bigint {
  if ((claimType.flags & FLAG_HAS_DEFAULT_HELPER) === 0n) {
    return override
  }
  if ((claimType.flags & FLAG_FORCE_DEFAULT) !== 0n || override === 0n) {
    const revert = (claimType.flags & FLAG_REVERT_IF_OVERRIDDEN) !== 0n
    if (revert && override !== 0n && override !== claimType.defaultHelper) {
      throw new ValidationError(
        `Claim type ${claimType.claimTypeId} forces helper ${claimType.defaultHelper}; override ${override} would be rejected`,
        'helperOverride'
      )
    }
    return claimType.defaultHelper
  }
  return override
}

export class ClaimLockHolder {
  readonly address: string

  constructor(
    private readonly config: ClaimLockProjectConfig,
    private readonly chain: ChainAccess,
    private readonly account: Account
  ) {
    this.address = account.addr.toString()
  }

  private async configuredClaimType(claimTypeId: number): Promise<ClaimTypeState> {
    const claimType = await readClaimType(this.chain, this.config.lockAppId, claimTypeId)
    if (claimType === undefined) {
      throw new ValidationError(`Claim type ${claimTypeId} is not configured on lock ${this.config.lockAppId}`, 'claimTypeId')
    }
    return claimType
  }

  /**
   * Create a claim; supply goes to the beneficiary or to the helper the lock
   * resolves.
   */
  async createClaim(claimTypeId: number, positionId: bigint, options: CreateClaimOptions = {}): Promise<CreateClaimResult> {
    validateClaimTypeId(claimTypeId)
    validatePositionId(positionId)
    const beneficiary = options.beneficiary ?? this.address
    validateAccount(beneficiary, 'beneficiary')
    const override = options.helperOverride ?? 0n
    if (override !== 0n) {
      validateAppId(override, 'helperOverride')
    }

    const claimType = await this.configuredClaimType(claimTypeId)
    if (isOutstanding(await readOutstanding(this.chain, this.config.lockAppId, positionId), claimTypeId)) {
      throw new ValidationError(`Claim type ${claimTypeId} is already outstanding on position ${positionId}`, 'claimTypeId')
    }
    const helper = resolveHelperApp(claimType, override)

    const txn = buildCreateClaimTxn(
      { lockAppId: this.config.lockAppId, sender: this.address, suggestedParams: await this.chain.suggestedParams() },
      {
        claimTypeId,
        positionId,
        beneficiary,
        helperOverride: override,
        stakingAuthority: this.config.stakingAuthority,
        derivativeContract: claimType.derivativeContract,
        helper: helper === 0n ? undefined : helper,
      }
    )
    const txId = await this.chain.submitGroup([txn], this.account)
    return helper === 0n ? { txId } : { txId, helper }
  }

  /**
   * Destroy a claim, burning the position's current value from `from` (the
   * holder by default).
   */
  async destroyClaim(claimTypeId: number, positionId: bigint, from: string = this.address): Promise<string> {
    validateClaimTypeId(claimTypeId)
    validatePositionId(positionId)
    validateAccount(from, 'from')

    if (!isOutstanding(await readOutstanding(this.chain, this.config.lockAppId, positionId), claimTypeId)) {
      throw new ValidationError(`Claim type ${claimTypeId} is not outstanding on position ${positionId}`, 'claimTypeId')
    }
    const claimType = await this.configuredClaimType(claimTypeId)

    const txn = buildDestroyClaimTxn(
      { lockAppId: this.config.lockAppId, sender: this.address, suggestedParams: await this.chain.suggestedParams() },
      {
        claimTypeId,
        positionId,
        from,
        stakingAuthority: this.config.stakingAuthority,
        derivativeContract: claimType.derivativeContract,
      }
    )
    return this.chain.submitGroup([txn], this.account)
  }

  async lockStatus(positionId: bigint): Promise<LockStatus> {
    validatePositionId(positionId)
    const outstanding = decodeBitmap(await readOutstanding(this.chain, this.config.lockAppId, positionId))
    return { positionId, unlocked: outstanding.length === 0, outstanding }
  }
}
