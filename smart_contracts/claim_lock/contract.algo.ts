import {
  Contract,
  GlobalState,
  Uint64,
  BoxMap,
  Bytes,
  Txn,
  Global,
  Application,
  assert,
  log,
  op,
  arc4,
} from '@algorandfoundation/algorand-typescript'
import type { uint64, Account, bytes } from '@algorandfoundation/algorand-typescript'
import { abiCall } from '@algorandfoundation/algorand-typescript/arc4'
import {
  FLAG_FORCE_DEFAULT,
  FLAG_HAS_DEFAULT_HELPER,
  FLAG_REVERT_IF_OVERRIDDEN,
  resolveHelper,
} from './helper-resolution.algo'
import { DerivativeToken, HelperModule, StakingAuthority } from './interfaces.algo'

// One bit per claim type id (0..255); bit i of the word is claim type i
const BITMAP_BYTES: uint64 = Uint64(32)
const CLAIM_TYPE_COUNT: uint64 = Uint64(256)

// Claim instructions: ARC-4 (uint8,uint64)[] = uint16 count, then 9-byte tuples
const LENGTH_PREFIX_BYTES: uint64 = Uint64(2)
const INSTRUCTION_BYTES: uint64 = Uint64(9)

/**
 * Claim Lock
 *
 * Tracks derivative claims ("tentacles") created against staked positions and
 * keeps a position locked while any of them is outstanding.
 *
 * - One 256-bit bitmap box per position; bit i = claim type i outstanding
 * - Claim types map to a derivative token app plus a helper-selection policy
 * - Every precondition is checked before the first write, and outstanding
 *   bits are written before any inner call to a token or helper
 * - A failing assert or inner call fails the whole transaction group
 */
export class ClaimLock extends Contract {
  // -----------------------
  // Global state
  // -----------------------
  admin = GlobalState<Account>()
  stakingAuthority = GlobalState<uint64>({ initialValue: Uint64(0) })

  // -----------------------
  // Boxes
  // -----------------------
  // positionId -> 32-byte outstanding bitmap (absent = empty)
  outstanding = BoxMap<uint64, bytes>({ keyPrefix: Bytes('out:') })
  // claimTypeId -> derivative token app id (absent = unconfigured)
  derivatives = BoxMap<uint64, uint64>({ keyPrefix: Bytes('cfg_drv:') })
  // claimTypeId -> FLAG_* bits
  claimFlags = BoxMap<uint64, uint64>({ keyPrefix: Bytes('cfg_flags:') })
  // claimTypeId -> default helper app id
  defaultHelpers = BoxMap<uint64, uint64>({ keyPrefix: Bytes('cfg_helper:') })

  // -----------------------
  // Helpers
  // -----------------------
  private onlyAdmin(): void {
    assert(Txn.sender === this.admin.value, 'NotAdmin')
  }

  private onlyStakingAuthority(): void {
    assert(Txn.sender === Application(this.stakingAuthority.value).address, 'NotStakingAuthority')
  }

  private validClaimTypeId(claimTypeId: uint64): void {
    assert(claimTypeId < CLAIM_TYPE_COUNT, 'InvalidClaimTypeId')
  }

  private nonZeroAccount(account: Account): void {
    assert(account !== Global.zeroAddress, 'ZeroAddress')
  }

  private onlyApprovedOrOwner(positionId: uint64): void {
    const approved = abiCall({
      method: StakingAuthority.prototype.isApprovedOrOwner,
      appId: Application(this.stakingAuthority.value),
      args: [Txn.sender, positionId],
      fee: Uint64(0),
    }).returnValue
    assert(approved, 'NotApprovedOrOwner')
  }

  private positionBalance(positionId: uint64): uint64 {
    return abiCall({
      method: StakingAuthority.prototype.stakingTokenBalance,
      appId: Application(this.stakingAuthority.value),
      args: [positionId],
      fee: Uint64(0),
    }).returnValue
  }

  /** Derivative token of a configured claim type */
  private requireConfigured(claimTypeId: uint64): uint64 {
    assert(this.derivatives(claimTypeId).exists, 'ClaimTypeNotConfigured')
    return this.derivatives(claimTypeId).value
  }

  private helperFor(claimTypeId: uint64, override: uint64): uint64 {
    return resolveHelper(
      this.claimFlags(claimTypeId).get({ default: Uint64(0) }),
      override,
      this.defaultHelpers(claimTypeId).get({ default: Uint64(0) })
    )
  }

  private bitmapOf(positionId: uint64): bytes {
    return this.outstanding(positionId).get({ default: op.bzero(BITMAP_BYTES) })
  }

  private isBitSet(positionId: uint64, claimTypeId: uint64): boolean {
    return op.getBit(this.bitmapOf(positionId), claimTypeId)
  }

  // An empty bitmap is stored as no box at all
  private storeBitmap(positionId: uint64, bitmap: bytes): void {
    if (bitmap === op.bzero(BITMAP_BYTES)) {
      this.outstanding(positionId).delete()
    } else {
      this.outstanding(positionId).value = bitmap
    }
  }

  private markOutstanding(positionId: uint64, claimTypeId: uint64): void {
    this.storeBitmap(positionId, op.setBit(this.bitmapOf(positionId), claimTypeId, Uint64(1)))
  }

  /**
   * Issue `amount` of the claim type's derivative once: to the helper, which
   * then distributes it, or straight to the beneficiary.
   */
  private issue(
    claimTypeId: uint64,
    derivative: uint64,
    helper: uint64,
    positionIds: uint64[],
    beneficiary: Account,
    amount: uint64
  ): void {
    if (helper !== Uint64(0)) {
      abiCall({
        method: DerivativeToken.prototype.mint,
        appId: Application(derivative),
        args: [Application(helper).address, amount],
        fee: Uint64(0),
      })
      abiCall({
        method: HelperModule.prototype.createFor,
        appId: Application(helper),
        args: [claimTypeId, derivative, positionIds, amount, beneficiary],
        fee: Uint64(0),
      })
    } else {
      abiCall({
        method: DerivativeToken.prototype.mint,
        appId: Application(derivative),
        args: [beneficiary, amount],
        fee: Uint64(0),
      })
    }
  }

  private burnClaim(claimTypeId: uint64, positionId: uint64, caller: Account, from: Account, amount: uint64): void {
    abiCall({
      method: DerivativeToken.prototype.burn,
      appId: Application(this.requireConfigured(claimTypeId)),
      args: [caller, from, amount],
      fee: Uint64(0),
    })
    log(Bytes('ClaimDestroyed:'), claimTypeId, positionId, caller, from, amount)
  }

  // -----------------------
  // Claim instructions
  // -----------------------
  /** Number of encoded instructions; the byte length must match exactly */
  private instructionCount(instructions: bytes): uint64 {
    assert(instructions.length >= LENGTH_PREFIX_BYTES, 'InvalidClaimInstructions')
    const count = op.extractUint16(instructions, Uint64(0))
    assert(instructions.length === LENGTH_PREFIX_BYTES + count * INSTRUCTION_BYTES, 'InvalidClaimInstructions')
    return count
  }

  private instructionClaimType(instructions: bytes, index: uint64): uint64 {
    return op.getByte(instructions, LENGTH_PREFIX_BYTES + index * INSTRUCTION_BYTES)
  }

  private instructionOverride(instructions: bytes, index: uint64): uint64 {
    return op.extractUint64(instructions, LENGTH_PREFIX_BYTES + index * INSTRUCTION_BYTES + Uint64(1))
  }

  // -----------------------
  // Lifecycle
  // -----------------------
  /**
   * Create-time initializer: the staking registry whose hooks this lock
   * accepts, and the account allowed to configure claim types.
   */
  @arc4.abimethod({ onCreate: 'require' })
  initialize(stakingAuthority: uint64, admin: Account): void {
    assert(stakingAuthority !== Uint64(0), 'ZeroStakingAuthority')
    this.nonZeroAccount(admin)
    this.stakingAuthority.value = stakingAuthority
    this.admin.value = admin
  }

  setAdmin(newAdmin: Account): void {
    this.onlyAdmin()
    this.nonZeroAccount(newAdmin)
    const previous = this.admin.value
    this.admin.value = newAdmin
    log(Bytes('AdminChanged:'), previous, Bytes('->'), newAdmin)
  }

  // -----------------------
  // Claim registry
  // -----------------------
  /**
   * Store the derivative token, default helper and flags for a claim type,
   * replacing whatever was there. A zero default helper removes it.
   */
  configure(
    claimTypeId: uint64,
    derivativeContract: uint64,
    defaultHelper: uint64,
    hasDefaultHelper: boolean,
    forceDefault: boolean,
    revertIfDefaultForcedAndOverridden: boolean
  ): void {
    this.onlyAdmin()
    this.validClaimTypeId(claimTypeId)
    assert(derivativeContract !== Uint64(0), 'ZeroDerivativeContract')

    let flags: uint64 = Uint64(0)
    if (hasDefaultHelper) flags = flags | FLAG_HAS_DEFAULT_HELPER
    if (forceDefault) flags = flags | FLAG_FORCE_DEFAULT
    if (revertIfDefaultForcedAndOverridden) flags = flags | FLAG_REVERT_IF_OVERRIDDEN

    const overwritten: uint64 = this.derivatives(claimTypeId).exists ? Uint64(1) : Uint64(0)
    this.derivatives(claimTypeId).value = derivativeContract
    this.claimFlags(claimTypeId).value = flags
    if (defaultHelper === Uint64(0)) {
      this.defaultHelpers(claimTypeId).delete()
    } else {
      this.defaultHelpers(claimTypeId).value = defaultHelper
    }

    log(Bytes('ClaimTypeConfigured:'), claimTypeId, derivativeContract, defaultHelper, flags, overwritten)
  }

  getAdmin(): Account {
    return this.admin.value
  }

  getStakingAuthority(): uint64 {
    return this.stakingAuthority.value
  }

  /** 0 when unconfigured */
  derivativeOf(claimTypeId: uint64): uint64 {
    return this.derivatives(claimTypeId).get({ default: Uint64(0) })
  }

  defaultHelperOf(claimTypeId: uint64): uint64 {
    return this.defaultHelpers(claimTypeId).get({ default: Uint64(0) })
  }

  claimFlagsOf(claimTypeId: uint64): uint64 {
    return this.claimFlags(claimTypeId).get({ default: Uint64(0) })
  }

  // -----------------------
  // Outstanding claims
  // -----------------------
  outstandingBitmap(positionId: uint64): bytes {
    return this.bitmapOf(positionId)
  }

  isOutstanding(positionId: uint64, claimTypeId: uint64): boolean {
    this.validClaimTypeId(claimTypeId)
    return this.isBitSet(positionId, claimTypeId)
  }

  /**
   * Fail-open for any authority other than the configured one; otherwise
   * unlocked iff no claim is outstanding.
   */
  isUnlocked(authority: uint64, positionId: uint64): boolean {
    if (authority !== this.stakingAuthority.value) {
      return true
    }
    return !this.outstanding(positionId).exists
  }

  // -----------------------
  // Create / destroy
  // -----------------------
  /**
   * Create a claim of `claimTypeId` against `positionId`, issuing the
   * position's current balance to `beneficiary` or to the resolved helper.
   * Sender must be owner of or approved for the position, and the position
   * must name this lock as its lock manager. A zero override means none.
   */
  create(claimTypeId: uint64, positionId: uint64, beneficiary: Account, helperOverride: uint64): void {
    this.validClaimTypeId(claimTypeId)
    this.nonZeroAccount(beneficiary)
    this.onlyApprovedOrOwner(positionId)

    const lockManager = abiCall({
      method: StakingAuthority.prototype.lockManager,
      appId: Application(this.stakingAuthority.value),
      args: [positionId],
      fee: Uint64(0),
    }).returnValue
    assert(lockManager === Global.currentApplicationId.id, 'NotLockManager')

    const derivative = this.requireConfigured(claimTypeId)
    assert(!this.isBitSet(positionId, claimTypeId), 'AlreadyCreated')
    const helper = this.helperFor(claimTypeId, helperOverride)
    const amount = this.positionBalance(positionId)

    this.markOutstanding(positionId, claimTypeId)
    this.issue(claimTypeId, derivative, helper, [positionId], beneficiary, amount)

    log(Bytes('ClaimCreated:'), claimTypeId, positionId, beneficiary, helper, amount)
  }

  /**
   * Destroy an outstanding claim, burning the position's current balance of
   * derivative supply from `from`. Sender must be owner of or approved for the
   * position.
   */
  destroy(claimTypeId: uint64, positionId: uint64, from: Account): void {
    this.validClaimTypeId(claimTypeId)
    this.nonZeroAccount(from)
    this.onlyApprovedOrOwner(positionId)

    const bitmap = this.bitmapOf(positionId)
    assert(op.getBit(bitmap, claimTypeId), 'NotCreated')
    const amount = this.positionBalance(positionId)

    this.storeBitmap(positionId, op.setBit(bitmap, claimTypeId, Uint64(0)))
    this.burnClaim(claimTypeId, positionId, Txn.sender, from, amount)
  }

  // -----------------------
  // Staking authority hooks
  // -----------------------
  /**
   * Registration hook: create every encoded claim for every position.
   *
   * Every instruction is checked (layout, duplicates, configuration, helper
   * policy, free bits) before the first bit is written. Each instruction
   * mints `stakingAmount` once, and the helper, if any, receives all position
   * ids.
   */
  onRegistration(beneficiary: Account, stakingAmount: uint64, positionIds: uint64[], instructions: bytes): void {
    this.onlyStakingAuthority()
    this.nonZeroAccount(beneficiary)

    const count = this.instructionCount(instructions)

    // A position listed twice would have its claims created twice
    if (count > Uint64(0)) {
      for (let i = Uint64(1); i < positionIds.length; i++) {
        for (let j = Uint64(0); j < i; j++) {
          assert(positionIds[i] !== positionIds[j], 'AlreadyCreated')
        }
      }
    }

    let seen = op.bzero(BITMAP_BYTES)
    for (let i = Uint64(0); i < count; i++) {
      const claimTypeId = this.instructionClaimType(instructions, i)
      assert(!op.getBit(seen, claimTypeId), 'DuplicateClaimType')
      seen = op.setBit(seen, claimTypeId, Uint64(1))

      this.requireConfigured(claimTypeId)
      this.helperFor(claimTypeId, this.instructionOverride(instructions, i))
      for (const positionId of positionIds) {
        assert(!this.isBitSet(positionId, claimTypeId), 'AlreadyCreated')
      }
    }

    for (let i = Uint64(0); i < count; i++) {
      const claimTypeId = this.instructionClaimType(instructions, i)
      const derivative = this.requireConfigured(claimTypeId)
      const helper = this.helperFor(claimTypeId, this.instructionOverride(instructions, i))

      for (const positionId of positionIds) {
        this.markOutstanding(positionId, claimTypeId)
      }
      if (positionIds.length > Uint64(0)) {
        this.issue(claimTypeId, derivative, helper, positionIds, beneficiary, stakingAmount)
      }
      log(Bytes('ClaimsCreated:'), claimTypeId, positionIds.length, beneficiary, helper, stakingAmount)
    }

    log(Bytes('Registered:'), beneficiary, stakingAmount, positionIds.length, count)
  }

  /**
   * Redemption hook: destroy every outstanding claim of the position, burning
   * the position's balance from `owner` for each. Returns how many were
   * destroyed.
   */
  onRedemption(positionId: uint64, owner: Account): uint64 {
    this.onlyStakingAuthority()
    this.nonZeroAccount(owner)

    let destroyed = Uint64(0)
    if (this.outstanding(positionId).exists) {
      const bitmap = this.outstanding(positionId).value
      const amount = this.positionBalance(positionId)
      this.outstanding(positionId).delete()

      // Whole zero bytes are skipped; only set bits cost a burn
      for (let byteIndex = Uint64(0); byteIndex < BITMAP_BYTES; byteIndex++) {
        if (op.getByte(bitmap, byteIndex) === Uint64(0)) {
          continue
        }
        for (let bit = Uint64(0); bit < Uint64(8); bit++) {
          const claimTypeId: uint64 = byteIndex * Uint64(8) + bit
          if (op.getBit(bitmap, claimTypeId)) {
            this.burnClaim(claimTypeId, positionId, Txn.sender, owner, amount)
            destroyed = destroyed + Uint64(1)
          }
        }
      }
    }

    log(Bytes('Redeemed:'), positionId, owner, destroyed)
    return destroyed
  }
}
