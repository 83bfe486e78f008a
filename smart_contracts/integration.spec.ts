import { TestExecutionContext } from '@algorandfoundation/algorand-typescript-testing'
import { afterEach, describe, expect, it } from 'vitest'
import { Bytes, Uint64, op } from '@algorandfoundation/algorand-typescript'
import { ClaimLockFixture } from './testing/claim-lock.fixture'
import { buildRegistrationPayload } from './sdk/src/builders/registration'
import { encodeBitmap } from './sdk/src/lib/bitmap'

/**
 * Claim Lock: staking authority round trip
 *
 * Scenario:
 * - Admin configures claim types 0 and 2
 * - Registry registers two positions, forwarding the SDK-built payload
 * - Lock mints each claim type once, for all positions together
 * - Stored bitmaps match the SDK's bitmap layout
 * - Redemption sweeps every outstanding claim and unlocks the position
 */
describe('Claim Lock: registration and redemption round trip', () => {
  const ctx = new TestExecutionContext()

  afterEach(() => {
    ctx.reset()
  })

  it('registers, locks and sweeps positions end to end', () => {
    // ========================================
    // SETUP
    // ========================================
    const fixture = new ClaimLockFixture(ctx, Uint64(500))
    const { lock } = fixture
    const tokenA = ctx.any.application()
    const tokenB = ctx.any.application()

    fixture.as(fixture.admin, () => {
      lock.configure(Uint64(0), tokenA.id, Uint64(0), false, false, false)
      lock.configure(Uint64(2), tokenB.id, Uint64(0), false, false, false)
    })

    // ========================================
    // PHASE 1: Registration
    // ========================================
    const payload = buildRegistrationPayload([{ claimTypeId: 0 }, { claimTypeId: 2 }])
    fixture.asAuthority(() =>
      lock.onRegistration(fixture.holder, Uint64(1000), [Uint64(41), Uint64(42)], Bytes(payload.encoded))
    )

    expect(fixture.mints.map((mint) => mint.token)).toEqual([tokenA.id, tokenB.id])
    expect(fixture.mints.map((mint) => mint.amount)).toEqual([op.itob(Uint64(1000)), op.itob(Uint64(1000))])
    expect(lock.outstandingBitmap(Uint64(41))).toEqual(Bytes(encodeBitmap([0, 2])))
    expect(lock.outstandingBitmap(Uint64(42))).toEqual(Bytes(encodeBitmap([0, 2])))
    expect(lock.isUnlocked(fixture.authority.id, Uint64(42))).toBe(false)

    // ========================================
    // PHASE 2: Holder destroys one claim early
    // ========================================
    fixture.as(fixture.holder, () => lock.destroy(Uint64(0), Uint64(41), fixture.holder))
    expect(lock.outstandingBitmap(Uint64(41))).toEqual(Bytes(encodeBitmap([2])))

    // ========================================
    // PHASE 3: Redemption
    // ========================================
    expect(fixture.asAuthority(() => lock.onRedemption(Uint64(42), fixture.holder))).toEqual(Uint64(2))
    expect(fixture.asAuthority(() => lock.onRedemption(Uint64(42), fixture.holder))).toEqual(Uint64(0))

    expect(fixture.burns.map((burn) => burn.token)).toEqual([tokenA.id, tokenA.id, tokenB.id])
    expect(lock.isUnlocked(fixture.authority.id, Uint64(42))).toBe(true)
    expect(lock.isUnlocked(fixture.authority.id, Uint64(41))).toBe(false)
  })
})
