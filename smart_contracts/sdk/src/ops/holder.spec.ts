import algosdk from 'algosdk'
import { describe, expect, it } from 'vitest'
import { FakeChain } from '../../../testing/fake-chain'
import type { ClaimLockProjectConfig } from '../config/project'
import type { ClaimTypeState } from '../types/claims'
import { decodeLockCall } from '../builders/lock-calls'
import { encodeBitmap } from '../lib/bitmap'
import { boxName } from '../lib/constants'
import { ValidationError } from '../lib/validate'
import { ClaimLockHolder, resolveHelperApp } from './holder'

const LOCK = 5000n

function setup() {
  const owner = algosdk.generateAccount()
  const chain = new FakeChain()
  const config: ClaimLockProjectConfig = {
    projectId: 'test-project',
    network: 'localnet',
    lockAppId: LOCK,
    admin: owner.addr.toString(),
    stakingAuthority: 4000n,
    claimTypes: [],
  }
  chain.setBox(LOCK, boxName('derivative', 6), algosdk.encodeUint64(1001))
  chain.setBox(LOCK, boxName('derivative', 7), algosdk.encodeUint64(1002))
  chain.setBox(LOCK, boxName('flags', 7), algosdk.encodeUint64(1))
  chain.setBox(LOCK, boxName('defaultHelper', 7), algosdk.encodeUint64(1003))
  return { owner, chain, holder: new ClaimLockHolder(config, chain, owner) }
}

function state(flags: bigint): ClaimTypeState {
  return { claimTypeId: 1, derivativeContract: 1001n, defaultHelper: 1003n, flags }
}

describe('resolveHelperApp', () => {
  it('follows the on-chain decision table', () => {
    expect(resolveHelperApp(state(0n), 0n)).toBe(0n)
    expect(resolveHelperApp(state(0n), 2002n)).toBe(2002n)
    expect(resolveHelperApp(state(1n), 0n)).toBe(1003n)
    expect(resolveHelperApp(state(1n), 2002n)).toBe(2002n)
    expect(resolveHelperApp(state(3n), 2002n)).toBe(1003n)
    expect(resolveHelperApp(state(7n), 1003n)).toBe(1003n)
    expect(() => resolveHelperApp(state(7n), 2002n)).toThrow(
      'Claim type 1 forces helper 1003; override 2002 would be rejected'
    )
  })
})

describe('ClaimLockHolder', () => {
  it('creates a claim for itself', async () => {
    const { owner, chain, holder } = setup()

    const result = await holder.createClaim(6, 77n)

    const txn = chain.submitted[0]?.transactions[0]
    expect(result).toEqual({ txId: txn?.txID() })
    expect(txn === undefined ? undefined : decodeLockCall(txn)).toEqual({
      method: 'create',
      args: [6n, 77n, owner.addr.toString(), 0n],
    })
    expect(txn?.applicationCall?.foreignApps).toEqual([4000n, 1001n])
  })

  it('references the default helper the lock will resolve', async () => {
    const { chain, holder } = setup()
    const friend = algosdk.generateAccount().addr.toString()

    const result = await holder.createClaim(7, 77n, { beneficiary: friend })

    expect(result.helper).toBe(1003n)
    expect(chain.submitted[0]?.transactions[0]?.applicationCall?.foreignApps).toEqual([4000n, 1002n, 1003n])
  })

  it('refuses unconfigured and already outstanding claim types', async () => {
    const { chain, holder } = setup()
    chain.setBox(LOCK, boxName('outstanding', 77n), encodeBitmap([6]))

    await expect(holder.createClaim(9, 77n)).rejects.toThrow('Claim type 9 is not configured on lock 5000')
    await expect(holder.createClaim(6, 77n)).rejects.toThrow('Claim type 6 is already outstanding on position 77')
    expect(chain.submitted).toEqual([])
  })

  it('destroys an outstanding claim', async () => {
    const { owner, chain, holder } = setup()
    chain.setBox(LOCK, boxName('outstanding', 77n), encodeBitmap([6]))

    await holder.destroyClaim(6, 77n)

    const txn = chain.submitted[0]?.transactions[0]
    expect(txn === undefined ? undefined : decodeLockCall(txn)).toEqual({
      method: 'destroy',
      args: [6n, 77n, owner.addr.toString()],
    })
    await expect(holder.destroyClaim(7, 77n)).rejects.toThrow('Claim type 7 is not outstanding on position 77')
  })

  it('reports lock status from the bitmap box', async () => {
    const { chain, holder } = setup()
    chain.setBox(LOCK, boxName('outstanding', 77n), encodeBitmap([6, 7]))

    expect(await holder.lockStatus(77n)).toEqual({ positionId: 77n, unlocked: false, outstanding: [6, 7] })
    expect(await holder.lockStatus(78n)).toEqual({ positionId: 78n, unlocked: true, outstanding: [] })
  })

  it('validates before reading the chain', async () => {
    const { chain, holder } = setup()

    await expect(holder.createClaim(256, 77n)).rejects.toThrow(ValidationError)
    await expect(holder.destroyClaim(6, -1n)).rejects.toThrow(ValidationError)
    expect(chain.submitted).toEqual([])
  })
})
