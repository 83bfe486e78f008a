/**
 * Reads of the lock's boxes
 */

import algosdk from 'algosdk'
import type { ClaimTypeState } from '../types/claims'
import type { ChainAccess } from './algod'
import { boxName } from './constants'

function uint64Box(value: Uint8Array | undefined): bigint {
  return value === undefined ? 0n : algosdk.decodeUint64(value, 'bigint')
}

/** Stored configuration, or undefined while the claim type is unconfigured */
export async function readClaimType(
  chain: ChainAccess,
  lockAppId: bigint,
  claimTypeId: number
): Promise<ClaimTypeState | undefined> {
  const derivative = await chain.readBox(lockAppId, boxName('derivative', claimTypeId))
  if (derivative === undefined) return undefined

  const [flags, defaultHelper] = await Promise.all([
    chain.readBox(lockAppId, boxName('flags', claimTypeId)),
    chain.readBox(lockAppId, boxName('defaultHelper', claimTypeId)),
  ])
  return {
    claimTypeId,
    derivativeContract: uint64Box(derivative),
    defaultHelper: uint64Box(defaultHelper),
    flags: uint64Box(flags),
  }
}

/** Raw outstanding bitmap of a position; undefined means none outstanding */
export async function readOutstanding(chain: ChainAccess, lockAppId: bigint, positionId: bigint): Promise<Uint8Array | undefined> {
  return chain.readBox(lockAppId, boxName('outstanding', positionId))
}
