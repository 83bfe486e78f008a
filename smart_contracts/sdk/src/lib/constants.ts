/**
 * Values shared with the on-chain ClaimLock layout
 */

import algosdk from 'algosdk'

export const MAX_UINT64 = (1n << 64n) - 1n

export const ZERO_ADDRESS = algosdk.encodeAddress(new Uint8Array(32))

/** Claim-type ids are uint8; one bitmap bit each */
export const CLAIM_TYPE_COUNT = 256
export const BITMAP_BYTES = CLAIM_TYPE_COUNT / 8

// Packed into the cfg_flags box of each claim type
export const FLAG_HAS_DEFAULT_HELPER = 1n
export const FLAG_FORCE_DEFAULT = 2n
export const FLAG_REVERT_IF_OVERRIDDEN = 4n

/** Box key prefixes; keys are the prefix followed by the uint64 id */
export const BOX_PREFIX = {
  outstanding: 'out:',
  derivative: 'cfg_drv:',
  flags: 'cfg_flags:',
  defaultHelper: 'cfg_helper:',
} as const

export type BoxKind = keyof typeof BOX_PREFIX

export function boxName(kind: BoxKind, id: bigint | number): Uint8Array {
  const prefix = new TextEncoder().encode(BOX_PREFIX[kind])
  const name = new Uint8Array(prefix.length + 8)
  name.set(prefix)
  name.set(algosdk.encodeUint64(id), prefix.length)
  return name
}
