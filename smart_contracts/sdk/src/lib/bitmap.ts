/**
 * Outstanding-claim bitmap as stored in a position's `out:` box
 *
 * 32 bytes; claim type i is bit i counting from the most significant bit of
 * the first byte. A missing box is the empty bitmap.
 */

import { BITMAP_BYTES, CLAIM_TYPE_COUNT } from './constants'

function mask(claimTypeId: number): number {
  return 0x80 >> claimTypeId % 8
}

export function isOutstanding(bitmap: Uint8Array | undefined, claimTypeId: number): boolean {
  if (bitmap === undefined) return false
  return (bitmap[Math.floor(claimTypeId / 8)] & mask(claimTypeId)) !== 0
}

/** Set ids, ascending */
export function decodeBitmap(bitmap: Uint8Array | undefined): number[] {
  const ids: number[] = []
  for (let id = 0; id < CLAIM_TYPE_COUNT; id++) {
    if (isOutstanding(bitmap, id)) ids.push(id)
  }
  return ids
}

export function encodeBitmap(claimTypeIds: Iterable<number>): Uint8Array {
  const bitmap = new Uint8Array(BITMAP_BYTES)
  for (const id of claimTypeIds) {
    bitmap[Math.floor(id / 8)] |= mask(id)
  }
  return bitmap
}
