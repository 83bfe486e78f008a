import { Uint64, assert } from '@algorandfoundation/algorand-typescript'
import type { uint64 } from '@algorandfoundation/algorand-typescript'

// Claim type flags, packed into one uint64 per claim type
export const FLAG_HAS_DEFAULT_HELPER: uint64 = Uint64(1)
export const FLAG_FORCE_DEFAULT: uint64 = Uint64(2)
export const FLAG_REVERT_IF_OVERRIDDEN: uint64 = Uint64(4)

/**
 * Pick the helper app that receives newly minted supply; 0 means none.
 *
 * Decision table, evaluated top to bottom:
 * 1. no default helper configured: the override (possibly none)
 * 2. default forced, or no override given: the default, unless the revert
 *    flag is set and a different override was supplied
 * 3. otherwise: the override
 *
 * An override equal to the default never conflicts.
 */
export function resolveHelper(flags: uint64, override: uint64, defaultHelper: uint64): uint64 {
  if ((flags & FLAG_HAS_DEFAULT_HELPER) === Uint64(0)) {
    return override
  }

  if ((flags & FLAG_FORCE_DEFAULT) !== Uint64(0) || override === Uint64(0)) {
    const revert = (flags & FLAG_REVERT_IF_OVERRIDDEN) !== Uint64(0)
    assert(!(revert && override !== Uint64(0) && override !== defaultHelper), 'DefaultHelperConflict')
    return defaultHelper
  }

  return override
}
