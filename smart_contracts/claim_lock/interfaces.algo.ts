import { Contract, err } from '@algorandfoundation/algorand-typescript'
import type { uint64, Account } from '@algorandfoundation/algorand-typescript'

/**
 * Collaborator ABI surfaces
 *
 * ClaimLock stores app ids and reaches these through inner ABI calls. The
 * bodies never run; only the method signatures matter.
 */

/** Staking registry owning the positions a lock guards */
export class StakingAuthority extends Contract {
  /** Current claim weight of the position */
  stakingTokenBalance(positionId: uint64): uint64 {
    err('stub only')
  }

  /** App id of the lock registered for the position (0 if none) */
  lockManager(positionId: uint64): uint64 {
    err('stub only')
  }

  isApprovedOrOwner(caller: Account, positionId: uint64): boolean {
    err('stub only')
  }
}

/** Per-claim-type derivative supply; only its lock may mint or burn */
export class DerivativeToken extends Contract {
  mint(to: Account, amount: uint64): void {
    err('stub only')
  }

  burn(caller: Account, from: Account, amount: uint64): void {
    err('stub only')
  }
}

/** Receives freshly minted supply and distributes it */
export class HelperModule extends Contract {
  createFor(claimTypeId: uint64, derivativeContract: uint64, positionIds: uint64[], amount: uint64, beneficiary: Account): void {
    err('stub only')
  }
}
