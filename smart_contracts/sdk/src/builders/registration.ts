/**
 * Registration Payload Builder
 *
 * Produces the encoded claim instructions a staking registry forwards to the
 * lock's registration hook. Validates off-chain first, so a bad batch is
 * caught before the registry spends a call on it.
 */

import { encodeClaimInstructions } from '../lib/instructions'
import type { ClaimInstruction } from '../lib/instructions'
import { validateAppId, validateClaimTypeId, ValidationError } from '../lib/validate'

export interface RegistrationPayload {
  /** Instructions as validated */
  instructions: ClaimInstruction[]

  /** ARC-4 `(uint8,uint64)[]` bytes */
  encoded: Uint8Array
}

export function buildRegistrationPayload(instructions: readonly ClaimInstruction[]): RegistrationPayload {
  const seen = new Set<number>()
  for (const instruction of instructions) {
    validateClaimTypeId(instruction.claimTypeId)
    if (instruction.helperOverride !== undefined && instruction.helperOverride !== 0n) {
      validateAppId(instruction.helperOverride, 'helperOverride')
    }
    if (seen.has(instruction.claimTypeId)) {
      throw new ValidationError(`Claim type ${instruction.claimTypeId} appears twice in one registration`, 'claimTypeId')
    }
    seen.add(instruction.claimTypeId)
  }

  return {
    instructions: instructions.map((instruction) => ({ ...instruction })),
    encoded: encodeClaimInstructions(instructions),
  }
}
