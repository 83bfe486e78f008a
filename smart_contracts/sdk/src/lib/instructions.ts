import algosdk from 'algosdk'
import { ValidationError } from './validate'

/**
 * One claim to create for every position of a registration
 */
export interface ClaimInstruction {
  claimTypeId: number
  /** Helper app requested by the caller; resolution may ignore or reject it */
  helperOverride?: bigint
}

// ARC-4: uint16 count, then (uint8,uint64) tuples of 9 bytes. 0 = no override
const INSTRUCTIONS_TYPE = algosdk.ABIType.from('(uint8,uint64)[]')
const LENGTH_PREFIX_BYTES = 2
const TUPLE_BYTES = 9

export function encodeClaimInstructions(instructions: readonly ClaimInstruction[]): Uint8Array {
  return INSTRUCTIONS_TYPE.encode(
    instructions.map((instruction) => [instruction.claimTypeId, instruction.helperOverride ?? 0n])
  )
}

function invalid(reason: string): ValidationError {
  return new ValidationError(`Invalid claim instructions: ${reason}`, 'instructions')
}

/**
 * Parse instruction bytes with the same length rule the lock applies.
 */
export function decodeClaimInstructions(encoded: Uint8Array): ClaimInstruction[] {
  if (encoded.length < LENGTH_PREFIX_BYTES) {
    throw invalid('missing length prefix')
  }
  const count = (encoded[0] << 8) | encoded[1]
  const expected = LENGTH_PREFIX_BYTES + count * TUPLE_BYTES
  if (encoded.length !== expected) {
    throw invalid(`expected ${count} instructions in ${expected} bytes, got ${encoded.length}`)
  }

  const decoded = INSTRUCTIONS_TYPE.decode(encoded)
  if (!Array.isArray(decoded)) {
    throw invalid('not an array')
  }

  return decoded.map((entry: algosdk.ABIValue) => {
    if (!Array.isArray(entry) || entry.length !== 2) {
      throw invalid('malformed tuple')
    }
    const [id, override] = entry
    if ((typeof id !== 'bigint' && typeof id !== 'number') || (typeof override !== 'bigint' && typeof override !== 'number')) {
      throw invalid('malformed tuple')
    }
    const helperOverride = BigInt(override)
    return helperOverride === 0n ? { claimTypeId: Number(id) } : { claimTypeId: Number(id), helperOverride }
  })
}
