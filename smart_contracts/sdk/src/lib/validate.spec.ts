import algosdk from 'algosdk'
import { describe, expect, it } from 'vitest'
import type { ClaimTypeSetting } from '../types/claims'
import { ZERO_ADDRESS } from './constants'
import {
  validateAccount,
  validateAddress,
  validateAppId,
  validateClaimTypeId,
  validateClaimTypeSetting,
  validatePositionId,
  validateProjectConfig,
  ValidationError,
} from './validate'

const admin = algosdk.encodeAddress(new Uint8Array(32).fill(7))

function setting(overrides: Partial<ClaimTypeSetting> = {}): ClaimTypeSetting {
  return {
    claimTypeId: 0,
    derivativeContract: 1001n,
    hasDefaultHelper: false,
    forceDefault: false,
    revertIfDefaultForcedAndOverridden: false,
    ...overrides,
  }
}

describe('SDK validation', () => {
  it('names the offending field', () => {
    try {
      validateAddress('not-an-address', 'beneficiary')
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError)
      if (error instanceof ValidationError) {
        expect(error.field).toBe('beneficiary')
        expect(error.message).toBe('Invalid beneficiary: not-an-address')
      }
    }
  })

  it('accepts the zero address as an address but not as an account', () => {
    expect(() => validateAddress(ZERO_ADDRESS)).not.toThrow()
    expect(() => validateAccount(ZERO_ADDRESS, 'admin')).toThrow('admin must not be the zero address')
  })

  it('bounds app ids to non-zero uint64', () => {
    expect(() => validateAppId(1n)).not.toThrow()
    expect(() => validateAppId((1n << 64n) - 1n)).not.toThrow()
    expect(() => validateAppId(0n, 'lockAppId')).toThrow('lockAppId must be an app id in 1..2^64-1, got 0')
    expect(() => validateAppId(1n << 64n)).toThrow(ValidationError)
  })

  it('bounds claim type and position ids', () => {
    expect(() => validateClaimTypeId(0)).not.toThrow()
    expect(() => validateClaimTypeId(255)).not.toThrow()
    expect(() => validateClaimTypeId(256)).toThrow('Claim type id must be an integer in 0..255, got 256')
    expect(() => validateClaimTypeId(1.5)).toThrow(ValidationError)
    expect(() => validatePositionId(0n)).not.toThrow()
    expect(() => validatePositionId((1n << 64n) - 1n)).not.toThrow()
    expect(() => validatePositionId(1n << 64n)).toThrow('Position id out of uint64 range: 18446744073709551616')
  })

  it('requires a default helper when hasDefaultHelper is set', () => {
    expect(() => validateClaimTypeSetting(setting({ claimTypeId: 7, hasDefaultHelper: true }))).toThrow(
      'Claim type 7 has hasDefaultHelper set but no defaultHelper'
    )
    expect(() => validateClaimTypeSetting(setting({ hasDefaultHelper: true, defaultHelper: 1003n }))).not.toThrow()
    expect(() => validateClaimTypeSetting(setting({ claimTypeId: 3, derivativeContract: 0n }))).toThrow(
      'claimTypes[3].derivativeContract must be an app id in 1..2^64-1, got 0'
    )
  })

  it('rejects a claim type configured twice in one project', () => {
    expect(() =>
      validateProjectConfig({
        projectId: 'test',
        network: 'localnet',
        lockAppId: 5000n,
        admin,
        stakingAuthority: 4000n,
        claimTypes: [setting({ claimTypeId: 2 }), setting({ claimTypeId: 2 })],
      })
    ).toThrow('Claim type 2 is configured twice')
  })
})
