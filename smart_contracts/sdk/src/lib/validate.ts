/**
 * Input validation for SDK calls
 *
 * Catches bad input before it reaches the lock, with messages aimed at the
 * operator rather than contract error codes.
 */

import algosdk from 'algosdk'
import type { ClaimTypeSetting } from '../types/claims'
import type { ClaimLockProjectConfig } from '../config/project'
import { CLAIM_TYPE_COUNT, MAX_UINT64, ZERO_ADDRESS } from './constants'

export class ValidationError extends Error {
  constructor(
    message: string,
    readonly field?: string
  ) {
    super(message)
    this.name = 'ValidationError'
  }
}

export function validateAddress(address: string, field = 'address'): void {
  if (!algosdk.isValidAddress(address)) {
    throw new ValidationError(`Invalid ${field}: ${address}`, field)
  }
}

/** Valid and not the zero address */
export function validateAccount(address: string, field = 'address'): void {
  validateAddress(address, field)
  if (address === ZERO_ADDRESS) {
    throw new ValidationError(`${field} must not be the zero address`, field)
  }
}

export function validateAppId(appId: bigint, field = 'appId'): void {
  if (appId <= 0n || appId > MAX_UINT64) {
    throw new ValidationError(`${field} must be an app id in 1..2^64-1, got ${appId}`, field)
  }
}

export function validateClaimTypeId(claimTypeId: number): void {
  if (!Number.isInteger(claimTypeId) || claimTypeId < 0 || claimTypeId >= CLAIM_TYPE_COUNT) {
    throw new ValidationError(`Claim type id must be an integer in 0..255, got ${claimTypeId}`, 'claimTypeId')
  }
}

export function validatePositionId(positionId: bigint): void {
  if (positionId < 0n || positionId > MAX_UINT64) {
    throw new ValidationError(`Position id out of uint64 range: ${positionId}`, 'positionId')
  }
}

export function validateClaimTypeSetting(setting: ClaimTypeSetting): void {
  validateClaimTypeId(setting.claimTypeId)
  validateAppId(setting.derivativeContract, `claimTypes[${setting.claimTypeId}].derivativeContract`)

  if (setting.defaultHelper !== undefined) {
    validateAppId(setting.defaultHelper, `claimTypes[${setting.claimTypeId}].defaultHelper`)
  }

  // The lock accepts this and sends supply straight to the beneficiary
  if (setting.hasDefaultHelper && setting.defaultHelper === undefined) {
    throw new ValidationError(
      `Claim type ${setting.claimTypeId} has hasDefaultHelper set but no defaultHelper`,
      'defaultHelper'
    )
  }
}

export function validateProjectConfig(config: ClaimLockProjectConfig): void {
  if (!config.projectId) {
    throw new ValidationError('projectId is required', 'projectId')
  }
  validateAppId(config.lockAppId, 'lockAppId')
  validateAccount(config.admin, 'admin')
  validateAppId(config.stakingAuthority, 'stakingAuthority')

  const seen = new Set<number>()
  for (const setting of config.claimTypes) {
    validateClaimTypeSetting(setting)
    if (seen.has(setting.claimTypeId)) {
      throw new ValidationError(`Claim type ${setting.claimTypeId} is configured twice`, 'claimTypes')
    }
    seen.add(setting.claimTypeId)
  }
}
