/**
 * Claim Lock Project Configuration
 *
 * Deployment-specific values: which lock app to drive, who administers it,
 * which staking registry app drives its hooks, and the claim types to
 * configure.
 *
 * Environment:
 *   CLAIM_LOCK_PROJECT_ID         project label for logs (default: claim-lock-localnet)
 *   CLAIM_LOCK_NETWORK            localnet | testnet | mainnet (default: localnet)
 *   CLAIM_LOCK_APP_ID             ClaimLock app id (required)
 *   CLAIM_LOCK_ADMIN              admin address (required)
 *   CLAIM_LOCK_STAKING_AUTHORITY  staking registry app id (required)
 *   CLAIM_LOCK_CLAIM_TYPES_FILE   JSON file with claim type settings (optional)
 */

import fs from 'fs'
import path from 'path'
import type { ClaimTypeSetting } from '../types/claims'
import { validateProjectConfig, ValidationError } from '../lib/validate'
import { isNetworkType } from './networks'
import type { NetworkType } from './networks'

export interface ClaimLockProjectConfig {
  /** Project identifier (for outputs and logging) */
  projectId: string

  network: NetworkType

  /** ClaimLock app id */
  lockAppId: bigint

  /** Account allowed to configure claim types */
  admin: string

  /** Staking registry app id */
  stakingAuthority: bigint

  /** Claim types the operator applies */
  claimTypes: ClaimTypeSetting[]
}

export const DEFAULT_PROJECT_ID = 'claim-lock-localnet'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** App ids come as JSON numbers or, above 2^53, as decimal strings */
export function parseAppId(value: unknown, field: string): bigint {
  if (typeof value === 'number' && Number.isSafeInteger(value)) {
    return BigInt(value)
  }
  if (typeof value === 'string' && /^[0-9]+$/.test(value)) {
    return BigInt(value)
  }
  throw new ValidationError(`${field} must be an app id, got ${String(value)}`, field)
}

function readFlag(entry: Record<string, unknown>, key: string, index: number): boolean {
  const value = entry[key]
  if (value === undefined) return false
  if (typeof value !== 'boolean') {
    throw new ValidationError(`claimTypes[${index}].${key} must be a boolean`, key)
  }
  return value
}

/**
 * Parse a settings document: either an array of settings or
 * `{ "claimTypes": [...] }`. Missing flags default to false.
 */
export function parseClaimTypeSettings(document: unknown): ClaimTypeSetting[] {
  const list = isRecord(document) ? document.claimTypes : document
  if (!Array.isArray(list)) {
    throw new ValidationError('Claim type settings must be an array', 'claimTypes')
  }

  return list.map((entry: unknown, index: number): ClaimTypeSetting => {
    if (!isRecord(entry)) {
      throw new ValidationError(`claimTypes[${index}] must be an object`, 'claimTypes')
    }
    const claimTypeId = entry.claimTypeId
    if (typeof claimTypeId !== 'number') {
      throw new ValidationError(`claimTypes[${index}].claimTypeId must be a number`, 'claimTypeId')
    }
    if (entry.derivativeContract === undefined) {
      throw new ValidationError(`claimTypes[${index}].derivativeContract is required`, 'derivativeContract')
    }

    const setting: ClaimTypeSetting = {
      claimTypeId,
      derivativeContract: parseAppId(entry.derivativeContract, `claimTypes[${index}].derivativeContract`),
      hasDefaultHelper: readFlag(entry, 'hasDefaultHelper', index),
      forceDefault: readFlag(entry, 'forceDefault', index),
      revertIfDefaultForcedAndOverridden: readFlag(entry, 'revertIfDefaultForcedAndOverridden', index),
    }
    if (entry.defaultHelper !== undefined) {
      setting.defaultHelper = parseAppId(entry.defaultHelper, `claimTypes[${index}].defaultHelper`)
    }
    return setting
  })
}

export function loadClaimTypeSettings(file: string): ClaimTypeSetting[] {
  const resolved = path.resolve(file)
  if (!fs.existsSync(resolved)) {
    throw new ValidationError(`Claim type settings file not found: ${resolved}`, 'CLAIM_LOCK_CLAIM_TYPES_FILE')
  }
  const document: unknown = JSON.parse(fs.readFileSync(resolved, 'utf-8'))
  return parseClaimTypeSettings(document)
}

function required(env: NodeJS.ProcessEnv, name: string, field: string): string {
  const value = env[name]
  if (!value) {
    throw new ValidationError(`${name} environment variable not set`, field)
  }
  return value
}

/**
 * Build and validate the project configuration from the environment.
 */
export function loadProjectConfig(env: NodeJS.ProcessEnv = process.env): ClaimLockProjectConfig {
  const network = env.CLAIM_LOCK_NETWORK || 'localnet'
  if (!isNetworkType(network)) {
    throw new ValidationError(`Unknown network type: ${network}`, 'network')
  }

  const settingsFile = env.CLAIM_LOCK_CLAIM_TYPES_FILE
  const config: ClaimLockProjectConfig = {
    projectId: env.CLAIM_LOCK_PROJECT_ID || DEFAULT_PROJECT_ID,
    network,
    lockAppId: parseAppId(required(env, 'CLAIM_LOCK_APP_ID', 'lockAppId'), 'lockAppId'),
    admin: required(env, 'CLAIM_LOCK_ADMIN', 'admin'),
    stakingAuthority: parseAppId(required(env, 'CLAIM_LOCK_STAKING_AUTHORITY', 'stakingAuthority'), 'stakingAuthority'),
    claimTypes: settingsFile ? loadClaimTypeSettings(settingsFile) : [],
  }

  validateProjectConfig(config)
  return config
}
