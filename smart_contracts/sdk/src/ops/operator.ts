/**
 * Claim Lock Operator API
 *
 * **Admin-only workflows**
 *
 * - Apply claim type settings (derivative token, default helper, flags)
 * - Hand the admin role to another account
 *
 * Every call is signed by the configured admin.
 */

import type { Account, Transaction } from 'algosdk'
import type { ClaimLockProjectConfig } from '../config/project'
import type { ClaimTypeSetting, ClaimTypeState } from '../types/claims'
import type { ChainAccess } from '../lib/algod'
import { readClaimType } from '../lib/lock-state'
import { validateAccount, validateClaimTypeSetting, validateProjectConfig, ValidationError } from '../lib/validate'
import { buildConfigureTxn, buildSetAdminTxn } from '../builders/lock-calls'

/** Largest atomic group algod accepts */
export const MAX_GROUP_SIZE = 16

/**
 * Outcome of applying a set of claim type settings
 */
export interface ApplyClaimTypesResult {
  /** Claim-type ids configured, in order */
  configured: number[]

  /** Subset that replaced an existing configuration */
  overwritten: number[]

  /** First transaction of the submitted group */
  txId: string
}

/**
 * Claim Lock Operator - Admin workflows
 */
export class ClaimLockOperator {
  constructor(
    private readonly config: ClaimLockProjectConfig,
    private readonly chain: ChainAccess
  ) {
    validateProjectConfig(config)
  }

  private requireAdmin(admin: Account): string {
    const address = admin.addr.toString()
    if (address !== this.config.admin) {
      throw new ValidationError(`Signer ${address} is not the configured admin ${this.config.admin}`, 'admin')
    }
    return address
  }

  claimType(claimTypeId: number): Promise<ClaimTypeState | undefined> {
    return readClaimType(this.chain, this.config.lockAppId, claimTypeId)
  }

  /**
   * Configure each setting on the lock in one atomic group: if one is
   * rejected, none of the batch is applied.
   */
  async applyClaimTypes(
    admin: Account,
    settings: readonly ClaimTypeSetting[] = this.config.claimTypes
  ): Promise<ApplyClaimTypesResult> {
    const sender = this.requireAdmin(admin)
    settings.forEach(validateClaimTypeSetting)
    if (settings.length === 0) {
      throw new ValidationError('No claim type settings to apply', 'claimTypes')
    }
    if (settings.length > MAX_GROUP_SIZE) {
      throw new ValidationError(
        `At most ${MAX_GROUP_SIZE} claim types fit one atomic group, got ${settings.length}`,
        'claimTypes'
      )
    }

    console.log(`=== Configuring claim types on lock ${this.config.lockAppId} (${this.config.projectId}) ===`)

    const result: ApplyClaimTypesResult = { configured: [], overwritten: [], txId: '' }
    const suggestedParams = await this.chain.suggestedParams()
    const transactions: Transaction[] = []

    for (const setting of settings) {
      const existing = await this.claimType(setting.claimTypeId)
      transactions.push(
        buildConfigureTxn({ lockAppId: this.config.lockAppId, sender, suggestedParams }, setting)
      )

      result.configured.push(setting.claimTypeId)
      if (existing !== undefined) {
        result.overwritten.push(setting.claimTypeId)
        console.log(`⚠️  Claim type ${setting.claimTypeId} reconfigured (was ${existing.derivativeContract})`)
      } else {
        console.log(`Claim type ${setting.claimTypeId} configured -> ${setting.derivativeContract}`)
      }
    }

    try {
      result.txId = await this.chain.submitGroup(transactions, admin)
    } catch (error) {
      console.error(`Claim type configuration aborted, nothing applied: ${String(error)}`)
      throw error
    }

    console.log(`✅ ${transactions.length} claim type(s) applied in ${result.txId}`)
    return result
  }

  /**
   * Hand the admin role to `newAdmin`; the current admin signs.
   */
  async transferAdmin(admin: Account, newAdmin: string): Promise<string> {
    const sender = this.requireAdmin(admin)
    validateAccount(newAdmin, 'newAdmin')

    const suggestedParams = await this.chain.suggestedParams()
    const txn = buildSetAdminTxn({ lockAppId: this.config.lockAppId, sender, suggestedParams }, newAdmin)
    const txId = await this.chain.submitGroup([txn], admin)

    console.log(`✅ Admin handed to ${newAdmin} in ${txId}`)
    return txId
  }
}
