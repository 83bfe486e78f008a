/**
 * ClaimLock Call Builders
 *
 * Builds unsigned app calls against the lock. Each builder lists the boxes
 * and foreign apps the call touches and, for calls that fan out into inner
 * transactions, pays their fees from the outer transaction.
 */

import algosdk from 'algosdk'
import type { ClaimTypeSetting } from '../types/claims'
import { boxName } from '../lib/constants'
import { validateAccount, validateAppId, validateClaimTypeId, validateClaimTypeSetting, validatePositionId } from '../lib/validate'

export const LOCK_METHODS = {
  configure: algosdk.ABIMethod.fromSignature('configure(uint64,uint64,uint64,bool,bool,bool)void'),
  setAdmin: algosdk.ABIMethod.fromSignature('setAdmin(address)void'),
  create: algosdk.ABIMethod.fromSignature('create(uint64,uint64,address,uint64)void'),
  destroy: algosdk.ABIMethod.fromSignature('destroy(uint64,uint64,address)void'),
} as const

export type LockMethodName = keyof typeof LOCK_METHODS

export interface LockCallParams {
  /** ClaimLock app id */
  lockAppId: bigint

  /** Signing account address */
  sender: string

  suggestedParams: algosdk.SuggestedParams
}

export interface CreateClaimArgs {
  claimTypeId: number
  positionId: bigint
  beneficiary: string
  /** 0n or undefined: no override */
  helperOverride?: bigint
  stakingAuthority: bigint
  derivativeContract: bigint
  /** Helper the lock will resolve to, if any */
  helper?: bigint
}

export interface DestroyClaimArgs {
  claimTypeId: number
  positionId: bigint
  from: string
  stakingAuthority: bigint
  derivativeContract: bigint
}

// isApprovedOrOwner, lockManager, stakingTokenBalance, mint [+ createFor]
const CREATE_INNER_CALLS = 4
// isApprovedOrOwner, stakingTokenBalance, burn
const DESTROY_INNER_CALLS = 3

function encodeArgs(method: algosdk.ABIMethod, values: algosdk.ABIValue[]): Uint8Array[] {
  return [
    method.getSelector(),
    ...method.args.map((arg, index) => {
      if (!(arg.type instanceof algosdk.ABIType)) {
        throw new Error(`${method.name}: argument ${index} is not a value type`)
      }
      return arg.type.encode(values[index])
    }),
  ]
}

/** Outer fee covering itself plus `innerCalls` pooled inner transactions */
function withInnerFees(params: algosdk.SuggestedParams, innerCalls: number): algosdk.SuggestedParams {
  return { ...params, flatFee: true, fee: BigInt(params.minFee) * BigInt(innerCalls + 1) }
}

interface BoxRef {
  appIndex: bigint
  name: Uint8Array
}

function claimTypeBoxes(lockAppId: bigint, claimTypeId: number): BoxRef[] {
  return [
    { appIndex: lockAppId, name: boxName('derivative', claimTypeId) },
    { appIndex: lockAppId, name: boxName('flags', claimTypeId) },
    { appIndex: lockAppId, name: boxName('defaultHelper', claimTypeId) },
  ]
}

/**
 * Admin call: store one claim type's derivative, default helper and flags.
 */
export function buildConfigureTxn(params: LockCallParams, setting: ClaimTypeSetting): algosdk.Transaction {
  validateClaimTypeSetting(setting)

  return algosdk.makeApplicationNoOpTxnFromObject({
    sender: params.sender,
    appIndex: params.lockAppId,
    appArgs: encodeArgs(LOCK_METHODS.configure, [
      setting.claimTypeId,
      setting.derivativeContract,
      setting.defaultHelper ?? 0n,
      setting.hasDefaultHelper,
      setting.forceDefault,
      setting.revertIfDefaultForcedAndOverridden,
    ]),
    boxes: claimTypeBoxes(params.lockAppId, setting.claimTypeId),
    suggestedParams: params.suggestedParams,
  })
}

export function buildSetAdminTxn(params: LockCallParams, newAdmin: string): algosdk.Transaction {
  validateAccount(newAdmin, 'newAdmin')

  return algosdk.makeApplicationNoOpTxnFromObject({
    sender: params.sender,
    appIndex: params.lockAppId,
    appArgs: encodeArgs(LOCK_METHODS.setAdmin, [newAdmin]),
    suggestedParams: params.suggestedParams,
  })
}

/**
 * Holder call: create a claim against a position.
 */
export function buildCreateClaimTxn(params: LockCallParams, args: CreateClaimArgs): algosdk.Transaction {
  validateClaimTypeId(args.claimTypeId)
  validatePositionId(args.positionId)
  validateAccount(args.beneficiary, 'beneficiary')
  validateAppId(args.stakingAuthority, 'stakingAuthority')
  validateAppId(args.derivativeContract, 'derivativeContract')

  const foreignApps = [args.stakingAuthority, args.derivativeContract]
  if (args.helper !== undefined) {
    validateAppId(args.helper, 'helper')
    foreignApps.push(args.helper)
  }

  return algosdk.makeApplicationNoOpTxnFromObject({
    sender: params.sender,
    appIndex: params.lockAppId,
    appArgs: encodeArgs(LOCK_METHODS.create, [
      args.claimTypeId,
      args.positionId,
      args.beneficiary,
      args.helperOverride ?? 0n,
    ]),
    foreignApps,
    boxes: [
      { appIndex: params.lockAppId, name: boxName('outstanding', args.positionId) },
      ...claimTypeBoxes(params.lockAppId, args.claimTypeId),
    ],
    suggestedParams: withInnerFees(params.suggestedParams, CREATE_INNER_CALLS + (args.helper === undefined ? 0 : 1)),
  })
}

/**
 * Holder call: destroy an outstanding claim, burning from `from`.
 */
export function buildDestroyClaimTxn(params: LockCallParams, args: DestroyClaimArgs): algosdk.Transaction {
  validateClaimTypeId(args.claimTypeId)
  validatePositionId(args.positionId)
  validateAccount(args.from, 'from')
  validateAppId(args.stakingAuthority, 'stakingAuthority')
  validateAppId(args.derivativeContract, 'derivativeContract')

  return algosdk.makeApplicationNoOpTxnFromObject({
    sender: params.sender,
    appIndex: params.lockAppId,
    appArgs: encodeArgs(LOCK_METHODS.destroy, [args.claimTypeId, args.positionId, args.from]),
    foreignApps: [args.stakingAuthority, args.derivativeContract],
    boxes: [
      { appIndex: params.lockAppId, name: boxName('outstanding', args.positionId) },
      { appIndex: params.lockAppId, name: boxName('derivative', args.claimTypeId) },
    ],
    suggestedParams: withInnerFees(params.suggestedParams, DESTROY_INNER_CALLS),
  })
}

/**
 * Decode the method and arguments of a lock call built above.
 */
export function decodeLockCall(txn: algosdk.Transaction): { method: LockMethodName; args: algosdk.ABIValue[] } {
  const appArgs = txn.applicationCall?.appArgs ?? []
  const [selector, ...encoded] = appArgs
  for (const [name, method] of Object.entries(LOCK_METHODS)) {
    if (selector === undefined || !Buffer.from(method.getSelector()).equals(Buffer.from(selector))) continue
    if (!isLockMethodName(name)) continue
    const args = method.args.map((arg, index) => {
      if (!(arg.type instanceof algosdk.ABIType)) {
        throw new Error(`${method.name}: argument ${index} is not a value type`)
      }
      return arg.type.decode(encoded[index])
    })
    return { method: name, args }
  }
  throw new Error('Not a ClaimLock call')
}

function isLockMethodName(name: string): name is LockMethodName {
  return name in LOCK_METHODS
}
