// Demo script (non-submitting) to build transactions for the claim lock flow:
// 1) configure (admin sets up two claim types)
// 2) registration payload (what the staking registry forwards on register)
// 3) create / destroy (holder claims against a position)
//
// Nothing is signed or sent; each call is decoded and printed so the app
// args, foreign apps, boxes and fees can be inspected before submitting.

import algosdk from 'algosdk'
import {
  buildConfigureTxn,
  buildCreateClaimTxn,
  buildDestroyClaimTxn,
  buildRegistrationPayload,
  decodeLockCall,
  parseAppId,
} from '../smart_contracts/sdk/src/index'
import type { LockCallParams } from '../smart_contracts/sdk/src/index'

function describeTxn(label: string, txn: algosdk.Transaction): void {
  const call = decodeLockCall(txn)
  console.log(`\n=== ${label} ===`)
  console.dir(
    {
      method: call.method,
      args: call.args.map((arg) => String(arg)),
      foreignApps: (txn.applicationCall?.foreignApps ?? []).map(String),
      boxes: (txn.applicationCall?.boxes ?? []).map((box) => Buffer.from(box.name).toString('hex')),
      fee: txn.fee.toString(),
    },
    { depth: null }
  )
}

async function main() {
  console.log('Demo: build configure -> register -> create -> destroy calls')

  // Read configuration from environment variables to avoid editing the file.
  const appIdEnv = process.env.CLAIM_LOCK_APP_ID
  if (!appIdEnv) {
    console.error('Missing CLAIM_LOCK_APP_ID environment variable. Set it before running the demo.')
    process.exit(1)
  }
  const sender = process.env.SENDER
  if (!sender || !algosdk.isValidAddress(sender)) {
    console.error('Missing or invalid SENDER environment variable. Set SENDER to the sender address.')
    process.exit(1)
  }

  // Placeholder app ids for the collaborators
  const stakingAuthority = 4000n
  const plainToken = 1001n
  const routedToken = 1002n
  const helper = 1003n
  const positionId = 77n

  const params: LockCallParams = {
    lockAppId: parseAppId(appIdEnv, 'CLAIM_LOCK_APP_ID'),
    sender,
    suggestedParams: {
      flatFee: false,
      fee: 0n,
      minFee: 1000n,
      firstValid: 1n,
      lastValid: 1001n,
      genesisID: 'demo-v1',
      genesisHash: new Uint8Array(32),
    },
  }

  // 1) Configure claim types
  describeTxn(
    'configure claim type 0',
    buildConfigureTxn(params, {
      claimTypeId: 0,
      derivativeContract: plainToken,
      hasDefaultHelper: false,
      forceDefault: false,
      revertIfDefaultForcedAndOverridden: false,
    })
  )
  describeTxn(
    'configure claim type 1',
    buildConfigureTxn(params, {
      claimTypeId: 1,
      derivativeContract: routedToken,
      defaultHelper: helper,
      hasDefaultHelper: true,
      forceDefault: true,
      revertIfDefaultForcedAndOverridden: false,
    })
  )

  // 2) Registration payload
  const payload = buildRegistrationPayload([{ claimTypeId: 0 }, { claimTypeId: 1 }])
  console.log(`\n=== registration payload ===\n${Buffer.from(payload.encoded).toString('hex')}`)

  // 3) Create and destroy
  describeTxn(
    'create claim type 1',
    buildCreateClaimTxn(params, {
      claimTypeId: 1,
      positionId,
      beneficiary: sender,
      stakingAuthority,
      derivativeContract: routedToken,
      helper,
    })
  )
  describeTxn(
    'destroy claim type 1',
    buildDestroyClaimTxn(params, {
      claimTypeId: 1,
      positionId,
      from: sender,
      stakingAuthority,
      derivativeContract: routedToken,
    })
  )
}

main().catch((e) => {
  console.error(e)
  process.exit(1)
})
