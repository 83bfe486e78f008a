/**
 * Algod access
 *
 * The workflows only need three things from a node: suggested params, a box
 * read and atomic submission. `ChainAccess` is that surface; `createChainAccess`
 * backs it with algod.
 */

import algosdk from 'algosdk'
import type { AlgorandNetworkConfig } from '../config/networks'

export interface AlgorandClients {
  algod: algosdk.Algodv2
}

export function createClients(network: AlgorandNetworkConfig): AlgorandClients {
  return {
    algod: new algosdk.Algodv2(network.algodToken, network.algodServer, network.algodPort ?? ''),
  }
}

export interface ChainAccess {
  suggestedParams(): Promise<algosdk.SuggestedParams>

  /** Box contents, or undefined when the box does not exist */
  readBox(appId: bigint, name: Uint8Array): Promise<Uint8Array | undefined>

  /** Sign and submit as one atomic group; resolves to the first transaction id once confirmed */
  submitGroup(transactions: algosdk.Transaction[], signer: algosdk.Account): Promise<string>
}

function isNotFound(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('response' in error)) return false
  const response = error.response
  return typeof response === 'object' && response !== null && 'status' in response && response.status === 404
}

export async function waitForConfirmation(clients: AlgorandClients, txId: string, maxRounds = 4): Promise<void> {
  await algosdk.waitForConfirmation(clients.algod, txId, maxRounds)
}

export function createChainAccess(clients: AlgorandClients, maxRounds = 4): ChainAccess {
  return {
    async suggestedParams() {
      return clients.algod.getTransactionParams().do()
    },

    async readBox(appId, name) {
      try {
        const box = await clients.algod.getApplicationBoxByName(appId, name).do()
        return box.value
      } catch (error) {
        if (isNotFound(error)) return undefined
        throw error
      }
    },

    async submitGroup(transactions, signer) {
      if (transactions.length === 0) {
        throw new Error('Nothing to submit')
      }
      if (transactions.length > 1) {
        algosdk.assignGroupID(transactions)
      }
      const signed = transactions.map((txn) => txn.signTxn(signer.sk))
      await clients.algod.sendRawTransaction(signed).do()

      const txId = transactions[0].txID()
      await waitForConfirmation(clients, txId, maxRounds)
      return txId
    },
  }
}
