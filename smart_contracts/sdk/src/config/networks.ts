/**
 * Algorand Network Configuration
 *
 * Algod endpoints for localnet, testnet and mainnet. CLAIM_LOCK_ALGOD_SERVER,
 * CLAIM_LOCK_ALGOD_TOKEN and CLAIM_LOCK_ALGOD_PORT override the preset.
 */

import { ValidationError } from '../lib/validate'

export type NetworkType = 'localnet' | 'testnet' | 'mainnet'

export interface AlgorandNetworkConfig {
  network: NetworkType

  /** Algod API endpoint */
  algodServer: string

  /** Algod API token */
  algodToken: string

  /** Algod API port (optional) */
  algodPort?: number
}

export const LOCALNET: AlgorandNetworkConfig = {
  network: 'localnet',
  algodServer: 'http://localhost',
  algodToken: 'a'.repeat(64), // AlgoKit default token
  algodPort: 4001,
}

export const TESTNET: AlgorandNetworkConfig = {
  network: 'testnet',
  algodServer: 'https://testnet-api.algonode.cloud',
  algodToken: '',
}

export const MAINNET: AlgorandNetworkConfig = {
  network: 'mainnet',
  algodServer: 'https://mainnet-api.algonode.cloud',
  algodToken: '',
}

const PRESETS: Record<NetworkType, AlgorandNetworkConfig> = {
  localnet: LOCALNET,
  testnet: TESTNET,
  mainnet: MAINNET,
}

export function isNetworkType(value: string): value is NetworkType {
  return value === 'localnet' || value === 'testnet' || value === 'mainnet'
}

/**
 * Preset for `network` with any algod overrides from the environment applied
 */
export function getNetworkConfig(network: string, env: NodeJS.ProcessEnv = process.env): AlgorandNetworkConfig {
  if (!isNetworkType(network)) {
    throw new ValidationError(`Unknown network type: ${network}`, 'network')
  }

  const config: AlgorandNetworkConfig = { ...PRESETS[network] }
  if (env.CLAIM_LOCK_ALGOD_SERVER) config.algodServer = env.CLAIM_LOCK_ALGOD_SERVER
  if (env.CLAIM_LOCK_ALGOD_TOKEN !== undefined) config.algodToken = env.CLAIM_LOCK_ALGOD_TOKEN
  if (env.CLAIM_LOCK_ALGOD_PORT) {
    const port = Number(env.CLAIM_LOCK_ALGOD_PORT)
    if (!Number.isInteger(port) || port <= 0) {
      throw new ValidationError(`Invalid CLAIM_LOCK_ALGOD_PORT: ${env.CLAIM_LOCK_ALGOD_PORT}`, 'algodPort')
    }
    config.algodPort = port
  }
  return config
}
