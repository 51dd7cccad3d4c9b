/**
 * RPC Block Source
 *
 * Chain height from a JSON-RPC node through ethers.
 */

import { JsonRpcProvider } from 'ethers';
import { DataSourceError, ErrorCode, type BlockSource } from '@mev-sentinel/types';
import { getErrorMessage, toError } from '@mev-sentinel/core';

/**
 * Subset of ethers' Provider used here.
 */
export interface BlockNumberProvider {
  getBlockNumber(): Promise<number>;
}

export class RpcBlockSource implements BlockSource {
  constructor(private readonly provider: BlockNumberProvider) {}

  async currentBlock(): Promise<number> {
    try {
      return await this.provider.getBlockNumber();
    } catch (error) {
      throw new DataSourceError(`RPC block number request failed: ${getErrorMessage(error)}`, 'rpc', {
        code: ErrorCode.BLOCK_SOURCE_FAILED,
        cause: toError(error)
      });
    }
  }
}

/**
 * Build a block source over a JsonRpcProvider. The provider is returned too
 * so shutdown can destroy it.
 */
export function createRpcBlockSource(rpcUrl: string): { source: RpcBlockSource; provider: JsonRpcProvider } {
  const provider = new JsonRpcProvider(rpcUrl);
  return { source: new RpcBlockSource(provider), provider };
}
