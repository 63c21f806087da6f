/**
 * Friendbot Client
 *
 * Funds new test network accounts through the Friendbot faucet.
 * Only ever called for TESTNET; the public network has no faucet.
 */

import axios from 'axios';

import { createServiceLogger, fundingRequestsTotal } from '../../observability';

const log = createServiceLogger('friendbot');

export type FundingResult = { funded: true } | { funded: false; reason: string };

export interface FundingClient {
  /** Never throws: every failure comes back as `funded: false` */
  fund(publicKey: string): Promise<FundingResult>;
}

export class FriendbotClient implements FundingClient {
  constructor(
    private readonly friendbotUrl: string,
    private readonly timeoutMs: number
  ) {}

  async fund(publicKey: string): Promise<FundingResult> {
    try {
      const response = await axios.get(this.friendbotUrl, {
        params: { addr: publicKey },
        timeout: this.timeoutMs,
        validateStatus: (status) => status >= 200 && status < 300,
      });

      log.info({ publicKey, status: response.status }, 'Account funded by Friendbot');
      fundingRequestsTotal.inc({ outcome: 'funded' });
      return { funded: true };
    } catch (error) {
      let reason: string;

      if (axios.isAxiosError(error)) {
        if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
          reason = `Friendbot request timed out after ${this.timeoutMs}ms`;
        } else if (error.response) {
          reason = `Friendbot request failed with status ${error.response.status}`;
        } else {
          reason = `Friendbot request error: ${error.message}`;
        }
      } else {
        reason = `Friendbot request error: ${error instanceof Error ? error.message : 'Unknown error'}`;
      }

      log.warn({ publicKey, reason }, 'Friendbot funding failed');
      fundingRequestsTotal.inc({ outcome: 'failed' });
      return { funded: false, reason };
    }
  }
}
