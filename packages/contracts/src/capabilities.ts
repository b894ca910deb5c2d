/**
 * @fileoverview Capability checks shared by adapters.
 *
 * @module @marketsync/contracts/capabilities
 */

import type { DataSource } from './data-source.js';
import type { Interval } from './market.js';
import { NotSupportedError } from './errors.js';

type Described = Pick<DataSource, 'id' | 'capabilities'>;

export function supportsInterval(source: Described, interval: Interval): boolean {
  return source.capabilities.intraday.includes(interval);
}

/**
 * @throws NotSupportedError when `interval` is not declared by the source
 */
export function assertIntervalSupported(source: Described, interval: Interval): void {
  if (!supportsInterval(source, interval)) {
    const offered = source.capabilities.intraday;
    throw new NotSupportedError(
      offered.length === 0
        ? `${source.id} does not serve intraday bars`
        : `${source.id} does not serve ${interval} bars (supported: ${offered.join(', ')})`,
      { provider: source.id, capability: `intraday:${interval}` }
    );
  }
}

/**
 * @throws NotSupportedError when the source declares no realtime quote
 */
export function assertQuoteSupported(source: Described): void {
  if (!source.capabilities.realtimeQuote) {
    throw new NotSupportedError(`${source.id} does not serve realtime quotes`, {
      provider: source.id,
      capability: 'realtimeQuote',
    });
  }
}
