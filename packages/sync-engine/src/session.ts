/**
 * Scoped provider sessions.
 */

import type { DataSource } from '@marketsync/contracts'

/**
 * Run `fn` inside an upstream session when the source has one. The session
 * is closed on every exit path.
 *
 * @example
 * ```typescript
 * const bars = await withSession(source, () => source.fetchDailyBars('000001', start, end))
 * ```
 */
export async function withSession<T>(source: Pick<DataSource, 'openSession'>, fn: () => Promise<T>): Promise<T> {
  if (!source.openSession) {
    return fn()
  }

  const session = await source.openSession()
  try {
    return await fn()
  } finally {
    await session.close()
  }
}
