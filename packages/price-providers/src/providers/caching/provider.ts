import type { Money } from '@sharepool/core';
import { getLogger } from '@sharepool/logger';
import type { Logger } from '@sharepool/logger';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { CacheMissError } from '../../core/errors.js';
import type { ProviderError } from '../../core/errors.js';
import type { SecurityInfo, SecurityInfoProvider } from '../../core/types.js';

/**
 * Keeps security information in memory in front of another provider.
 *
 * An entry is served from memory while it is newer than the requested
 * refresh date. Without an upstream provider every miss is a CacheMissError,
 * which is how offline runs are expressed. Prices are live data and are
 * never cached.
 */
export class CachingSecurityInfoProvider implements SecurityInfoProvider {
  readonly name = 'cache';
  private readonly cache = new Map<string, SecurityInfo>();

  constructor(
    private readonly upstream?: SecurityInfoProvider,
    private readonly logger: Logger = getLogger('CachingSecurityInfoProvider')
  ) {}

  /**
   * Prime the cache, e.g. with entries restored by the caller
   */
  seed(isin: string, info: SecurityInfo): void {
    this.cache.set(isin, info);
  }

  getInfo(isin: string, name: string, refreshDate?: Date): Result<SecurityInfo, ProviderError> {
    const cached = this.cache.get(isin);
    if (cached && (refreshDate === undefined || cached.lastUpdated.getTime() > refreshDate.getTime())) {
      this.logger.debug({ isin }, 'Security information is up to date');
      return ok(cached);
    }

    if (!this.upstream) {
      return err(new CacheMissError(`Security information not cached for ${name} (${isin})`, this.name));
    }

    this.logger.info({ isin, name }, 'Fetching security information');
    const fetched = this.upstream.getInfo(isin, name, refreshDate);
    if (fetched.isErr()) {
      if (cached) {
        this.logger.warn({ isin, error: fetched.error.message }, 'Refresh failed, using stale security information');
        return ok(cached);
      }
      return err(fetched.error);
    }

    this.cache.set(isin, fetched.value);
    return ok(fetched.value);
  }

  getPrice(isin: string, name: string): Result<Money, ProviderError> {
    if (!this.upstream) {
      return err(new CacheMissError(`No live price source for ${name} (${isin})`, this.name));
    }
    return this.upstream.getPrice(isin, name);
  }
}
