import type { DomainError } from '@sharepool/core';
import type { Logger } from '@sharepool/logger';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

export interface StrictModeOptions {
  strict: boolean;
  logger: Logger;
}

/**
 * In strict mode the error aborts the calculation; otherwise it is logged
 * as a warning and the caller skips the offending data.
 */
export function raiseOrWarn<E extends DomainError>(error: E, options: StrictModeOptions): Result<void, E> {
  if (options.strict) {
    return err(error);
  }

  options.logger.warn({ code: error.code, transactionId: error.transactionId, ...error.context }, error.message);
  return ok(undefined);
}
