import type { Database } from '@db/connection';
import type { EngineContext } from './context';
import { CfpError, conflict, isCfpError, validationError } from './errors';

// ---------------------------------------------------------------------------
// Store error translation
// ---------------------------------------------------------------------------

const SERIALIZATION_FAILURE = '40001';
const DEADLOCK_DETECTED = '40P01';
const RETRYABLE_CODES = new Set([SERIALIZATION_FAILURE, DEADLOCK_DETECTED]);

const UNIQUE_MESSAGES: Record<string, string> = {
  ratings_talk_reviewer_unique: 'This reviewer has already rated the talk',
  labels_name_unique: 'A label with this name already exists',
  talk_labels_pkey: 'Label is already attached to the talk',
  schedule_slots_talk_id_unique: 'Talk is already scheduled in another slot',
};

function causeOf(value: unknown): unknown {
  return typeof value === 'object' && value !== null && 'cause' in value
    ? value.cause
    : undefined;
}

function readStringProp(err: unknown, key: 'code' | 'constraint'): string | undefined {
  // drizzle may wrap the driver error, so walk the cause chain
  let current = err;
  for (let depth = 0; depth < 4 && current !== undefined; depth++) {
    if (typeof current === 'object' && current !== null && key in current) {
      const value: unknown = Reflect.get(current, key);
      if (typeof value === 'string' && (key !== 'code' || /^[0-9A-Z]{5}$/.test(value))) {
        return value;
      }
    }
    current = causeOf(current);
  }
  return undefined;
}

/** SQLSTATE of a Postgres error, if `err` carries one. */
export function pgErrorCode(err: unknown): string | undefined {
  return readStringProp(err, 'code');
}

export function translateStoreError(err: unknown): CfpError {
  if (isCfpError(err)) return err;

  const sqlState = pgErrorCode(err);
  const constraint = readStringProp(err, 'constraint');

  switch (sqlState) {
    case '23505':
      return conflict(
        (constraint && UNIQUE_MESSAGES[constraint]) || 'Duplicate value violates a uniqueness rule',
        { constraint },
      );
    case '23503':
      return new CfpError('NotFound', 'Referenced entity not found', { constraint });
    case '23502':
    case '23514':
    case '22P02':
    case '22007':
    case '22008':
      return validationError('Value rejected by the store', { sqlState, constraint });
    default:
      return new CfpError(
        'StorageError',
        'Storage operation failed',
        sqlState ? { sqlState } : undefined,
        { cause: err },
      );
  }
}

// ---------------------------------------------------------------------------
// Execution helpers
// ---------------------------------------------------------------------------

/**
 * Re-runs `attempt` from scratch while it fails with a serialization failure
 * or deadlock, up to `maxAttempts` runs in total.
 */
export async function retrySerializable<T>(
  attempt: () => Promise<T>,
  maxAttempts: number,
): Promise<T> {
  const limit = Math.max(1, maxAttempts);
  for (let run = 1; ; run++) {
    try {
      return await attempt();
    } catch (err) {
      const sqlState = pgErrorCode(err);
      if (sqlState && RETRYABLE_CODES.has(sqlState) && run < limit) {
        console.warn(`[DB] Retrying transaction (${run}/${limit - 1}) after SQLSTATE ${sqlState}`);
        continue;
      }
      throw translateStoreError(err);
    }
  }
}

/**
 * Runs `work` in one serializable transaction. Any throw rolls the whole
 * transaction back; nothing it wrote is visible afterwards.
 */
export function runInTransaction<T>(
  ctx: EngineContext,
  work: (tx: Database) => Promise<T>,
): Promise<T> {
  return retrySerializable(
    () => ctx.db.transaction((tx) => work(tx), { isolationLevel: 'serializable' }),
    ctx.options.maxRetries,
  );
}

/** Single-statement reads outside a transaction, with errors translated. */
export async function readStore<T>(work: () => Promise<T>): Promise<T> {
  try {
    return await work();
  } catch (err) {
    throw translateStoreError(err);
  }
}
