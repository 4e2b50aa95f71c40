import type { Database } from '@db/connection';
import { systemClock, type Clock } from './clock';
import { discardEvents, type TransitionEventSink } from './events';

export interface EngineOptions {
  /** Attempts per transaction when Postgres reports a serialization failure. */
  maxRetries: number;
  /** Length of the ranked list returned by `statistics`. */
  statisticsTopN: number;
}

export interface EngineContext {
  db: Database;
  clock: Clock;
  events: TransitionEventSink;
  options: EngineOptions;
}

export const DEFAULT_ENGINE_OPTIONS: EngineOptions = {
  maxRetries: 5,
  statisticsTopN: 10,
};

export function createEngineContext(
  db: Database,
  overrides: Partial<Omit<EngineContext, 'db' | 'options'>> & {
    options?: Partial<EngineOptions>;
  } = {},
): EngineContext {
  return {
    db,
    clock: overrides.clock ?? systemClock,
    events: overrides.events ?? discardEvents,
    options: { ...DEFAULT_ENGINE_OPTIONS, ...overrides.options },
  };
}
