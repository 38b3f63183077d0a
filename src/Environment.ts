import { randomUUID } from 'node:crypto';
import { createConsoleLogger } from './Logger.js';
import type { EntityEnvironment, EntityEnvironmentOptions } from './types.js';
import { USECS_PER_SECOND } from './types.js';

const DEFAULT_MAX_ACTIONS_DATA_SIZE = 800;
const DEFAULT_REMEMBER_DELETED_ACTION_TIME = 20 * USECS_PER_SECOND;
const DEFAULT_REMEMBER_DELETED_ENTITY_TIME = 60 * USECS_PER_SECOND;

export function usecTimestampNow(): number {
  return Math.floor((performance.timeOrigin + performance.now()) * 1000);
}

export function createEntityEnvironment(options?: EntityEnvironmentOptions): EntityEnvironment {
  const clock = options?.now ?? usecTimestampNow;
  return {
    sessionId: options?.sessionId ?? randomUUID(),
    now: clock,
    maxActionsDataSize: options?.maxActionsDataSize ?? DEFAULT_MAX_ACTIONS_DATA_SIZE,
    rememberDeletedActionTime: options?.rememberDeletedActionTime ?? DEFAULT_REMEMBER_DELETED_ACTION_TIME,
    rememberDeletedEntityTime: options?.rememberDeletedEntityTime ?? DEFAULT_REMEMBER_DELETED_ENTITY_TIME,
    logger: options?.logger ?? createConsoleLogger({ prefix: 'entities' }),
  };
}
