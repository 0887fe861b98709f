/**
 * Anything the batch scheduler can refresh. `isExpired` lets a target report
 * that it no longer exists; expired targets are skipped and counted.
 */
export interface UpdateTarget {
  update(): void;
  isExpired?(): boolean;
}

/**
 * Reason string handed to `updateAllElements` when a legacy target is
 * refreshed through {@link fromLegacyTarget}.
 */
export const LEGACY_UPDATE_REASON = 'batched-update';

const LEGACY_UPDATE_METHODS = [
  'updateAll',
  'update',
  'updateAllElements',
  'updateHealth',
  'updatePower',
] as const;

export type LegacyUpdateMethod = (typeof LEGACY_UPDATE_METHODS)[number];

const legacyAdapters = new WeakMap<object, UpdateTarget>();

export function isUpdateTarget(value: unknown): value is UpdateTarget {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, 'update') === 'function'
  );
}

/**
 * Returns true when the target exists, exposes `update` and does not report
 * itself expired. A throwing `isExpired` counts as expired.
 */
export function isLiveUpdateTarget(value: unknown): value is UpdateTarget {
  if (!isUpdateTarget(value)) {
    return false;
  }
  if (typeof value.isExpired !== 'function') {
    return true;
  }
  try {
    return !value.isExpired();
  } catch {
    return false;
  }
}

export function hasLegacyUpdateCapability(source: object): boolean {
  return LEGACY_UPDATE_METHODS.some((method) => hasMethod(source, method));
}

/**
 * Adapts an object exposing any of the legacy refresh methods (`updateAll`,
 * `update`, `updateAllElements`, `updateHealth`, `updatePower`) to
 * {@link UpdateTarget}. The first of `updateAll`, `update` and
 * `updateAllElements` found wins; otherwise `updateHealth` and `updatePower`
 * both run. Objects exposing `getObjectType` are treated as expired once that
 * call throws.
 *
 * The same adapter is returned for the same source so queue membership stays
 * identity based. Objects that already satisfy {@link UpdateTarget} are
 * returned as they are; objects with none of the methods yield `undefined`.
 */
export function fromLegacyTarget(source: object): UpdateTarget | undefined {
  if (isUpdateTarget(source)) {
    return source;
  }
  const cached = legacyAdapters.get(source);
  if (cached) {
    return cached;
  }
  if (!hasLegacyUpdateCapability(source)) {
    return undefined;
  }

  const adapter: UpdateTarget = {
    update() {
      if (
        invokeMethod(source, 'updateAll', []) ||
        invokeMethod(source, 'update', []) ||
        invokeMethod(source, 'updateAllElements', [LEGACY_UPDATE_REASON])
      ) {
        return;
      }
      const health = invokeMethod(source, 'updateHealth', []);
      const power = invokeMethod(source, 'updatePower', []);
      if (!health && !power) {
        throw new Error('Legacy update target no longer exposes an update method.');
      }
    },
    isExpired() {
      if (!hasMethod(source, 'getObjectType')) {
        return !hasLegacyUpdateCapability(source);
      }
      try {
        invokeMethod(source, 'getObjectType', []);
        return false;
      } catch {
        return true;
      }
    },
  };
  legacyAdapters.set(source, adapter);
  return adapter;
}

function hasMethod(source: object, name: string): boolean {
  return typeof Reflect.get(source, name) === 'function';
}

function invokeMethod(
  source: object,
  name: string,
  args: readonly unknown[],
): boolean {
  const method: unknown = Reflect.get(source, name);
  if (typeof method !== 'function') {
    return false;
  }
  Reflect.apply(method, source, args);
  return true;
}
