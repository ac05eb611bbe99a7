/**
 * Map whose entries are fixed at construction. Mutators throw, so code that
 * only sees the runtime object (such as a template) cannot change it either.
 */
export class FrozenMap<K, V> extends Map<K, V> {
  constructor (entries: Iterable<readonly [K, V]>) {
    super()
    for (const [key, value] of entries) {
      super.set(key, value)
    }
    Object.freeze(this)
  }

  set (key: K): never {
    throw new TypeError(`Cannot set key ${String(key)}: map is read-only`)
  }

  delete (key: K): never {
    throw new TypeError(`Cannot delete key ${String(key)}: map is read-only`)
  }

  clear (): never {
    throw new TypeError('Cannot clear a read-only map')
  }
}

/**
 * Recursively freezes plain objects, arrays and the values of Maps.
 * Maps should be FrozenMaps; the instance is returned as is.
 */
export function deepFreeze<T> (value: T): T {
  if (value === null || typeof value !== 'object') {
    return value
  }

  if (value instanceof Map) {
    for (const entry of value.values()) {
      deepFreeze(entry)
    }
    return value
  }

  if (Object.isFrozen(value)) {
    return value
  }
  Object.freeze(value)
  for (const entry of Object.values(value)) {
    deepFreeze(entry)
  }
  return value
}
