import { FieldViolation } from '../types/errors.types'

export type Mapping = Record<string, unknown>

export function isMapping (value: unknown): value is Mapping {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Builds a child path: `joinPath('nodes[0]', 'name')` -> `nodes[0].name`
 */
export function joinPath (parent: string, key: string | number): string {
  if (typeof key === 'number') {
    return `${parent}[${key}]`
  }
  return parent ? `${parent}.${key}` : key
}

/**
 * DocumentReader reads typed fields out of an untyped document while
 * collecting every violation it meets. Readers never throw: on a violation
 * they record it and return a fallback so that validation can continue.
 */
export class DocumentReader {
  readonly violations: FieldViolation[] = []

  report (path: string, message: string): void {
    this.violations.push({ path, message })
  }

  get valid (): boolean {
    return this.violations.length === 0
  }

  string (parent: Mapping, key: string, path: string): string | undefined {
    const value = parent[key]
    if (value === undefined || value === null) {
      return undefined
    }
    if (typeof value !== 'string') {
      this.report(joinPath(path, key), `must be a string, got ${describe(value)}`)
      return undefined
    }
    return value
  }

  requiredString (parent: Mapping, key: string, path: string): string {
    const fieldPath = joinPath(path, key)
    if (parent[key] === undefined || parent[key] === null) {
      this.report(fieldPath, 'is required')
      return ''
    }
    const value = this.string(parent, key, path)
    if (value !== undefined && value.trim() === '') {
      this.report(fieldPath, 'must not be empty')
    }
    return value ?? ''
  }

  /**
   * Reads an optional string that must satisfy `check`
   */
  formatted (
    parent: Mapping,
    key: string,
    path: string,
    check: (value: string) => boolean,
    expected: string
  ): string | undefined {
    const value = this.string(parent, key, path)
    if (value !== undefined && !check(value)) {
      this.report(joinPath(path, key), `must be ${expected}, got '${value}'`)
    }
    return value
  }

  boolean (parent: Mapping, key: string, path: string): boolean | undefined {
    const value = parent[key]
    if (value === undefined || value === null) {
      return undefined
    }
    if (typeof value !== 'boolean') {
      this.report(joinPath(path, key), `must be a boolean, got ${describe(value)}`)
      return undefined
    }
    return value
  }

  /**
   * Reads an optional integer within `[min, max]`
   */
  integer (parent: Mapping, key: string, path: string, min: number, max: number): number | undefined {
    const value = parent[key]
    if (value === undefined || value === null) {
      return undefined
    }
    if (typeof value !== 'number' || !Number.isInteger(value)) {
      this.report(joinPath(path, key), `must be an integer, got ${describe(value)}`)
      return undefined
    }
    if (value < min || value > max) {
      this.report(joinPath(path, key), `must be between ${min} and ${max}, got ${value}`)
    }
    return value
  }

  /**
   * Reads an optional value restricted to an enumerated set
   */
  oneOf<T extends string | number> (
    parent: Mapping,
    key: string,
    path: string,
    allowed: readonly T[]
  ): T | undefined {
    const value = parent[key]
    if (value === undefined || value === null) {
      return undefined
    }
    const match = allowed.find((candidate) => candidate === value)
    if (match === undefined) {
      this.report(
        joinPath(path, key),
        `must be one of ${allowed.map((a) => JSON.stringify(a)).join(', ')}, got ${JSON.stringify(value)}`
      )
    }
    return match
  }

  mapping (parent: Mapping, key: string, path: string): Mapping | undefined {
    const value = parent[key]
    if (value === undefined || value === null) {
      return undefined
    }
    if (!isMapping(value)) {
      this.report(joinPath(path, key), `must be a mapping, got ${describe(value)}`)
      return undefined
    }
    return value
  }

  /**
   * Reads an optional sequence. Missing sequences read as empty.
   */
  sequence (parent: Mapping, key: string, path: string): unknown[] {
    const value = parent[key]
    if (value === undefined || value === null) {
      return []
    }
    if (!Array.isArray(value)) {
      this.report(joinPath(path, key), `must be a sequence, got ${describe(value)}`)
      return []
    }
    return value
  }

  /**
   * Reads a sequence of mappings, reporting entries of any other kind
   */
  mappings (parent: Mapping, key: string, path: string): Array<{ entry: Mapping, path: string }> {
    const entries: Array<{ entry: Mapping, path: string }> = []
    this.sequence(parent, key, path).forEach((item, index) => {
      const itemPath = joinPath(joinPath(path, key), index)
      if (!isMapping(item)) {
        this.report(itemPath, `must be a mapping, got ${describe(item)}`)
        return
      }
      entries.push({ entry: item, path: itemPath })
    })
    return entries
  }

  strings (parent: Mapping, key: string, path: string): string[] {
    const values: string[] = []
    this.sequence(parent, key, path).forEach((item, index) => {
      if (typeof item !== 'string') {
        this.report(joinPath(joinPath(path, key), index), `must be a string, got ${describe(item)}`)
        return
      }
      values.push(item)
    })
    return values
  }

  /**
   * Reads a mapping of scalar values (sysctl style)
   */
  scalars (parent: Mapping, key: string, path: string): Record<string, string | number | boolean> {
    const result: Record<string, string | number | boolean> = {}
    const mapping = this.mapping(parent, key, path)
    if (!mapping) {
      return result
    }
    for (const [name, value] of Object.entries(mapping)) {
      if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        result[name] = value
      } else {
        this.report(joinPath(joinPath(path, key), name), `must be a scalar, got ${describe(value)}`)
      }
    }
    return result
  }
}

function describe (value: unknown): string {
  if (value === null) {
    return 'null'
  }
  if (Array.isArray(value)) {
    return 'sequence'
  }
  if (typeof value === 'object') {
    return 'mapping'
  }
  return typeof value
}
