/**
 * Generator Configuration Module
 *
 * Resolves the settings of a generation run.
 *
 * **Fallback Chain**: explicit option → environment variable → built-in default
 *
 * | Option | Environment | Default |
 * |--------|-------------|---------|
 * | templatesDir | NETLOOM_TEMPLATES_DIR | bundled `templates/` directory |
 * | baseSet | NETLOOM_BASE_SET | `networkd` |
 * | emitDebugJson | NETLOOM_DEBUG_JSON (`1`/`true`) | false |
 * | emitServicesList | - | true |
 *
 * `searchPaths` are extra template directories searched before `templatesDir`,
 * so a user directory can override single templates of a bundled set.
 *
 * ```typescript
 * const config = resolveGeneratorConfig({ searchPaths: ['./my-templates'] })
 * const generator = new ConfigGenerator(config)
 * ```
 */

import * as path from 'path'
import { DEFAULT_BASE_SET, TemplateSetId } from '../types/render.types'

/** Template sets shipped with the package */
export const BUNDLED_TEMPLATES_DIR = path.resolve(__dirname, '..', '..', 'templates')

export interface GeneratorOptions {
  /** Root directory of the template sets */
  templatesDir?: string
  /** Extra template directories, searched first */
  searchPaths?: string[]
  /** Base template set rendered for every node */
  baseSet?: TemplateSetId
  /** Add a `_node.json` summary artifact per node */
  emitDebugJson?: boolean
  /** Add the `services.list` artifact per node */
  emitServicesList?: boolean
}

export interface GeneratorConfig {
  /** Template search paths in lookup order */
  templatePaths: readonly string[]
  baseSet: TemplateSetId
  emitDebugJson: boolean
  emitServicesList: boolean
}

export type Environment = Readonly<Record<string, string | undefined>>

function parseFlag (value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') {
    return undefined
  }
  return value === '1' || value.toLowerCase() === 'true'
}

/**
 * Applies the fallback chain to generator options.
 * @param env - Environment to read; defaults to `process.env`
 */
export function resolveGeneratorConfig (options: GeneratorOptions = {}, env: Environment = process.env): GeneratorConfig {
  const templatesDir = options.templatesDir ?? (env.NETLOOM_TEMPLATES_DIR || undefined) ?? BUNDLED_TEMPLATES_DIR
  const searchPaths = (options.searchPaths ?? []).map((p) => path.resolve(p))

  return {
    templatePaths: [...searchPaths, path.resolve(templatesDir)],
    baseSet: options.baseSet ?? (env.NETLOOM_BASE_SET || undefined) ?? DEFAULT_BASE_SET,
    emitDebugJson: options.emitDebugJson ?? parseFlag(env.NETLOOM_DEBUG_JSON) ?? false,
    emitServicesList: options.emitServicesList ?? true
  }
}
