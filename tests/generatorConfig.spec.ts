/**
 * Generator configuration tests
 */

import * as path from 'path'
import { BUNDLED_TEMPLATES_DIR, resolveGeneratorConfig } from '../src/config/GeneratorConfig'

describe('resolveGeneratorConfig', () => {
  it('uses built-in defaults', () => {
    expect(resolveGeneratorConfig({}, {})).toEqual({
      templatePaths: [BUNDLED_TEMPLATES_DIR],
      baseSet: 'networkd',
      emitDebugJson: false,
      emitServicesList: true
    })
  })

  it('points the bundled directory at the shipped templates', () => {
    expect(path.basename(BUNDLED_TEMPLATES_DIR)).toBe('templates')
  })

  it('reads the environment', () => {
    const env = {
      NETLOOM_TEMPLATES_DIR: '/opt/netloom/templates',
      NETLOOM_BASE_SET: 'custom',
      NETLOOM_DEBUG_JSON: 'true'
    }

    expect(resolveGeneratorConfig({}, env)).toEqual({
      templatePaths: ['/opt/netloom/templates'],
      baseSet: 'custom',
      emitDebugJson: true,
      emitServicesList: true
    })
  })

  it('prefers explicit options over the environment', () => {
    const env = {
      NETLOOM_TEMPLATES_DIR: '/opt/netloom/templates',
      NETLOOM_BASE_SET: 'custom',
      NETLOOM_DEBUG_JSON: '1'
    }

    expect(resolveGeneratorConfig({
      templatesDir: '/srv/templates',
      baseSet: 'networkd',
      emitDebugJson: false,
      emitServicesList: false
    }, env)).toEqual({
      templatePaths: ['/srv/templates'],
      baseSet: 'networkd',
      emitDebugJson: false,
      emitServicesList: false
    })
  })

  it('searches extra paths before the templates directory', () => {
    const config = resolveGeneratorConfig({ searchPaths: ['/a', '/b'], templatesDir: '/c' }, {})

    expect(config.templatePaths).toEqual(['/a', '/b', '/c'])
  })

  it('treats other flag values and empty variables as unset or false', () => {
    expect(resolveGeneratorConfig({}, { NETLOOM_DEBUG_JSON: '0' }).emitDebugJson).toBe(false)
    expect(resolveGeneratorConfig({}, { NETLOOM_DEBUG_JSON: '', NETLOOM_BASE_SET: '' })).toMatchObject({
      emitDebugJson: false,
      baseSet: 'networkd'
    })
  })
})
