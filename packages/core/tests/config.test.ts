/**
 * Configuration and logging setup
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'

import { isVerboseEnv, loadConfigFile, loadConnectionSettings } from '../src/calendar/config.js'
import { ConfigurationError } from '../src/calendar/errors.js'
import { selectProvider } from '../src/calendar/providers.js'
import { createLogger, levelFromVerbosity } from '../src/logger.js'

const ENV = {
  CALDAV_URL: 'https://caldav.example.test/',
  CALDAV_USERNAME: 'env-user',
  CALDAV_PASSWORD: 'env-secret',
}

describe('loadConnectionSettings', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'caldav-config-'))
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  function writeConfig(content: string): string {
    const file = path.join(tempDir, 'config.yaml')
    fs.writeFileSync(file, content, 'utf-8')
    return file
  }

  it('reads the environment', () => {
    expect(loadConnectionSettings({}, ENV)).toEqual({
      url: 'https://caldav.example.test/',
      username: 'env-user',
      password: 'env-secret',
    })
  })

  it('prefers flags over the environment', () => {
    expect(
      loadConnectionSettings({ username: 'flag-user', password: 'flag-secret' }, ENV),
    ).toEqual({
      url: 'https://caldav.example.test/',
      username: 'flag-user',
      password: 'flag-secret',
    })
  })

  it('accepts the Yandex variable names', () => {
    const settings = loadConnectionSettings(
      {},
      {
        CALDAV_URL: 'https://caldav.yandex.ru/',
        YANDEX_USERNAME: 'test-user',
        YANDEX_PASSWORD: 'test-secret',
      },
    )
    expect(settings.username).toBe('test-user')
    expect(settings.password).toBe('test-secret')
  })

  it('falls back to the config file', () => {
    const configPath = writeConfig(
      ['caldav:', '  url: https://dav.example.test/', '  username: file-user', '  password: file-secret', ''].join('\n'),
    )

    expect(loadConnectionSettings({ configPath }, { CALDAV_PASSWORD: 'env-secret' })).toEqual({
      url: 'https://dav.example.test/',
      username: 'file-user',
      password: 'env-secret',
    })
    expect(
      loadConnectionSettings({}, { CALDAV_MCP_CONFIG: configPath }).username,
    ).toBe('file-user')
  })

  it('lists every missing setting', () => {
    let error: unknown
    try {
      loadConnectionSettings({}, { CALDAV_USERNAME: 'env-user', CALDAV_PASSWORD: '  ' })
    } catch (err) {
      error = err
    }

    expect(error).toBeInstanceOf(ConfigurationError)
    expect(error).toMatchObject({
      code: 'CONFIGURATION_ERROR',
      missing: ['CALDAV_URL', 'CALDAV_PASSWORD'],
    })
  })

  it('rejects a relative URL', () => {
    expect(() => loadConnectionSettings({ url: 'caldav.example.test' }, ENV)).toThrow(
      'Invalid CALDAV_URL "caldav.example.test": expected an absolute URL',
    )
  })

  it('reports config file problems', () => {
    const missing = path.join(tempDir, 'missing.yaml')
    expect(() => loadConfigFile(missing)).toThrow(`Config file not found: ${missing}`)

    const wrongShape = writeConfig('caldav:\n  url: 42\n')
    expect(() => loadConfigFile(wrongShape)).toThrow(`Invalid config file ${wrongShape}: caldav.url`)

    const broken = writeConfig('caldav: [unclosed\n')
    expect(() => loadConfigFile(broken)).toThrow(`Could not parse ${broken}`)
  })

  it('treats an empty config file as empty', () => {
    expect(loadConfigFile(writeConfig(''))).toEqual({})
  })
})

describe('logging levels', () => {
  it('maps verbosity to a level', () => {
    expect(levelFromVerbosity(0)).toBe('warn')
    expect(levelFromVerbosity(1)).toBe('info')
    expect(levelFromVerbosity(2)).toBe('debug')
    expect(levelFromVerbosity(0, true)).toBe('debug')
  })

  it('creates a named logger at the requested level', () => {
    const logger = createLogger('debug')
    expect(logger.level).toBe('debug')
    expect(logger.isLevelEnabled('debug')).toBe(true)
    expect(createLogger().isLevelEnabled('info')).toBe(false)
  })

  it('reads MCP_VERBOSE', () => {
    expect(isVerboseEnv({ MCP_VERBOSE: 'TRUE' })).toBe(true)
    expect(isVerboseEnv({ MCP_VERBOSE: '1' })).toBe(true)
    expect(isVerboseEnv({ MCP_VERBOSE: '0' })).toBe(false)
    expect(isVerboseEnv({})).toBe(false)
  })
})

describe('selectProvider', () => {
  it('recognises Yandex hosts', () => {
    expect(selectProvider('https://caldav.yandex.ru/').name).toBe('yandex')
    expect(selectProvider('https://caldav.yandex.com/calendars/').name).toBe('yandex')
  })

  it('uses the generic profile elsewhere', () => {
    expect(selectProvider('https://notyandex.ru/').name).toBe('generic')
    expect(selectProvider('https://yandex.ru.example.test/').name).toBe('generic')
    expect(selectProvider('not a url')).toEqual({ name: 'generic', transportHint: null })
  })
})
