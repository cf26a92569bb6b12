import fs from 'fs/promises'
import path from 'path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createTempDir, removeTempDir } from '../test/helpers.js'
import logger from '../utils/logger.js'
import { SecretKeyStore } from './secret-key.js'

vi.mock('../utils/logger.js', () => ({
  default: {
    error: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
  },
}))

describe('SecretKeyStore', () => {
  let dir: string
  let filePath: string

  beforeEach(async () => {
    vi.clearAllMocks()
    dir = await createTempDir()
    filePath = path.join(dir, 'oauth', 'secret_key.txt')
  })

  afterEach(async () => {
    await removeTempDir(dir)
  })

  it('初回に64バイトのキーを生成し0600で保存する', async () => {
    const key = await new SecretKeyStore(filePath).getSecretKey()
    expect(key).toMatch(/^[A-Za-z0-9_-]{86}$/)
    expect(await fs.readFile(filePath, 'utf8')).toBe(key)
    expect((await fs.stat(filePath)).mode & 0o777).toBe(0o600)
    expect((await fs.stat(path.dirname(filePath))).mode & 0o777).toBe(0o700)
    expect(logger.info).toHaveBeenCalledWith(`Generated new token signing key: ${filePath}`)
  })

  it('既存のキーを再利用する（前後の空白は除く）', async () => {
    await fs.mkdir(path.dirname(filePath), { recursive: true })
    await fs.writeFile(filePath, 'test-signing-key\n')
    expect(await new SecretKeyStore(filePath).getSecretKey()).toBe('test-signing-key')
    expect(logger.info).not.toHaveBeenCalled()
  })

  it('別インスタンスでも同じキーを返す', async () => {
    const first = await new SecretKeyStore(filePath).getSecretKey()
    expect(await new SecretKeyStore(filePath).getSecretKey()).toBe(first)
  })

  it('同時に生成しても1つのキーに収束する', async () => {
    const keys = await Promise.all([
      new SecretKeyStore(filePath).getSecretKey(),
      new SecretKeyStore(filePath).getSecretKey(),
      new SecretKeyStore(filePath).getSecretKey(),
    ])
    const stored = await fs.readFile(filePath, 'utf8')
    expect(keys).toEqual([stored, stored, stored])
  })
})
