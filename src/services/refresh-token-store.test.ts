import fs from 'fs/promises'
import path from 'path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { JsonFileStore } from '../db/file-store.js'
import { ClientRecordSchema, RefreshTokenRecordSchema } from '../db/schemas.js'
import { RefreshTokenRecord } from '../types/oauth.types.js'
import { createTempDir, createTestHasher, removeTempDir } from '../test/helpers.js'
import { OAuthError } from '../utils/oauth-error.js'
import { sha256Hex } from '../utils/pkce.js'
import { ClientRegistry } from './client-registry.js'
import { RefreshTokenStore } from './refresh-token-store.js'

vi.mock('../utils/logger.js', () => ({
  default: {
    error: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
  },
}))

describe('RefreshTokenStore', () => {
  let dir: string
  let now: Date
  let clients: ClientRegistry
  let store: JsonFileStore<RefreshTokenRecord>
  let refreshTokens: RefreshTokenStore
  let clientId: string

  const rejectionOf = (promise: Promise<unknown>): Promise<unknown> =>
    promise.then(
      () => null,
      (err: unknown) => err,
    )

  beforeEach(async () => {
    dir = await createTempDir()
    now = new Date('2026-01-01T00:00:00.000Z')
    clients = new ClientRegistry(
      new JsonFileStore(path.join(dir, 'clients.json'), ClientRecordSchema),
      createTestHasher(),
      () => now,
    )
    store = new JsonFileStore(path.join(dir, 'refresh_tokens.json'), RefreshTokenRecordSchema)
    refreshTokens = new RefreshTokenStore({ store, clients, ttlSeconds: 30 * 86400, now: () => now })
    clientId = (await clients.generate('Claude')).client_id
  })

  afterEach(async () => {
    await removeTempDir(dir)
  })

  it('トークンを発行し、ダイジェストのみ保存する', async () => {
    const token = await refreshTokens.issue(clientId, 'memory')
    expect(token).toMatch(/^[A-Za-z0-9_-]{64}$/)
    expect(await fs.readFile(path.join(dir, 'refresh_tokens.json'), 'utf8')).not.toContain(token)
    expect(await store.get(sha256Hex(token))).toEqual({
      client_id: clientId,
      scope: 'memory',
      created_at: '2026-01-01T00:00:00.000Z',
      expires_at: '2026-01-31T00:00:00.000Z',
      rotated: false,
    })
  })

  it('ローテーションで新しいトークンを発行し、スコープを引き継ぐ', async () => {
    const token = await refreshTokens.issue(clientId, 'memory')
    const rotated = await refreshTokens.rotate(token, clientId)

    expect(rotated).toEqual({ clientId, scope: 'memory', refreshToken: expect.any(String) })
    expect(rotated.refreshToken).not.toBe(token)
    expect(await store.get(sha256Hex(token))).toMatchObject({ rotated: true, rotated_at: '2026-01-01T00:00:00.000Z' })
    expect(await store.get(sha256Hex(rotated.refreshToken))).toMatchObject({ client_id: clientId, rotated: false })
  })

  it('client_id を省略してもローテーションできる', async () => {
    const token = await refreshTokens.issue(clientId)
    expect(await refreshTokens.rotate(token)).toEqual({ clientId, refreshToken: expect.any(String) })
  })

  it('ローテーション済みのトークンは拒否する', async () => {
    const token = await refreshTokens.issue(clientId)
    const rotated = await refreshTokens.rotate(token)
    expect(await rejectionOf(refreshTokens.rotate(token))).toMatchObject({
      error: 'invalid_grant',
      message: 'Refresh token has already been used',
    })
    // 新しいトークンは有効
    await expect(refreshTokens.rotate(rotated.refreshToken)).resolves.toMatchObject({ clientId })
  })

  it('不明なトークンは invalid_grant', async () => {
    const rejection = await rejectionOf(refreshTokens.rotate('unknown-token'))
    expect(rejection).toBeInstanceOf(OAuthError)
    expect(rejection).toMatchObject({ error: 'invalid_grant', message: 'Invalid refresh token' })
  })

  it('期限切れは invalid_grant', async () => {
    const token = await refreshTokens.issue(clientId)
    now = new Date('2026-01-31T00:00:00.000Z')
    expect(await rejectionOf(refreshTokens.rotate(token))).toMatchObject({
      error: 'invalid_grant',
      message: 'Refresh token has expired',
    })
  })

  it('発行時に期限切れのレコードを削除する', async () => {
    const expired = await refreshTokens.issue(clientId)
    now = new Date('2026-02-05T00:00:00.000Z')
    const fresh = await refreshTokens.issue(clientId)

    expect(Object.keys(await store.readAll())).toEqual([sha256Hex(fresh)])
    expect(await store.get(sha256Hex(expired))).toBeNull()
  })

  it('ローテーション時に期限切れのレコードを削除し、期限内の使用済みレコードは残す', async () => {
    const expired = await refreshTokens.issue(clientId)
    now = new Date('2026-01-20T00:00:00.000Z')
    const token = await refreshTokens.issue(clientId)
    now = new Date('2026-02-05T00:00:00.000Z')

    const rotated = await refreshTokens.rotate(token)

    const keys = Object.keys(await store.readAll())
    expect(keys).toHaveLength(2)
    expect(keys).toContain(sha256Hex(token))
    expect(keys).toContain(sha256Hex(rotated.refreshToken))
    expect(await store.get(sha256Hex(expired))).toBeNull()
    expect(await rejectionOf(refreshTokens.rotate(token))).toMatchObject({
      error: 'invalid_grant',
      message: 'Refresh token has already been used',
    })
  })

  it('他のクライアントのトークンは invalid_grant', async () => {
    const token = await refreshTokens.issue(clientId)
    const other = (await clients.generate('Other')).client_id
    expect(await rejectionOf(refreshTokens.rotate(token, other))).toMatchObject({
      error: 'invalid_grant',
      message: 'Refresh token was issued to another client',
    })
  })

  it('無効化されたクライアントのトークンは invalid_grant', async () => {
    const token = await refreshTokens.issue(clientId)
    await clients.revoke(clientId)
    expect(await rejectionOf(refreshTokens.rotate(token))).toMatchObject({
      error: 'invalid_grant',
      message: 'Client is unknown or has been revoked',
    })
  })

  it('同時にローテーションしても成功するのは1回だけ', async () => {
    const token = await refreshTokens.issue(clientId)
    const results = await Promise.allSettled([refreshTokens.rotate(token), refreshTokens.rotate(token)])
    expect(results.filter((result) => result.status === 'fulfilled')).toHaveLength(1)
  })
})
