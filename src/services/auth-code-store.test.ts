import fs from 'fs/promises'
import path from 'path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { JsonFileStore } from '../db/file-store.js'
import { AuthCodeRecordSchema, ClientRecordSchema } from '../db/schemas.js'
import { AuthCodeRecord, IssueAuthCodeParams } from '../types/oauth.types.js'
import { createTempDir, createTestHasher, removeTempDir } from '../test/helpers.js'
import { OAuthError } from '../utils/oauth-error.js'
import { calculatePKCEChallenge, sha256Hex } from '../utils/pkce.js'
import { RedirectUriPolicy } from '../utils/redirect-uri.js'
import { AuthCodeStore } from './auth-code-store.js'
import { ClientRegistry } from './client-registry.js'

vi.mock('../utils/logger.js', () => ({
  default: {
    error: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
  },
}))

const REDIRECT_URI = 'https://claude.ai/api/mcp/auth_callback'
const VERIFIER = 'test-code-verifier-0123456789-abcdefghijklmnop'

describe('AuthCodeStore', () => {
  let dir: string
  let now: Date
  let clients: ClientRegistry
  let store: JsonFileStore<AuthCodeRecord>
  let authCodes: AuthCodeStore
  let clientId: string

  const issueParams = (overrides: Partial<IssueAuthCodeParams> = {}): IssueAuthCodeParams => ({
    clientId,
    redirectUri: REDIRECT_URI,
    codeChallenge: calculatePKCEChallenge(VERIFIER, 'S256'),
    codeChallengeMethod: 'S256',
    ...overrides,
  })

  const expectOAuthError = async (promise: Promise<unknown>, error: string, description?: string) => {
    const rejection = await promise.then(
      () => null,
      (err: unknown) => err,
    )
    expect(rejection).toBeInstanceOf(OAuthError)
    expect(rejection).toMatchObject(description ? { error, message: description } : { error })
  }

  beforeEach(async () => {
    dir = await createTempDir()
    now = new Date('2026-01-01T00:00:00.000Z')
    clients = new ClientRegistry(
      new JsonFileStore(path.join(dir, 'clients.json'), ClientRecordSchema),
      createTestHasher(),
      () => now,
    )
    store = new JsonFileStore(path.join(dir, 'auth_codes.json'), AuthCodeRecordSchema)
    authCodes = new AuthCodeStore({
      store,
      clients,
      redirectPolicy: new RedirectUriPolicy({ allowAny: false, allowlist: [] }),
      ttlSeconds: 600,
      now: () => now,
    })
    clientId = (await clients.generate('Claude')).client_id
  })

  afterEach(async () => {
    await removeTempDir(dir)
  })

  describe('issue', () => {
    it('コードを発行し、ダイジェストをキーに保存する', async () => {
      const code = await authCodes.issue(issueParams({ scope: 'memory' }))
      expect(code).toMatch(/^[A-Za-z0-9_-]{43}$/)

      const raw = await fs.readFile(path.join(dir, 'auth_codes.json'), 'utf8')
      expect(raw).not.toContain(code)
      expect(await store.get(sha256Hex(code))).toEqual({
        client_id: clientId,
        redirect_uri: REDIRECT_URI,
        scope: 'memory',
        code_challenge: calculatePKCEChallenge(VERIFIER, 'S256'),
        code_challenge_method: 'S256',
        created_at: '2026-01-01T00:00:00.000Z',
        expires_at: '2026-01-01T00:10:00.000Z',
        used: false,
      })
    })

    it('不明・無効化されたクライアントは invalid_client（400）', async () => {
      await expectOAuthError(authCodes.issue(issueParams({ clientId: 'smc_unknown' })), 'invalid_client')
      await clients.revoke(clientId)
      const rejection = await authCodes.issue(issueParams()).catch((err: unknown) => err)
      expect(rejection).toMatchObject({ error: 'invalid_client', status: 400 })
    })

    it('許可されていないリダイレクトURIは invalid_request', async () => {
      await expectOAuthError(
        authCodes.issue(issueParams({ redirectUri: 'https://evil.example/cb' })),
        'invalid_request',
        'redirect_uri is not allowed',
      )
    })

    it('code_challenge が空の場合は invalid_request', async () => {
      await expectOAuthError(
        authCodes.issue(issueParams({ codeChallenge: '' })),
        'invalid_request',
        'code_challenge is required',
      )
    })

    it('未対応の code_challenge_method は invalid_request', async () => {
      await expectOAuthError(
        authCodes.issue(issueParams({ codeChallengeMethod: 'S512' })),
        'invalid_request',
        "code_challenge_method must be 'S256' or 'plain'",
      )
    })

    it('検証に失敗した場合は何も保存しない', async () => {
      await authCodes.issue(issueParams({ codeChallenge: '' })).catch(() => undefined)
      expect(await store.readAll()).toEqual({})
    })
  })

  describe('redeem', () => {
    it('一度だけ引き換えられる', async () => {
      const code = await authCodes.issue(issueParams({ scope: 'memory' }))
      const redeemParams = { code, clientId, redirectUri: REDIRECT_URI, codeVerifier: VERIFIER }

      expect(await authCodes.redeem(redeemParams)).toEqual({ clientId, scope: 'memory' })
      expect(await store.get(sha256Hex(code))).toMatchObject({ used: true, used_at: '2026-01-01T00:00:00.000Z' })
      await expectOAuthError(authCodes.redeem(redeemParams), 'invalid_grant', 'Authorization code has already been used')
    })

    it('同時に引き換えても成功するのは1回だけ', async () => {
      const code = await authCodes.issue(issueParams())
      const redeemParams = { code, clientId, redirectUri: REDIRECT_URI, codeVerifier: VERIFIER }
      const results = await Promise.allSettled([
        authCodes.redeem(redeemParams),
        authCodes.redeem(redeemParams),
        authCodes.redeem(redeemParams),
      ])
      expect(results.filter((result) => result.status === 'fulfilled')).toHaveLength(1)
    })

    it('scope が無い場合は含めない', async () => {
      const code = await authCodes.issue(issueParams())
      expect(await authCodes.redeem({ code, clientId, redirectUri: REDIRECT_URI, codeVerifier: VERIFIER })).toEqual({
        clientId,
      })
    })

    it('plain メソッドも検証できる', async () => {
      const code = await authCodes.issue(issueParams({ codeChallenge: VERIFIER, codeChallengeMethod: 'plain' }))
      expect(await authCodes.redeem({ code, clientId, redirectUri: REDIRECT_URI, codeVerifier: VERIFIER })).toEqual({
        clientId,
      })
    })

    it('不明なコードは invalid_grant', async () => {
      await expectOAuthError(
        authCodes.redeem({ code: 'unknown', clientId, redirectUri: REDIRECT_URI, codeVerifier: VERIFIER }),
        'invalid_grant',
        'Invalid authorization code',
      )
    })

    it('期限切れは invalid_grant', async () => {
      const code = await authCodes.issue(issueParams())
      now = new Date('2026-01-01T00:10:00.000Z')
      await expectOAuthError(
        authCodes.redeem({ code, clientId, redirectUri: REDIRECT_URI, codeVerifier: VERIFIER }),
        'invalid_grant',
        'Authorization code has expired',
      )
    })

    it('client_id 不一致は invalid_grant', async () => {
      const code = await authCodes.issue(issueParams())
      const other = (await clients.generate('Other')).client_id
      await expectOAuthError(
        authCodes.redeem({ code, clientId: other, redirectUri: REDIRECT_URI, codeVerifier: VERIFIER }),
        'invalid_grant',
        'Authorization code was issued to another client',
      )
    })

    it('redirect_uri 不一致は invalid_grant', async () => {
      const code = await authCodes.issue(issueParams())
      await expectOAuthError(
        authCodes.redeem({
          code,
          clientId,
          redirectUri: 'https://claude.com/api/mcp/auth_callback',
          codeVerifier: VERIFIER,
        }),
        'invalid_grant',
        'redirect_uri does not match the authorization request',
      )
    })

    it('PKCE 不一致は invalid_grant で、コードは未使用のまま', async () => {
      const code = await authCodes.issue(issueParams())
      await expectOAuthError(
        authCodes.redeem({ code, clientId, redirectUri: REDIRECT_URI, codeVerifier: 'wrong-verifier' }),
        'invalid_grant',
        'code_verifier does not match code_challenge',
      )
      expect(await store.get(sha256Hex(code))).toMatchObject({ used: false })
    })
  })
})
