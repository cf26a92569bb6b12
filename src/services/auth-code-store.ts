/**
 * 認可コードストア
 * 認可コード → リダイレクトURI・PKCEチャレンジ の対応を保持する。
 * - 有効期限は発行から authCodeTtl 秒（既定10分）
 * - 引き換えは一度だけ。使用済みのコードも監査用に残す
 */
import { randomBytes } from 'crypto'
import { JsonFileStore } from '../db/file-store.js'
import {
  AuthCodeRecord,
  GrantResult,
  IssueAuthCodeParams,
  RedeemAuthCodeParams,
} from '../types/oauth.types.js'
import logger from '../utils/logger.js'
import { OAuthError } from '../utils/oauth-error.js'
import { isCodeChallengeMethod, sha256Hex, verifyPKCE } from '../utils/pkce.js'
import { RedirectUriPolicy } from '../utils/redirect-uri.js'
import { addSeconds } from '../utils/time.js'
import { ClientRegistry } from './client-registry.js'

/**
 * 認可コードのバイト長
 */
const AUTH_CODE_BYTES = 32

export interface AuthCodeStoreOptions {
  store: JsonFileStore<AuthCodeRecord>
  clients: ClientRegistry
  redirectPolicy: RedirectUriPolicy
  /** 有効期限（秒） */
  ttlSeconds: number
  now?: () => Date
}

export class AuthCodeStore {
  private readonly store: JsonFileStore<AuthCodeRecord>
  private readonly clients: ClientRegistry
  private readonly redirectPolicy: RedirectUriPolicy
  private readonly ttlSeconds: number
  private readonly now: () => Date

  constructor(options: AuthCodeStoreOptions) {
    this.store = options.store
    this.clients = options.clients
    this.redirectPolicy = options.redirectPolicy
    this.ttlSeconds = options.ttlSeconds
    this.now = options.now ?? (() => new Date())
  }

  /**
   * 認可コードを発行する
   * 検証はすべて保存前に行う
   * @returns 認可コード（平文はこの時だけ）
   */
  async issue(params: IssueAuthCodeParams): Promise<string> {
    const { clientId, redirectUri, codeChallenge, codeChallengeMethod, scope } = params

    if (!(await this.clients.isActive(clientId))) {
      throw new OAuthError('invalid_client', 'Unknown or revoked client', 400)
    }
    if (!this.redirectPolicy.isAllowed(redirectUri)) {
      throw new OAuthError('invalid_request', 'redirect_uri is not allowed')
    }
    if (!codeChallenge) {
      throw new OAuthError('invalid_request', 'code_challenge is required')
    }
    if (!isCodeChallengeMethod(codeChallengeMethod)) {
      throw new OAuthError('invalid_request', "code_challenge_method must be 'S256' or 'plain'")
    }

    const code = randomBytes(AUTH_CODE_BYTES).toString('base64url')
    const createdAt = this.now()
    const record: AuthCodeRecord = {
      client_id: clientId,
      redirect_uri: redirectUri,
      code_challenge: codeChallenge,
      code_challenge_method: codeChallengeMethod,
      created_at: createdAt.toISOString(),
      expires_at: addSeconds(createdAt, this.ttlSeconds).toISOString(),
      used: false,
    }
    if (scope) record.scope = scope

    await this.store.update((records) => {
      records[sha256Hex(code)] = record
    })

    logger.info(`Authorization code issued: client_id=${clientId}`)
    return code
  }

  /**
   * 認可コードを引き換える
   * 不明・使用済み・期限切れ・client_id/redirect_uri不一致・PKCE不一致は invalid_grant
   * 成功時は返却前に使用済みへ更新する
   */
  async redeem(params: RedeemAuthCodeParams): Promise<GrantResult> {
    const { code, clientId, redirectUri, codeVerifier } = params
    const key = sha256Hex(code)

    return this.store.update((records) => {
      const record = Object.hasOwn(records, key) ? records[key] : undefined
      if (!record) {
        throw new OAuthError('invalid_grant', 'Invalid authorization code')
      }
      if (record.used) {
        logger.warn(`Authorization code replay detected: client_id=${record.client_id}`)
        throw new OAuthError('invalid_grant', 'Authorization code has already been used')
      }
      const now = this.now()
      if (Date.parse(record.expires_at) <= now.getTime()) {
        throw new OAuthError('invalid_grant', 'Authorization code has expired')
      }
      if (record.client_id !== clientId) {
        throw new OAuthError('invalid_grant', 'Authorization code was issued to another client')
      }
      if (record.redirect_uri !== redirectUri) {
        throw new OAuthError('invalid_grant', 'redirect_uri does not match the authorization request')
      }
      if (!verifyPKCE(codeVerifier, record.code_challenge, record.code_challenge_method)) {
        throw new OAuthError('invalid_grant', 'code_verifier does not match code_challenge')
      }

      record.used = true
      record.used_at = now.toISOString()

      const result: GrantResult = { clientId: record.client_id }
      if (record.scope) result.scope = record.scope
      return result
    })
  }
}
