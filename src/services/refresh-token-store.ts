/**
 * リフレッシュトークンストア
 * 不透明なトークンを発行し、SHA-256ダイジェストをキーに保存する。
 * 使用時はローテーション（旧トークンを無効化し新トークンを発行）する。
 */
import { randomBytes } from 'crypto'
import { JsonFileStore } from '../db/file-store.js'
import { GrantResult, RefreshTokenRecord } from '../types/oauth.types.js'
import logger from '../utils/logger.js'
import { OAuthError } from '../utils/oauth-error.js'
import { sha256Hex } from '../utils/pkce.js'
import { addSeconds } from '../utils/time.js'
import { ClientRegistry } from './client-registry.js'

/**
 * リフレッシュトークンのバイト長
 */
const REFRESH_TOKEN_BYTES = 48

export interface RefreshTokenStoreOptions {
  store: JsonFileStore<RefreshTokenRecord>
  clients: ClientRegistry
  /** 有効期限（秒） */
  ttlSeconds: number
  now?: () => Date
}

/**
 * ローテーション結果
 */
export interface RotatedRefreshToken extends GrantResult {
  /** 新しいリフレッシュトークン */
  refreshToken: string
}

export class RefreshTokenStore {
  private readonly store: JsonFileStore<RefreshTokenRecord>
  private readonly clients: ClientRegistry
  private readonly ttlSeconds: number
  private readonly now: () => Date

  constructor(options: RefreshTokenStoreOptions) {
    this.store = options.store
    this.clients = options.clients
    this.ttlSeconds = options.ttlSeconds
    this.now = options.now ?? (() => new Date())
  }

  /**
   * リフレッシュトークンを発行する
   * @param clientId クライアントID
   * @param scope 引き継ぐスコープ
   */
  async issue(clientId: string, scope?: string): Promise<string> {
    const token = createRefreshToken()
    await this.store.update((records) => {
      pruneExpired(records, this.now())
      records[sha256Hex(token)] = this.createRecord(clientId, scope)
    })
    return token
  }

  /**
   * リフレッシュトークンをローテーションする
   * 不明・使用済み・期限切れ・所有クライアント不一致・クライアント無効化は invalid_grant
   * @param token 提示されたリフレッシュトークン
   * @param expectedClientId リクエストで指定されたクライアントID（任意）
   */
  async rotate(token: string, expectedClientId?: string): Promise<RotatedRefreshToken> {
    const key = sha256Hex(token)
    const current = await this.store.get(key)
    if (!current) {
      throw new OAuthError('invalid_grant', 'Invalid refresh token')
    }
    if (expectedClientId && current.client_id !== expectedClientId) {
      throw new OAuthError('invalid_grant', 'Refresh token was issued to another client')
    }
    if (!(await this.clients.isActive(current.client_id))) {
      throw new OAuthError('invalid_grant', 'Client is unknown or has been revoked')
    }

    const newToken = createRefreshToken()
    const result = await this.store.update((records) => {
      const record = Object.hasOwn(records, key) ? records[key] : undefined
      if (!record) {
        throw new OAuthError('invalid_grant', 'Invalid refresh token')
      }
      if (record.rotated) {
        logger.warn(`Refresh token reuse detected: client_id=${record.client_id}`)
        throw new OAuthError('invalid_grant', 'Refresh token has already been used')
      }
      const now = this.now()
      if (Date.parse(record.expires_at) <= now.getTime()) {
        throw new OAuthError('invalid_grant', 'Refresh token has expired')
      }

      pruneExpired(records, now)
      record.rotated = true
      record.rotated_at = now.toISOString()
      records[sha256Hex(newToken)] = this.createRecord(record.client_id, record.scope)

      const rotated: RotatedRefreshToken = { clientId: record.client_id, refreshToken: newToken }
      if (record.scope) rotated.scope = record.scope
      return rotated
    })

    logger.info(`Refresh token rotated: client_id=${result.clientId}`)
    return result
  }

  private createRecord(clientId: string, scope?: string): RefreshTokenRecord {
    const createdAt = this.now()
    const record: RefreshTokenRecord = {
      client_id: clientId,
      created_at: createdAt.toISOString(),
      expires_at: addSeconds(createdAt, this.ttlSeconds).toISOString(),
      rotated: false,
    }
    if (scope) record.scope = scope
    return record
  }
}

/**
 * 期限切れのレコードを削除する
 * ローテーション済みでも期限内のものは再利用検知のため残す
 */
function pruneExpired(records: Record<string, RefreshTokenRecord>, now: Date): void {
  for (const [key, record] of Object.entries(records)) {
    if (Date.parse(record.expires_at) <= now.getTime()) {
      delete records[key]
    }
  }
}

function createRefreshToken(): string {
  return randomBytes(REFRESH_TOKEN_BYTES).toString('base64url')
}
