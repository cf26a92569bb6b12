/**
 * アクセストークン（JWT）の発行・検証
 * - HS256、署名鍵はプロセス共通のシークレットキーファイル
 * - 検証のたびにクライアントの無効化状態を再確認する（無効化は即時反映）
 */
import jwt from 'jsonwebtoken'
import { v4 as uuidv4 } from 'uuid'
import { AccessTokenClaimsSchema } from '../db/schemas.js'
import { SecretKeyStore } from '../db/secret-key.js'
import { ClientRegistry } from '../services/client-registry.js'
import { RefreshTokenStore, RotatedRefreshToken } from '../services/refresh-token-store.js'
import { AccessTokenClaims, IssuedAccessToken } from '../types/jwt.types.js'
import logger from './logger.js'
import { OAuthError } from './oauth-error.js'

/**
 * 署名アルゴリズム
 */
const JWT_ALGORITHM = 'HS256'

export interface TokenIssuerOptions {
  secretKeys: SecretKeyStore
  clients: ClientRegistry
  refreshTokens: RefreshTokenStore
  /** アクセストークンの有効期限（秒） */
  accessTokenTtl: number
}

export class TokenIssuer {
  private readonly secretKeys: SecretKeyStore
  private readonly clients: ClientRegistry
  private readonly refreshTokens: RefreshTokenStore
  readonly accessTokenTtl: number

  constructor(options: TokenIssuerOptions) {
    this.secretKeys = options.secretKeys
    this.clients = options.clients
    this.refreshTokens = options.refreshTokens
    this.accessTokenTtl = options.accessTokenTtl
  }

  /**
   * アクセストークンを発行する
   * @param clientId クライアントID
   */
  async issueAccessToken(clientId: string): Promise<IssuedAccessToken> {
    const client = await this.clients.get(clientId)
    if (!client) {
      throw new OAuthError('invalid_client', 'Invalid client_id')
    }

    const secretKey = await this.secretKeys.getSecretKey()
    const token = jwt.sign({ name: client.name, type: 'access_token' }, secretKey, {
      algorithm: JWT_ALGORITHM,
      subject: clientId,
      expiresIn: this.accessTokenTtl,
      jwtid: uuidv4(),
    })

    logger.info(`Access token issued for client: ${clientId}`)
    return { token, expiresIn: this.accessTokenTtl }
  }

  /**
   * リフレッシュトークンを発行する
   * @param clientId クライアントID
   * @param scope 引き継ぐスコープ
   */
  async issueRefreshToken(clientId: string, scope?: string): Promise<string> {
    return this.refreshTokens.issue(clientId, scope)
  }

  /**
   * リフレッシュトークンをローテーションする
   * @param refreshToken 提示されたリフレッシュトークン
   * @param clientId リクエストで指定されたクライアントID（任意）
   */
  async rotateRefreshToken(refreshToken: string, clientId?: string): Promise<RotatedRefreshToken> {
    return this.refreshTokens.rotate(refreshToken, clientId)
  }

  /**
   * アクセストークンを検証する
   * 署名不正・期限切れ・形式不正・クライアント不明/無効化はすべて null（例外は投げない）
   * @param token アクセストークン
   */
  async verify(token: string): Promise<AccessTokenClaims | null> {
    try {
      const secretKey = await this.secretKeys.getSecretKey()
      const decoded = jwt.verify(token, secretKey, { algorithms: [JWT_ALGORITHM] })
      const parsed = AccessTokenClaimsSchema.safeParse(decoded)
      if (!parsed.success) {
        logger.debug('Access token rejected: unexpected claims')
        return null
      }

      // 無効化状態はキャッシュせず毎回確認する
      if (!(await this.clients.isActive(parsed.data.sub))) {
        logger.warn(`Access token rejected: client unknown or revoked: ${parsed.data.sub}`)
        return null
      }
      return parsed.data
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        logger.debug('Access token rejected: expired')
      } else if (error instanceof jwt.JsonWebTokenError) {
        logger.debug(`Access token rejected: ${error.message}`)
      } else {
        logger.error(`Access token verification error: ${error instanceof Error ? error.message : String(error)}`)
      }
      return null
    }
  }
}
