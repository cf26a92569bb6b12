/**
 * アクセストークン（JWT）のクレーム定義
 */
import { z } from 'zod'
import { AccessTokenClaimsSchema } from '../db/schemas.js'

/**
 * アクセストークンのペイロード
 * - sub: クライアントID
 * - name: クライアント名
 * - type: 'access_token' 固定
 * - iat / exp: 発行時刻・有効期限（UNIX秒）
 * - jti: トークンID
 */
export type AccessTokenClaims = z.infer<typeof AccessTokenClaimsSchema>

/**
 * 発行したアクセストークン
 */
export interface IssuedAccessToken {
  token: string
  /** 有効期間（秒） */
  expiresIn: number
}
