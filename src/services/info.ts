/**
 * トークン情報を取得するためのサービス
 * requireBearer の後段で呼ばれ、検証済みクレームを返す
 */
import { Request, Response } from 'express'
import { AccessTokenClaims } from '../types/jwt.types.js'
import { OAuthError, sendOAuthError } from '../utils/oauth-error.js'

/**
 * /oauth/info のレスポンス
 */
export interface TokenInfo {
  client_id: string
  client_name: string
  /** exp（UNIX秒） */
  expires_at: number
  /** iat（UNIX秒） */
  issued_at: number
}

/**
 * トークン情報を取得するためのハンドラー
 * @param req リクエストオブジェクト
 * @param res レスポンスオブジェクト
 */
export function handleInfo(req: Request, res: Response): void {
  const claims: AccessTokenClaims | undefined = res.locals.tokenClaims
  if (!claims) {
    // requireBearer を通さずにマウントされた場合
    sendOAuthError(res, new OAuthError('invalid_token', 'The access token is missing'), '/oauth/info')
    return
  }

  const info: TokenInfo = {
    client_id: claims.sub,
    client_name: claims.name,
    expires_at: claims.exp,
    issued_at: claims.iat,
  }
  res.json(info)
}
