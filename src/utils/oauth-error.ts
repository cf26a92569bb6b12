/**
 * OAuth 2.0 エラー定義
 * RFC 6749 §5.2 / RFC 6750 §3.1 のエラーコードを扱う
 */
import { Response } from 'express'
import logger from './logger.js'

export type OAuthErrorCode =
  | 'invalid_request'
  | 'invalid_client'
  | 'invalid_grant'
  | 'unsupported_grant_type'
  | 'unsupported_response_type'
  | 'invalid_token'
  | 'access_denied'
  | 'server_error'

/**
 * エラーコードごとのデフォルトHTTPステータス
 */
const DEFAULT_STATUS: Record<OAuthErrorCode, number> = {
  invalid_request: 400,
  invalid_client: 401,
  invalid_grant: 400,
  unsupported_grant_type: 400,
  unsupported_response_type: 400,
  invalid_token: 401,
  access_denied: 403,
  server_error: 500,
}

/**
 * クライアントに返却するOAuthエラー
 */
export class OAuthError extends Error {
  readonly error: OAuthErrorCode
  readonly status: number

  constructor(error: OAuthErrorCode, description: string, status: number = DEFAULT_STATUS[error]) {
    super(description)
    this.name = 'OAuthError'
    this.error = error
    this.status = status
  }

  /** error_description */
  get description(): string {
    return this.message
  }

  toJSON(): { error: OAuthErrorCode; error_description: string } {
    return { error: this.error, error_description: this.message }
  }
}

/**
 * 任意の例外をOAuthErrorへ変換する
 * OAuthError以外は内部情報を隠してserver_errorにする
 */
export function toOAuthError(err: unknown): OAuthError {
  if (err instanceof OAuthError) return err
  return new OAuthError('server_error', 'An unexpected error occurred')
}

/**
 * 共通のエラーレスポンス送信
 * @param res Expressレスポンス
 * @param err 例外
 * @param context ログの接頭辞（例: '/oauth/token'）
 */
export function sendOAuthError(res: Response, err: unknown, context: string): void {
  const oauthError = toOAuthError(err)
  if (oauthError.status >= 500) {
    logger.error(`${context} error: ${err instanceof Error ? err.stack || err.message : String(err)}`)
  } else {
    logger.warn(`${context} rejected: ${oauthError.error} - ${oauthError.message}`)
  }
  res.status(oauthError.status).json(oauthError.toJSON())
}
