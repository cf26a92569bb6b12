/**
 * Bearer認証ミドルウェア（RFC 6750）
 * 保護リソースの前段に置き、アクセストークンを検証する。
 * 失敗時は WWW-Authenticate に保護リソースメタデータの場所を含める（RFC 9728 §5.1）
 */
import { NextFunction, Request, RequestHandler, Response } from 'express'
import { AppContext } from '../context.js'
import { getBaseUrl, PROTECTED_RESOURCE_METADATA_PATH } from '../services/metadata.js'
import logger from '../utils/logger.js'
import { OAuthError, OAuthErrorCode } from '../utils/oauth-error.js'
import { parseBearerToken } from '../utils/params.js'

/**
 * WWW-Authenticate ヘッダー値を組み立てる
 * @param error エラーコード
 * @param description エラー詳細
 * @param resourceMetadata 保護リソースメタデータのURL
 */
export function buildBearerChallenge(error: OAuthErrorCode, description: string, resourceMetadata: string): string {
  const quote = (value: string): string => value.replace(/["\\]/g, '\\$&')
  return `Bearer error="${quote(error)}", error_description="${quote(description)}", resource_metadata="${quote(resourceMetadata)}"`
}

/**
 * Bearerトークンを要求するミドルウェアを作成する
 * 成功時は res.locals.tokenClaims に検証済みクレームを設定する
 * @param context アプリケーションコンテキスト
 */
export function requireBearer(context: AppContext): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    // CORSプリフライトは認証不要
    if (req.method === 'OPTIONS') {
      next()
      return
    }

    const reject = (error: OAuthError): void => {
      const resourceMetadata = `${getBaseUrl(req, context.config.pathPrefix)}${PROTECTED_RESOURCE_METADATA_PATH}`
      res.set('WWW-Authenticate', buildBearerChallenge(error.error, error.message, resourceMetadata))
      res.status(error.status).json(error.toJSON())
    }

    const token = parseBearerToken(req.get('authorization'))
    if (!token) {
      logger.debug(`Bearer token missing: ${req.method} ${req.path}`)
      reject(new OAuthError('invalid_request', 'Missing or invalid Authorization header', 401))
      return
    }

    try {
      const claims = await context.tokens.verify(token)
      if (!claims) {
        reject(new OAuthError('invalid_token', 'The access token is invalid or has expired'))
        return
      }
      res.locals.tokenClaims = claims
    } catch (err) {
      next(err)
      return
    }
    next()
  }
}
