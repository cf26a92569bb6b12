/**
 * OAuth2ルーティング
 * 各エンドポイントはサービス層の関数を呼び出して処理を行います。
 */
import { Router } from 'express'
import { AppContext } from '../context.js'
import { requireBearer } from '../middleware/bearerAuth.js'
import { handleAuthorize, handleAuthorizeDecision } from '../services/authorize.js'
import { handleInfo } from '../services/info.js'
import { handleToken } from '../services/token.js'

/**
 * OAuth2ルーターを作成する
 * @param context アプリケーションコンテキスト
 */
export function createOAuthRouter(context: AppContext): Router {
  const router = Router()

  /**
   * OAuth2認可エンドポイント（同意画面・同意結果）
   */
  router.get('/authorize', handleAuthorize(context))
  router.post('/authorize', handleAuthorizeDecision(context))

  /**
   * トークンエンドポイント
   */
  router.post('/token', handleToken(context))

  /**
   * トークン情報エンドポイント
   */
  router.get('/info', requireBearer(context), handleInfo)

  return router
}
