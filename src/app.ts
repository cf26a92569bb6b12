/**
 * Expressアプリケーションの組み立て
 * サーバー起動（server.ts）とテストの両方から使う
 */
import cors from 'cors'
import express, { Express, NextFunction, Request, RequestHandler, Response } from 'express'
import { AppContext } from './context.js'
import { requireBearer } from './middleware/bearerAuth.js'
import healthRoutes from './routes/health.js'
import { createOAuthRouter } from './routes/oauth.js'
import { createWellKnownRouter } from './routes/well-known.js'
import logger from './utils/logger.js'
import { OAuthError, sendOAuthError } from './utils/oauth-error.js'

export interface AppOptions {
  /** Bearer認証の後段に置く保護リソース（ゲートウェイ本体） */
  downstream?: RequestHandler
}

/**
 * Expressアプリケーションを作成する
 * @param context アプリケーションコンテキスト
 * @param options オプション
 */
export function createApp(context: AppContext, options: AppOptions = {}): Express {
  const { config } = context
  const app = express()

  app.disable('x-powered-by')
  app.set('trust proxy', config.trustProxy)

  // ミドルウェア設定
  app.use(
    cors({
      origin: config.corsOrigins.length > 0 ? config.corsOrigins : '*',
      methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'Mcp-Session-Id', 'Mcp-Protocol-Version'],
      exposedHeaders: ['WWW-Authenticate', 'Mcp-Session-Id'],
    }),
  )

  // ログミドルウェア
  app.use((req, res, next) => {
    logger.info(`${req.method} ${req.path} - ${req.ip}`)
    next()
  })

  app.use(express.json({ limit: '1mb' }))
  app.use(express.urlencoded({ extended: false }))

  // ルート設定
  app.use(createWellKnownRouter(context))
  app.use('/oauth', createOAuthRouter(context))
  app.use('/health', healthRoutes)

  if (options.downstream) {
    app.use(config.resourcePath, requireBearer(context), options.downstream)
  }

  // 404ハンドラー
  app.use((req, res) => {
    logger.warn(`404 - ${req.method} ${req.originalUrl}`)
    res.status(404).json({ error: 'not_found' })
  })

  // エラーハンドラー
  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err)
      return
    }
    if (isClientError(err)) {
      // ボディのJSON/フォーム解析エラーなど
      sendOAuthError(res, new OAuthError('invalid_request', 'Malformed request body'), `${req.method} ${req.path}`)
      return
    }
    sendOAuthError(res, err, `${req.method} ${req.path}`)
  })

  return app
}

/**
 * body-parser 等が付与する 4xx ステータスを持つエラーか
 */
function isClientError(err: unknown): boolean {
  if (typeof err !== 'object' || err === null || !('status' in err)) return false
  return typeof err.status === 'number' && err.status >= 400 && err.status < 500
}
