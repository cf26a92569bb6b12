/**
 * HTTPサーバーの起動・停止
 */
import { RequestHandler } from 'express'
import { once } from 'events'
import { createServer, Server } from 'http'
import { ServerConfig } from './config.js'
import { createContext } from './context.js'
import { createApp } from './app.js'
import logger from './utils/logger.js'

export interface StartServerOptions {
  /** Bearer認証で保護する下流ハンドラー */
  downstream?: RequestHandler
}

/**
 * サーバーを起動する
 * @param config サーバー設定
 * @returns listen 済みの HTTP サーバー
 */
export async function startServer(config: ServerConfig, options: StartServerOptions = {}): Promise<Server> {
  const context = createContext(config)
  const app = createApp(context, options)

  const server = createServer(app)
  server.listen(config.port, config.host)
  // EADDRINUSE などは 'error' イベントで reject される
  await once(server, 'listening')

  const base = `http://${config.host}:${config.port}${config.pathPrefix}`
  logger.info(`Server running on ${base}`)
  logger.info(`Data directory: ${config.dataDir}`)
  logger.info(`Redirect URI policy: ${context.redirectPolicy.describe()}`)
  logger.info(`Client secret hashing: ${await context.clients.hashScheme()}`)
  logger.info(`API endpoints:`)
  logger.info(`  GET  /health - Health check`)
  logger.info(`  GET  /.well-known/oauth-authorization-server - Authorization server metadata`)
  logger.info(`  GET  /.well-known/oauth-protected-resource - Protected resource metadata`)
  logger.info(`  GET  /oauth/authorize - Consent page`)
  logger.info(`  POST /oauth/token - Token endpoint`)
  logger.info(`  GET  /oauth/info - Token info`)
  if (options.downstream) {
    logger.info(`  *    ${config.resourcePath} - Protected resource`)
  }
  return server
}

/**
 * シグナル受信時にサーバーを停止するハンドラーを登録する
 * @param server HTTPサーバー
 */
export function registerGracefulShutdown(server: Server): void {
  const shutdown = (signal: string): void => {
    logger.info(`${signal} received, shutting down gracefully`)
    server.close((error) => {
      if (error) {
        logger.error(`Error during shutdown: ${error.message}`)
        process.exit(1)
      }
      process.exit(0)
    })
    server.closeAllConnections()
  }
  process.once('SIGTERM', () => shutdown('SIGTERM'))
  process.once('SIGINT', () => shutdown('SIGINT'))
}
