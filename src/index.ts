// 最初に環境変数を読み込む
import 'dotenv/config'
import { loadConfig } from './config.js'
import { registerGracefulShutdown, startServer } from './server.js'
import logger from './utils/logger.js'
import { isMainModule } from './utils/main-module.js'

export { createApp } from './app.js'
export type { AppOptions } from './app.js'
export { loadConfig } from './config.js'
export type { ServerConfig } from './config.js'
export { createContext } from './context.js'
export type { AppContext } from './context.js'
export { requireBearer } from './middleware/bearerAuth.js'
export { startServer } from './server.js'

/**
 * アプリケーションの起動（直接実行された場合のみ）
 */
if (isMainModule(import.meta.url)) {
  // 未処理のプロミス拒否をキャッチ
  process.on('unhandledRejection', (reason) => {
    logger.error(`Unhandled Rejection: ${reason instanceof Error ? reason.stack : String(reason)}`)
  })

  startServer(loadConfig())
    .then(registerGracefulShutdown)
    .catch((error: unknown) => {
      logger.error(`Failed to start application: ${error instanceof Error ? error.message : String(error)}`)
      process.exit(1)
    })
}
