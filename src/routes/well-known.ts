/**
 * ディスカバリー用ルーティング
 * サフィックス付き（RFC 8414 §3.1 / RFC 9728 §3.1 のパス挿入形式）も同じハンドラーで扱う
 */
import { Router } from 'express'
import { AppContext } from '../context.js'
import {
  AUTHORIZATION_SERVER_METADATA_PATH,
  handleAuthorizationServerMetadata,
  handleOpenIdConfiguration,
  handleProtectedResourceMetadata,
  OPENID_CONFIGURATION_PATH,
  PROTECTED_RESOURCE_METADATA_PATH,
} from '../services/metadata.js'

const withSuffix = (path: string): string[] => [path, `${path}/*suffix`]

export function createWellKnownRouter(context: AppContext): Router {
  const router = Router()

  router.get(withSuffix(AUTHORIZATION_SERVER_METADATA_PATH), handleAuthorizationServerMetadata(context))
  router.get(withSuffix(OPENID_CONFIGURATION_PATH), handleOpenIdConfiguration(context))
  router.get(withSuffix(PROTECTED_RESOURCE_METADATA_PATH), handleProtectedResourceMetadata(context))

  return router
}
