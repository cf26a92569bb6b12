/**
 * アプリケーションコンテキスト
 * 設定から各ストア・サービスを組み立てる。シングルトンは持たず、明示的に受け渡す。
 */
import path from 'path'
import { ServerConfig } from './config.js'
import { JsonFileStore } from './db/file-store.js'
import { AuthCodeRecordSchema, ClientRecordSchema, RefreshTokenRecordSchema } from './db/schemas.js'
import { SecretKeyStore } from './db/secret-key.js'
import { AuthCodeStore } from './services/auth-code-store.js'
import { ClientRegistry } from './services/client-registry.js'
import { CredentialHasher } from './services/credential-hasher.js'
import { RefreshTokenStore } from './services/refresh-token-store.js'
import { TokenIssuer } from './utils/jwt.js'
import { RedirectUriPolicy } from './utils/redirect-uri.js'

/**
 * 永続化ファイル名
 */
export const STORE_FILES = {
  clients: 'clients.json',
  authCodes: 'auth_codes.json',
  refreshTokens: 'refresh_tokens.json',
  secretKey: 'secret_key.txt',
} as const

export interface AppContext {
  config: ServerConfig
  clients: ClientRegistry
  authCodes: AuthCodeStore
  tokens: TokenIssuer
  redirectPolicy: RedirectUriPolicy
}

export interface ContextOptions {
  /** ハッシュ方式の差し替え（テスト用） */
  hasher?: CredentialHasher
  /** 現在時刻（テスト用） */
  now?: () => Date
}

/**
 * 設定からコンテキストを作成する
 * ファイルは初回アクセス時に作成される
 * @param config サーバー設定
 */
export function createContext(config: ServerConfig, options: ContextOptions = {}): AppContext {
  const file = (name: string): string => path.join(config.dataDir, name)
  const now = options.now ?? (() => new Date())

  const hasher =
    options.hasher ??
    new CredentialHasher({ bcryptRounds: config.bcryptRounds, pbkdf2Iterations: config.pbkdf2Iterations })
  const clients = new ClientRegistry(new JsonFileStore(file(STORE_FILES.clients), ClientRecordSchema), hasher, now)
  const redirectPolicy = new RedirectUriPolicy(config.redirect)

  const authCodes = new AuthCodeStore({
    store: new JsonFileStore(file(STORE_FILES.authCodes), AuthCodeRecordSchema),
    clients,
    redirectPolicy,
    ttlSeconds: config.authCodeTtl,
    now,
  })
  const refreshTokens = new RefreshTokenStore({
    store: new JsonFileStore(file(STORE_FILES.refreshTokens), RefreshTokenRecordSchema),
    clients,
    ttlSeconds: config.refreshTokenTtl,
    now,
  })
  const tokens = new TokenIssuer({
    secretKeys: new SecretKeyStore(file(STORE_FILES.secretKey)),
    clients,
    refreshTokens,
    accessTokenTtl: config.accessTokenTtl,
  })

  return { config, clients, authCodes, tokens, redirectPolicy }
}
