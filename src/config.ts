/**
 * サーバー設定
 * 環境変数は起動時に一度だけ解決し、各コンポーネントへ注入する
 */
import os from 'os'
import path from 'path'
import { parseTimeToSeconds } from './utils/time.js'

export interface RedirectUriConfig {
  /** 開発用: すべてのリダイレクトURIを許可 */
  allowAny: boolean
  /** 明示的な許可リスト（完全一致）。空の場合は組み込みのデフォルトを使用 */
  allowlist: string[]
}

export interface ServerConfig {
  port: number
  host: string
  /** 永続化ディレクトリ */
  dataDir: string
  /** 外部に公開されるパスのプレフィックス（'' または '/xxx'） */
  pathPrefix: string
  /** Bearer認証で保護するリソースのパス */
  resourcePath: string
  redirect: RedirectUriConfig
  /** アクセストークンの有効期限（秒） */
  accessTokenTtl: number
  /** リフレッシュトークンの有効期限（秒） */
  refreshTokenTtl: number
  /** 認可コードの有効期限（秒） */
  authCodeTtl: number
  bcryptRounds: number
  pbkdf2Iterations: number
  trustProxy: boolean
  /** CORS許可オリジン。空の場合はすべて許可 */
  corsOrigins: string[]
}

export const DEFAULT_DATA_DIR = path.join(os.homedir(), '.memory-gateway', 'oauth')

type Env = Record<string, string | undefined>

/**
 * 環境変数から設定を読み込む
 * @param env 環境変数（テストでは任意のオブジェクトを渡す）
 */
export function loadConfig(env: Env = process.env): ServerConfig {
  return Object.freeze({
    port: parseInteger(env.PORT, 8080),
    host: env.HOST?.trim() || '127.0.0.1',
    dataDir: resolveDataDir(env.OAUTH_DIR),
    pathPrefix: normalizePath(env.OAUTH_PATH_PREFIX),
    resourcePath: normalizePath(env.OAUTH_RESOURCE_PATH) || '/mcp',
    redirect: {
      allowAny: parseBoolean(env.OAUTH_ALLOW_ANY_REDIRECT_URI),
      allowlist: parseList(env.OAUTH_ALLOWED_REDIRECT_URIS),
    },
    accessTokenTtl: parseTimeToSeconds(env.ACCESS_TOKEN_TTL, 3600),
    refreshTokenTtl: parseTimeToSeconds(env.REFRESH_TOKEN_TTL, 30 * 86400),
    authCodeTtl: parseTimeToSeconds(env.AUTH_CODE_TTL, 600),
    bcryptRounds: clamp(parseInteger(env.BCRYPT_ROUNDS, 12), 4, 31),
    pbkdf2Iterations: Math.max(parseInteger(env.PBKDF2_ITERATIONS, 600_000), 1000),
    trustProxy: parseBoolean(env.TRUST_PROXY),
    corsOrigins: parseList(env.CORS_ORIGIN),
  })
}

/**
 * 真偽値の環境変数を解釈する（1/true/yes/on）
 */
export function parseBoolean(value: string | undefined): boolean {
  return ['1', 'true', 'yes', 'on'].includes((value ?? '').trim().toLowerCase())
}

/**
 * カンマ区切りのリストを解釈する（空要素は除外）
 */
export function parseList(value: string | undefined): string[] {
  if (!value) return []
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
}

/**
 * パスを正規化する
 * 例: 'memory/' → '/memory'、'/' や未指定 → ''
 */
export function normalizePath(value: string | undefined): string {
  const trimmed = (value ?? '').trim().replace(/^\/+|\/+$/g, '')
  return trimmed ? `/${trimmed}` : ''
}

function parseInteger(value: string | undefined, fallback: number): number {
  if (!value || !/^\d+$/.test(value.trim())) return fallback
  return parseInt(value, 10)
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max)
}

function resolveDataDir(value: string | undefined): string {
  const dir = value?.trim()
  if (!dir) return DEFAULT_DATA_DIR
  if (dir === '~' || dir.startsWith('~/')) {
    return path.join(os.homedir(), dir.slice(1))
  }
  return path.resolve(dir)
}
