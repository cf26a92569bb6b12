/**
 * OAuth ディスカバリー
 * - RFC 8414 認可サーバーメタデータ
 * - OpenID Connect Discovery（互換用の最小セット）
 * - RFC 9728 保護リソースメタデータ
 * パスプレフィックスはリバースプロキシで除去される前提で、公開URLの組み立てにのみ使う。
 */
import { Request, Response } from 'express'
import { AppContext } from '../context.js'
import { SUPPORTED_CODE_CHALLENGE_METHODS } from '../utils/pkce.js'

export const AUTHORIZATION_SERVER_METADATA_PATH = '/.well-known/oauth-authorization-server'
export const OPENID_CONFIGURATION_PATH = '/.well-known/openid-configuration'
export const PROTECTED_RESOURCE_METADATA_PATH = '/.well-known/oauth-protected-resource'

const GRANT_TYPES_SUPPORTED = ['client_credentials', 'authorization_code', 'refresh_token']
const RESPONSE_TYPES_SUPPORTED = ['code']
const TOKEN_ENDPOINT_AUTH_METHODS_SUPPORTED = ['client_secret_basic', 'client_secret_post', 'none']

export interface AuthorizationServerMetadata {
  issuer: string
  authorization_endpoint: string
  token_endpoint: string
  token_endpoint_auth_methods_supported: string[]
  grant_types_supported: string[]
  response_types_supported: string[]
  code_challenge_methods_supported: string[]
}

export interface OpenIdConfiguration extends AuthorizationServerMetadata {
  subject_types_supported: string[]
}

export interface ProtectedResourceMetadata {
  resource: string
  authorization_servers: string[]
  bearer_methods_supported: string[]
}

/**
 * リクエストのオリジン（プロトコル + Host）
 * trust proxy 有効時は X-Forwarded-Proto / X-Forwarded-Host を反映する
 */
export function getOrigin(req: Request): string {
  return `${req.protocol}://${req.host}`
}

/**
 * 外部公開URL（オリジン + パスプレフィックス）。issuer にもなる
 */
export function getBaseUrl(req: Request, pathPrefix: string): string {
  return `${getOrigin(req)}${pathPrefix}`
}

/**
 * 認可サーバーメタデータを組み立てる
 * @param baseUrl 外部公開URL
 */
export function buildAuthorizationServerMetadata(baseUrl: string): AuthorizationServerMetadata {
  return {
    issuer: baseUrl,
    authorization_endpoint: `${baseUrl}/oauth/authorize`,
    token_endpoint: `${baseUrl}/oauth/token`,
    token_endpoint_auth_methods_supported: [...TOKEN_ENDPOINT_AUTH_METHODS_SUPPORTED],
    grant_types_supported: [...GRANT_TYPES_SUPPORTED],
    response_types_supported: [...RESPONSE_TYPES_SUPPORTED],
    // plain は後方互換のため受け付けるが広告はしない
    code_challenge_methods_supported: SUPPORTED_CODE_CHALLENGE_METHODS.filter((method) => method === 'S256'),
  }
}

export function buildOpenIdConfiguration(baseUrl: string): OpenIdConfiguration {
  return {
    ...buildAuthorizationServerMetadata(baseUrl),
    subject_types_supported: ['public'],
  }
}

/**
 * 保護リソースメタデータを組み立てる
 * @param baseUrl 外部公開URL
 * @param origin リクエストのオリジン
 * @param resourcePath 保護リソースのパス（サフィックス無しの場合に使用）
 * @param suffix well-known パス以降のリソースパス（例: 'memory/mcp'）
 */
export function buildProtectedResourceMetadata(
  baseUrl: string,
  origin: string,
  resourcePath: string,
  suffix: string,
): ProtectedResourceMetadata {
  return {
    resource: suffix ? `${origin}/${suffix}` : `${baseUrl}${resourcePath}`,
    authorization_servers: [baseUrl],
    bearer_methods_supported: ['header'],
  }
}

/**
 * well-known パスに続くサフィックスを取り出す
 * @param requestPath req.path
 * @param wellKnownPath well-known パス
 */
export function extractSuffix(requestPath: string, wellKnownPath: string): string {
  if (!requestPath.startsWith(wellKnownPath)) return ''
  return requestPath.slice(wellKnownPath.length).replace(/^\/+|\/+$/g, '')
}

/**
 * GET /.well-known/oauth-authorization-server[/<path>]
 */
export function handleAuthorizationServerMetadata(context: AppContext) {
  return (req: Request, res: Response): void => {
    res.json(buildAuthorizationServerMetadata(getBaseUrl(req, context.config.pathPrefix)))
  }
}

/**
 * GET /.well-known/openid-configuration[/<path>]
 */
export function handleOpenIdConfiguration(context: AppContext) {
  return (req: Request, res: Response): void => {
    res.json(buildOpenIdConfiguration(getBaseUrl(req, context.config.pathPrefix)))
  }
}

/**
 * GET /.well-known/oauth-protected-resource[/<path>]
 */
export function handleProtectedResourceMetadata(context: AppContext) {
  return (req: Request, res: Response): void => {
    const { pathPrefix, resourcePath } = context.config
    const suffix = extractSuffix(req.path, PROTECTED_RESOURCE_METADATA_PATH)
    res.json(buildProtectedResourceMetadata(getBaseUrl(req, pathPrefix), getOrigin(req), resourcePath, suffix))
  }
}
