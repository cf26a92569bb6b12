/**
 * OAuth2 Token Endpoint Service
 * OAuth2トークンエンドポイントの処理を担当する
 * - Client Credentials Grant
 * - Authorization Code Grant（PKCE検証）
 * - Refresh Token Grant（ローテーション）
 * クライアント認証は HTTP Basic（RFC 6749 §2.3.1）またはリクエストボディ
 */
import { Request, Response } from 'express'
import { AppContext } from '../context.js'
import { OAuthError, sendOAuthError } from '../utils/oauth-error.js'
import { isRepeatedParam, parseBasicAuth, readParam } from '../utils/params.js'

const TOKEN_PARAMS = [
  'grant_type',
  'client_id',
  'client_secret',
  'code',
  'redirect_uri',
  'code_verifier',
  'refresh_token',
  'scope',
] as const

/**
 * リクエストから取り出したクライアント資格情報
 */
interface ClientCredentials {
  clientId?: string
  clientSecret?: string
}

/**
 * トークンレスポンス（RFC 6749 §5.1）
 */
export interface TokenResponse {
  access_token: string
  token_type: 'Bearer'
  expires_in: number
  refresh_token?: string
  scope?: string
}

/**
 * /oauth/token エンドポイントの処理
 */
export function handleToken(context: AppContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const body: unknown = req.body
      if (TOKEN_PARAMS.some((key) => isRepeatedParam(body, key))) {
        throw new OAuthError('invalid_request', 'Parameters must be single values, not arrays')
      }

      const grantType = readParam(body, 'grant_type')
      if (!grantType) {
        throw new OAuthError('invalid_request', 'grant_type is required')
      }

      const credentials = readClientCredentials(req)
      let response: TokenResponse
      switch (grantType) {
        case 'client_credentials':
          response = await handleClientCredentialsGrant(context, body, credentials)
          break
        case 'authorization_code':
          response = await handleAuthorizationCodeGrant(context, body, credentials)
          break
        case 'refresh_token':
          response = await handleRefreshTokenGrant(context, body, credentials)
          break
        default:
          throw new OAuthError('unsupported_grant_type', `Unsupported grant_type: ${grantType}`)
      }

      res.set('Cache-Control', 'no-store')
      res.set('Pragma', 'no-cache')
      res.json(response)
    } catch (err) {
      if (err instanceof OAuthError && err.error === 'invalid_client' && err.status === 401) {
        res.set('WWW-Authenticate', 'Basic realm="oauth"')
      }
      sendOAuthError(res, err, '/oauth/token')
    }
  }
}

/**
 * クライアント資格情報を取り出す
 * Authorizationヘッダー（Basic）を優先し、無ければボディの client_id / client_secret
 */
function readClientCredentials(req: Request): ClientCredentials {
  const header = req.get('authorization')
  if (header && /^Basic\s/i.test(header)) {
    const basic = parseBasicAuth(header)
    if (!basic) {
      throw new OAuthError('invalid_client', 'Malformed HTTP Basic credentials')
    }
    const bodyClientId = readParam(req.body, 'client_id')
    if (bodyClientId && bodyClientId !== basic.clientId) {
      throw new OAuthError('invalid_request', 'client_id does not match the Authorization header')
    }
    return basic
  }
  return {
    clientId: readParam(req.body, 'client_id'),
    clientSecret: readParam(req.body, 'client_secret'),
  }
}

/**
 * クライアントクレデンシャルグラント処理
 */
async function handleClientCredentialsGrant(
  context: AppContext,
  body: unknown,
  { clientId, clientSecret }: ClientCredentials,
): Promise<TokenResponse> {
  if (!clientId || !clientSecret) {
    throw new OAuthError('invalid_request', 'client_id and client_secret are required')
  }
  if (!(await context.clients.verify(clientId, clientSecret))) {
    throw new OAuthError('invalid_client', 'Invalid client credentials')
  }

  const accessToken = await context.tokens.issueAccessToken(clientId)
  const response: TokenResponse = {
    access_token: accessToken.token,
    token_type: 'Bearer',
    expires_in: accessToken.expiresIn,
  }
  const scope = readParam(body, 'scope')
  if (scope) response.scope = scope
  return response
}

/**
 * 認可コードグラント処理
 * シークレットが提示された場合は検証し、無い場合（公開クライアント）は有効なクライアントであることのみ確認する
 */
async function handleAuthorizationCodeGrant(
  context: AppContext,
  body: unknown,
  { clientId, clientSecret }: ClientCredentials,
): Promise<TokenResponse> {
  const code = readParam(body, 'code')
  const redirectUri = readParam(body, 'redirect_uri')
  const codeVerifier = readParam(body, 'code_verifier')
  if (!clientId || !code || !redirectUri || !codeVerifier) {
    throw new OAuthError('invalid_request', 'client_id, code, redirect_uri and code_verifier are required')
  }
  await authenticateClient(context, clientId, clientSecret)

  const grant = await context.authCodes.redeem({ code, clientId, redirectUri, codeVerifier })
  const scope = grant.scope ?? readParam(body, 'scope')

  const accessToken = await context.tokens.issueAccessToken(grant.clientId)
  const refreshToken = await context.tokens.issueRefreshToken(grant.clientId, scope)

  const response: TokenResponse = {
    access_token: accessToken.token,
    token_type: 'Bearer',
    expires_in: accessToken.expiresIn,
    refresh_token: refreshToken,
  }
  if (scope) response.scope = scope
  return response
}

/**
 * リフレッシュトークングラント処理
 * 提示されたリフレッシュトークンは無効化され、新しいトークンが発行される
 */
async function handleRefreshTokenGrant(
  context: AppContext,
  body: unknown,
  { clientId, clientSecret }: ClientCredentials,
): Promise<TokenResponse> {
  const refreshToken = readParam(body, 'refresh_token')
  if (!refreshToken) {
    throw new OAuthError('invalid_request', 'refresh_token is required')
  }
  if (clientSecret) {
    if (!clientId) {
      throw new OAuthError('invalid_request', 'client_id is required with client_secret')
    }
    if (!(await context.clients.verify(clientId, clientSecret))) {
      throw new OAuthError('invalid_grant', 'Invalid client credentials')
    }
  }

  const rotated = await context.tokens.rotateRefreshToken(refreshToken, clientId)
  const accessToken = await context.tokens.issueAccessToken(rotated.clientId)

  const response: TokenResponse = {
    access_token: accessToken.token,
    token_type: 'Bearer',
    expires_in: accessToken.expiresIn,
    refresh_token: rotated.refreshToken,
  }
  if (rotated.scope) response.scope = rotated.scope
  return response
}

/**
 * 認可コードグラントのクライアント認証
 */
async function authenticateClient(context: AppContext, clientId: string, clientSecret?: string): Promise<void> {
  if (clientSecret) {
    if (!(await context.clients.verify(clientId, clientSecret))) {
      throw new OAuthError('invalid_client', 'Invalid client credentials')
    }
    return
  }
  if (!(await context.clients.isActive(clientId))) {
    throw new OAuthError('invalid_client', 'Unknown or revoked client')
  }
}
