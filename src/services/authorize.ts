/**
 * 認可エンドポイント
 * OAuth2認可コードフロー（PKCE）の同意画面表示と認可コード発行を行う。
 * - GET: パラメータ検証後、同意画面（HTML）を返す。サーバー側セッションは持たない
 * - POST: 同意画面からのフォーム送信。承認なら認可コードを発行してリダイレクト
 * パラメータ不正はリダイレクトせず 400 JSON を返す
 */
import { Request, Response } from 'express'
import { AppContext } from '../context.js'
import { CodeChallengeMethod } from '../types/oauth.types.js'
import logger from '../utils/logger.js'
import { OAuthError, sendOAuthError } from '../utils/oauth-error.js'
import { isRepeatedParam, readParam } from '../utils/params.js'
import { isCodeChallengeMethod } from '../utils/pkce.js'
import { renderTemplate } from '../utils/template.js'

// 定数定義
const SUPPORTED_RESPONSE_TYPES = ['code'] as const
const CONSENT_TEMPLATE = 'consent.html'
const AUTHORIZE_PARAMS = [
  'response_type',
  'client_id',
  'redirect_uri',
  'code_challenge',
  'code_challenge_method',
  'scope',
  'state',
] as const

/**
 * 検証済みの認可リクエスト
 */
export interface AuthorizeRequest {
  clientId: string
  redirectUri: string
  codeChallenge: string
  codeChallengeMethod: CodeChallengeMethod
  scope?: string
  state?: string
}

/**
 * 認可リクエストを検証する
 * 検証順: response_type → client_id → redirect_uri → code_challenge → code_challenge_method
 * @param source req.query または req.body
 * @param context アプリケーションコンテキスト
 * @returns 検証済みパラメータ。不正な場合は OAuthError を投げる
 */
export async function validateAuthorizeRequest(source: unknown, context: AppContext): Promise<AuthorizeRequest> {
  if (AUTHORIZE_PARAMS.some((key) => isRepeatedParam(source, key))) {
    throw new OAuthError('invalid_request', 'Parameters must be single values, not arrays')
  }

  const responseType = readParam(source, 'response_type')
  if (!responseType) {
    throw new OAuthError('invalid_request', 'response_type is required')
  }
  if (!SUPPORTED_RESPONSE_TYPES.some((type) => type === responseType)) {
    throw new OAuthError('unsupported_response_type', "Only 'code' response_type is supported")
  }

  const clientId = readParam(source, 'client_id')
  if (!clientId) {
    throw new OAuthError('invalid_request', 'client_id is required')
  }
  if (!(await context.clients.isActive(clientId))) {
    throw new OAuthError('invalid_client', 'Unknown or revoked client', 400)
  }

  const redirectUri = readParam(source, 'redirect_uri')
  if (!redirectUri) {
    throw new OAuthError('invalid_request', 'redirect_uri is required')
  }
  if (!context.redirectPolicy.isAllowed(redirectUri)) {
    throw new OAuthError('invalid_request', 'redirect_uri is not allowed')
  }
  if (!isValidRedirectUri(redirectUri)) {
    throw new OAuthError('invalid_request', 'redirect_uri must be a valid URL')
  }

  const codeChallenge = readParam(source, 'code_challenge')
  if (!codeChallenge) {
    throw new OAuthError('invalid_request', 'code_challenge is required')
  }

  // 省略時は plain（RFC 7636 §4.3）
  const codeChallengeMethod = readParam(source, 'code_challenge_method') ?? 'plain'
  if (!isCodeChallengeMethod(codeChallengeMethod)) {
    throw new OAuthError('invalid_request', "code_challenge_method must be 'S256' or 'plain'")
  }

  const request: AuthorizeRequest = { clientId, redirectUri, codeChallenge, codeChallengeMethod }
  const scope = readParam(source, 'scope')
  if (scope) request.scope = scope
  const state = readParam(source, 'state')
  if (state) request.state = state
  return request
}

/**
 * 絶対URLかどうか
 * @param uri 検証するURL
 */
function isValidRedirectUri(uri: string): boolean {
  try {
    new URL(uri)
    return true
  } catch {
    return false
  }
}

/**
 * リダイレクト先URLを組み立てる
 * redirect_uri に既存のクエリがあれば保持する
 * @param redirectUri 登録済みのリダイレクトURI
 * @param params 付加するパラメータ（undefined は付加しない）
 */
export function buildRedirectUrl(redirectUri: string, params: Record<string, string | undefined>): string {
  const url = new URL(redirectUri)
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) url.searchParams.set(key, value)
  }
  return url.toString()
}

/**
 * GET /oauth/authorize
 * 同意画面を返す
 */
export function handleAuthorize(context: AppContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const request = await validateAuthorizeRequest(req.query, context)
      const client = await context.clients.get(request.clientId)

      const html = await renderTemplate(CONSENT_TEMPLATE, {
        action: `${context.config.pathPrefix}/oauth/authorize`,
        client_name: client?.name ?? request.clientId,
        client_id: request.clientId,
        redirect_uri: request.redirectUri,
        code_challenge: request.codeChallenge,
        code_challenge_method: request.codeChallengeMethod,
        scope: request.scope ?? '',
        scope_label: request.scope ?? '(default)',
        state: request.state ?? '',
      })

      res.set('Cache-Control', 'no-store')
      res.set('X-Frame-Options', 'DENY')
      res.type('html').send(html)
    } catch (err) {
      sendOAuthError(res, err, 'GET /oauth/authorize')
    }
  }
}

/**
 * POST /oauth/authorize
 * decision=approve なら認可コードを発行し、それ以外は access_denied でリダイレクトする
 */
export function handleAuthorizeDecision(context: AppContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const request = await validateAuthorizeRequest(req.body, context)

      if (readParam(req.body, 'decision') !== 'approve') {
        logger.info(`Authorization denied: client_id=${request.clientId}`)
        res.redirect(302, buildRedirectUrl(request.redirectUri, { error: 'access_denied', state: request.state }))
        return
      }

      const code = await context.authCodes.issue({
        clientId: request.clientId,
        redirectUri: request.redirectUri,
        codeChallenge: request.codeChallenge,
        codeChallengeMethod: request.codeChallengeMethod,
        scope: request.scope,
      })
      res.redirect(302, buildRedirectUrl(request.redirectUri, { code, state: request.state }))
    } catch (err) {
      sendOAuthError(res, err, 'POST /oauth/authorize')
    }
  }
}
