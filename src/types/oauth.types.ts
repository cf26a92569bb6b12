/**
 * 永続化レコードとサービス層の型定義
 */
import { z } from 'zod'
import {
  AuthCodeRecordSchema,
  ClientRecordSchema,
  RefreshTokenRecordSchema,
} from '../db/schemas.js'

/**
 * PKCEチャレンジメソッド
 */
export type CodeChallengeMethod = 'S256' | 'plain'

/**
 * クライアントレコード（clients.json の値）
 * キーは client_id
 */
export type ClientRecord = z.infer<typeof ClientRecordSchema>

/**
 * 認可コードレコード（auth_codes.json の値）
 * キーは認可コードのSHA-256ダイジェスト
 */
export type AuthCodeRecord = z.infer<typeof AuthCodeRecordSchema>

/**
 * リフレッシュトークンレコード（refresh_tokens.json の値）
 * キーはリフレッシュトークンのSHA-256ダイジェスト
 */
export type RefreshTokenRecord = z.infer<typeof RefreshTokenRecordSchema>

/**
 * クライアント情報（シークレットハッシュを含まない）
 */
export interface ClientSummary {
  client_id: string
  name: string
  description: string
  created_at: string
  revoked: boolean
  revoked_at?: string
}

/**
 * 新規発行したクライアント
 * client_secret は発行時の一度だけ返却される
 */
export interface GeneratedClient {
  client_id: string
  client_secret: string
  name: string
  description: string
}

/**
 * 認可コード発行パラメータ
 */
export interface IssueAuthCodeParams {
  clientId: string
  redirectUri: string
  codeChallenge: string
  codeChallengeMethod: string
  scope?: string
}

/**
 * 認可コード引き換えパラメータ
 */
export interface RedeemAuthCodeParams {
  code: string
  clientId: string
  redirectUri: string
  codeVerifier: string
}

/**
 * 引き換え・ローテーション結果として得られる許可情報
 */
export interface GrantResult {
  clientId: string
  scope?: string
}
