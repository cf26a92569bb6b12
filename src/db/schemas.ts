/**
 * 永続化ファイルのスキーマ
 * 読み込み時に検証し、壊れたファイルを黙って上書きしないようにする
 */
import { z } from 'zod'

export const ClientRecordSchema = z.object({
  name: z.string(),
  description: z.string().default(''),
  secret_hash: z.string(),
  created_at: z.string(),
  revoked: z.boolean().default(false),
  revoked_at: z.string().optional(),
})

export const AuthCodeRecordSchema = z.object({
  client_id: z.string(),
  redirect_uri: z.string(),
  scope: z.string().optional(),
  code_challenge: z.string(),
  code_challenge_method: z.enum(['S256', 'plain']),
  created_at: z.string(),
  expires_at: z.string(),
  used: z.boolean(),
  used_at: z.string().optional(),
})

export const RefreshTokenRecordSchema = z.object({
  client_id: z.string(),
  scope: z.string().optional(),
  created_at: z.string(),
  expires_at: z.string(),
  rotated: z.boolean(),
  rotated_at: z.string().optional(),
})

export const AccessTokenClaimsSchema = z.object({
  sub: z.string().min(1),
  name: z.string(),
  type: z.literal('access_token'),
  iat: z.number(),
  exp: z.number(),
  jti: z.string(),
})
