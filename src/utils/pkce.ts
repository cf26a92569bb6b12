/**
 * PKCE（RFC 7636）ユーティリティ
 */
import crypto from 'crypto'
import { CodeChallengeMethod } from '../types/oauth.types.js'

/**
 * サポートするチャレンジメソッド
 */
export const SUPPORTED_CODE_CHALLENGE_METHODS: readonly CodeChallengeMethod[] = ['S256', 'plain']

/**
 * サポート対象のチャレンジメソッドかどうか
 */
export function isCodeChallengeMethod(value: string): value is CodeChallengeMethod {
  return SUPPORTED_CODE_CHALLENGE_METHODS.some((method) => method === value)
}

/**
 * PKCE code_challengeを計算する関数
 * @param verifier code_verifier
 * @param method 'S256' は base64url(SHA-256(verifier))（パディング無し）、'plain' はそのまま
 * @returns 計算されたchallenge
 */
export function calculatePKCEChallenge(verifier: string, method: CodeChallengeMethod): string {
  if (method === 'S256') {
    return crypto.createHash('sha256').update(verifier).digest('base64url')
  }
  return verifier
}

/**
 * code_verifierが保存済みのcode_challengeと一致するか
 * @param verifier code_verifier
 * @param challenge 保存済みのcode_challenge
 * @param method チャレンジメソッド
 */
export function verifyPKCE(verifier: string, challenge: string, method: CodeChallengeMethod): boolean {
  return constantTimeCompare(calculatePKCEChallenge(verifier, method), challenge)
}

/**
 * Constant-time文字列比較
 */
export function constantTimeCompare(a: string, b: string): boolean {
  const left = Buffer.from(a, 'utf8')
  const right = Buffer.from(b, 'utf8')
  if (left.length !== right.length) {
    return false
  }
  return crypto.timingSafeEqual(left, right)
}

/**
 * 文字列のSHA-256ダイジェスト（hex）
 * 認可コード・リフレッシュトークンは平文ではなくダイジェストをキーに保存する
 */
export function sha256Hex(value: string): string {
  return crypto.createHash('sha256').update(value).digest('hex')
}
