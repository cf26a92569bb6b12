/**
 * リクエストパラメータの取り出し
 * クエリ・JSON・フォームいずれの値も unknown として扱い、単一の文字列のみ受け付ける
 */

/**
 * パラメータを文字列として取得する
 * @param source req.query / req.body
 * @param key パラメータ名
 * @returns 空でない単一の文字列、それ以外は undefined
 */
export function readParam(source: unknown, key: string): string | undefined {
  if (typeof source !== 'object' || source === null) return undefined
  const value: unknown = Reflect.get(source, key)
  if (typeof value !== 'string' || value.length === 0) return undefined
  return value
}

/**
 * パラメータが配列（同名パラメータの重複指定）かどうか
 * RFC 6749 §3.1 により重複は invalid_request
 */
export function isRepeatedParam(source: unknown, key: string): boolean {
  if (typeof source !== 'object' || source === null) return false
  return Array.isArray(Reflect.get(source, key))
}

/**
 * HTTP Basic認証ヘッダーからクライアント資格情報を取り出す
 * RFC 6749 §2.3.1 に従い client_id / client_secret は form-urlencoded としてデコードする
 * @param header Authorizationヘッダー
 * @returns 資格情報、Basic以外・不正な形式は null
 */
export function parseBasicAuth(
  header: string | undefined,
): { clientId: string; clientSecret: string } | null {
  if (!header) return null
  const match = /^Basic\s+([A-Za-z0-9+/=._~-]+)\s*$/i.exec(header)
  if (!match) return null

  const decoded = Buffer.from(match[1], 'base64').toString('utf8')
  const separator = decoded.indexOf(':')
  if (separator <= 0) return null

  try {
    const clientId = decodeFormComponent(decoded.slice(0, separator))
    const clientSecret = decodeFormComponent(decoded.slice(separator + 1))
    if (!clientId || !clientSecret) return null
    return { clientId, clientSecret }
  } catch {
    // 不正なパーセントエンコーディング
    return null
  }
}

function decodeFormComponent(value: string): string {
  return decodeURIComponent(value.replace(/\+/g, ' '))
}

/**
 * Bearerトークンを取り出す
 * @param header Authorizationヘッダー
 * @returns トークン、Bearer以外は null
 */
export function parseBearerToken(header: string | undefined): string | null {
  if (!header) return null
  const match = /^Bearer\s+(\S+)\s*$/i.exec(header)
  return match ? match[1] : null
}
