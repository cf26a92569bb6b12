/**
 * リダイレクトURIポリシー
 * 判定の優先順位:
 *   1. allowAny（開発用）が有効なら常に許可
 *   2. 許可リストが設定されていればその完全一致のみ
 *   3. それ以外は組み込みのコネクタ用コールバックURL
 * ワイルドカードや前方一致は行わない
 */
import { RedirectUriConfig } from '../config.js'

/**
 * 既知のコネクタのコールバックURL
 */
export const DEFAULT_REDIRECT_URIS: readonly string[] = Object.freeze([
  'https://chatgpt.com/connector_platform_oauth_redirect',
  'https://claude.ai/api/mcp/auth_callback',
  'https://claude.com/api/mcp/auth_callback',
])

export class RedirectUriPolicy {
  private readonly allowAny: boolean
  private readonly allowed: ReadonlySet<string>

  constructor(config: RedirectUriConfig) {
    this.allowAny = config.allowAny
    this.allowed = new Set(config.allowlist.length > 0 ? config.allowlist : DEFAULT_REDIRECT_URIS)
  }

  /**
   * リダイレクトURIが許可されているか
   * @param uri クライアントが指定したURI
   */
  isAllowed(uri: string): boolean {
    if (this.allowAny) return true
    return this.allowed.has(uri)
  }

  /**
   * 起動ログ用の説明
   */
  describe(): string {
    if (this.allowAny) return 'any redirect URI (development mode)'
    return `${this.allowed.size} allowed redirect URI(s)`
  }
}
