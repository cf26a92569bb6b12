import { realpathSync } from 'fs'
import { pathToFileURL } from 'url'

/**
 * モジュールがエントリーポイントとして実行されたかどうか
 * npm の bin シンボリックリンク経由でも判定できるよう実パスで比較する
 * @param moduleUrl import.meta.url
 */
export function isMainModule(moduleUrl: string): boolean {
  const entry = process.argv[1]
  if (!entry) return false
  try {
    return moduleUrl === pathToFileURL(realpathSync(entry)).href
  } catch {
    // 実在しないパス（node -e 等）
    return false
  }
}
