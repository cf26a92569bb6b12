import fs from 'fs/promises'
import path from 'path'
import { fileURLToPath } from 'url'

const __filename = fileURLToPath(import.meta.url)
const __dirname = path.dirname(__filename)

/**
 * テンプレートディレクトリ（src/utils・dist/utils のどちらからも同じ場所）
 */
export const TEMPLATE_DIR = path.join(__dirname, '../../templates')

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
}

/**
 * HTMLエスケープ
 */
export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char)
}

/**
 * HTMLテンプレートを読み込み、プレースホルダ {{key}} を置換する
 * 値はすべてHTMLエスケープされる
 * @param templateName テンプレートファイル名
 * @param variables 置換する変数のオブジェクト
 * @returns 置換後のHTML文字列
 */
export async function renderTemplate(templateName: string, variables: Record<string, string>): Promise<string> {
  const templatePath = path.join(TEMPLATE_DIR, templateName)

  let html: string
  try {
    html = await fs.readFile(templatePath, 'utf-8')
  } catch (error) {
    throw new Error(`Failed to render template ${templateName}: ${error instanceof Error ? error.message : String(error)}`)
  }

  for (const [key, value] of Object.entries(variables)) {
    // 関数で置換し、値中の $& などを特殊扱いさせない
    html = html.replaceAll(`{{${key}}}`, () => escapeHtml(value))
  }
  return html
}
