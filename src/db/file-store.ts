/**
 * JSONファイルストア
 * レコードを1ファイルのJSONオブジェクト（キー → レコード）として保持する。
 * - 更新はファイル全体の書き換え（一時ファイル + rename）
 * - ディレクトリは0700、ファイルは0600
 * - 同一プロセス内の更新は直列化する（複数プロセス間は last-writer-wins）
 */
import { randomBytes } from 'crypto'
import { chmod, mkdir, readFile, rename, rm, writeFile } from 'fs/promises'
import path from 'path'
import { z } from 'zod'

/**
 * ディレクトリのパーミッション（所有者のみ）
 */
export const PRIVATE_DIR_MODE = 0o700

/**
 * ファイルのパーミッション（所有者のみ読み書き）
 */
export const PRIVATE_FILE_MODE = 0o600

/**
 * 所有者のみアクセス可能なディレクトリを用意する
 * @param dir ディレクトリパス
 */
export async function ensurePrivateDirectory(dir: string): Promise<void> {
  await mkdir(dir, { recursive: true, mode: PRIVATE_DIR_MODE })
  await chmod(dir, PRIVATE_DIR_MODE)
}

/**
 * ファイルをアトミックに書き込み、0600を強制する
 * @param filePath 書き込み先
 * @param content 内容
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const tempPath = `${filePath}.${process.pid}.${randomBytes(6).toString('hex')}.tmp`
  try {
    await writeFile(tempPath, content, { encoding: 'utf8', mode: PRIVATE_FILE_MODE })
    await rename(tempPath, filePath)
  } catch (error) {
    await rm(tempPath, { force: true })
    throw error
  }
  await chmod(filePath, PRIVATE_FILE_MODE)
}

/**
 * ファイルが存在しないことを示すエラーかどうか
 */
export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/**
 * キー付きレコードを保持するJSONファイルストア
 */
export class JsonFileStore<T> {
  private readonly schema: z.ZodType<Record<string, T>, z.ZodTypeDef, unknown>
  private tail: Promise<void> = Promise.resolve()

  /**
   * @param filePath JSONファイルのパス
   * @param recordSchema 各レコードのスキーマ
   */
  constructor(
    readonly filePath: string,
    recordSchema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ) {
    this.schema = z.record(z.string(), recordSchema)
  }

  /**
   * 全レコードを読み込む
   * ファイルが無い場合は空、内容が壊れている場合は例外
   */
  async readAll(): Promise<Record<string, T>> {
    let raw: string
    try {
      raw = await readFile(this.filePath, 'utf8')
    } catch (error) {
      if (isNotFoundError(error)) return {}
      throw error
    }

    if (raw.trim() === '') return {}

    let parsed: unknown
    try {
      parsed = JSON.parse(raw)
    } catch (error) {
      throw new Error(`Corrupted store file ${path.basename(this.filePath)}: ${error instanceof Error ? error.message : String(error)}`)
    }

    const result = this.schema.safeParse(parsed)
    if (!result.success) {
      throw new Error(
        `Invalid store file ${path.basename(this.filePath)}: ${result.error.issues[0]?.message ?? 'schema mismatch'}`,
      )
    }
    return result.data
  }

  /**
   * 1件取得
   * @param key レコードキー
   */
  async get(key: string): Promise<T | null> {
    const records = await this.readAll()
    return Object.hasOwn(records, key) ? records[key] : null
  }

  /**
   * 読み込み → 変更 → 書き込み をロック下で実行する
   * mutator が例外を投げた場合は何も書き込まない。内容に変化が無い場合も書き込まない。
   * @param mutator レコードを直接変更する関数
   * @returns mutator の戻り値
   */
  async update<R>(mutator: (records: Record<string, T>) => R | Promise<R>): Promise<R> {
    return this.withLock(async () => {
      const records = await this.readAll()
      const before = JSON.stringify(records)
      const result = await mutator(records)
      const after = JSON.stringify(records, null, 2)
      if (JSON.stringify(records) !== before) {
        await ensurePrivateDirectory(path.dirname(this.filePath))
        await writeFileAtomic(this.filePath, `${after}\n`)
      }
      return result
    })
  }

  /**
   * 同一インスタンスへの更新を直列化する
   */
  private withLock<R>(task: () => Promise<R>): Promise<R> {
    const run = this.tail.then(task)
    // 後続のタスクは先行タスクの成否に関わらず実行する（エラーは run の呼び出し側へ伝播）
    this.tail = run.then(
      () => undefined,
      () => undefined,
    )
    return run
  }
}
