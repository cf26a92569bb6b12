/**
 * JWT署名用シークレットキー
 * 初回利用時に生成して0600のファイルへ保存し、以降は毎回ファイルから読み込む
 */
import { randomBytes } from 'crypto'
import { chmod, link, readFile, rm, writeFile } from 'fs/promises'
import path from 'path'
import logger from '../utils/logger.js'
import { ensurePrivateDirectory, isNotFoundError, PRIVATE_FILE_MODE } from './file-store.js'

/**
 * 生成するキーのバイト長
 */
const SECRET_KEY_BYTES = 64

export class SecretKeyStore {
  constructor(readonly filePath: string) {}

  /**
   * シークレットキーを取得する（無ければ生成）
   */
  async getSecretKey(): Promise<string> {
    const existing = await this.read()
    if (existing) return existing

    await ensurePrivateDirectory(path.dirname(this.filePath))
    const secretKey = randomBytes(SECRET_KEY_BYTES).toString('base64url')
    // 一時ファイルに書いてからハードリンクで公開する。既に存在する場合は失敗し、先に公開された方を採用する
    const tempPath = `${this.filePath}.${process.pid}.${randomBytes(6).toString('hex')}.tmp`
    try {
      await writeFile(tempPath, secretKey, { encoding: 'utf8', mode: PRIVATE_FILE_MODE })
      await link(tempPath, this.filePath)
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
        const winner = await this.read()
        if (winner) return winner
      }
      throw error
    } finally {
      await rm(tempPath, { force: true })
    }
    await chmod(this.filePath, PRIVATE_FILE_MODE)
    logger.info(`Generated new token signing key: ${this.filePath}`)
    return secretKey
  }

  private async read(): Promise<string | null> {
    try {
      const value = (await readFile(this.filePath, 'utf8')).trim()
      return value || null
    } catch (error) {
      if (isNotFoundError(error)) return null
      throw error
    }
  }
}
