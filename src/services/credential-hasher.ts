/**
 * クライアントシークレットのハッシュ化・検証
 * - 優先: bcrypt（ネイティブバインディング）
 * - 代替: PBKDF2-HMAC-SHA256（node:crypto）
 * bcryptが読み込めない環境でも起動できるよう、バックエンドは初回利用時に選択する。
 */
import { pbkdf2, randomBytes, timingSafeEqual } from 'crypto'
import { promisify } from 'util'
import logger from '../utils/logger.js'

const pbkdf2Async = promisify(pbkdf2)

const PBKDF2_PREFIX = 'pbkdf2_sha256'
const PBKDF2_SALT_BYTES = 16
const PBKDF2_KEY_BYTES = 32
const BCRYPT_HASH_PATTERN = /^\$2[aby]\$(\d{2})\$[./A-Za-z0-9]{53}$/

/**
 * bcryptバックエンドのインターフェース
 */
export interface BcryptBackend {
  hash(data: string, saltOrRounds: number): Promise<string>
  compare(data: string, encrypted: string): Promise<boolean>
}

/**
 * bcryptバックエンドの読み込み関数
 * 読み込めない場合は例外を投げる
 */
export type BcryptLoader = () => Promise<BcryptBackend>

export interface CredentialHasherOptions {
  /** bcryptのコスト */
  bcryptRounds?: number
  /** PBKDF2の反復回数 */
  pbkdf2Iterations?: number
  /** bcryptの読み込み方法（テストで差し替える） */
  loadBcrypt?: BcryptLoader
}

/**
 * npmのbcryptパッケージを読み込む
 */
export const loadNativeBcrypt: BcryptLoader = async () => {
  const bcrypt = await import('bcrypt')
  return bcrypt.default
}

export type HashScheme = 'bcrypt' | 'pbkdf2' | 'unknown'

/**
 * ハッシュ文字列の方式を判定する
 */
export function detectHashScheme(hash: string): HashScheme {
  if (BCRYPT_HASH_PATTERN.test(hash)) return 'bcrypt'
  if (hash.startsWith(`${PBKDF2_PREFIX}$`)) return 'pbkdf2'
  return 'unknown'
}

export class CredentialHasher {
  private readonly bcryptRounds: number
  private readonly pbkdf2Iterations: number
  private readonly loadBcrypt: BcryptLoader
  private backend: Promise<BcryptBackend | null> | null = null

  constructor(options: CredentialHasherOptions = {}) {
    this.bcryptRounds = options.bcryptRounds ?? 12
    this.pbkdf2Iterations = options.pbkdf2Iterations ?? 600_000
    this.loadBcrypt = options.loadBcrypt ?? loadNativeBcrypt
  }

  /**
   * シークレットをハッシュ化する
   * @param secret 平文のシークレット
   * @returns bcrypt形式、またはbcryptが使えない場合は pbkdf2_sha256$<iterations>$<salt>$<hash>
   */
  async hash(secret: string): Promise<string> {
    const bcrypt = await this.getBcrypt()
    if (bcrypt) {
      return bcrypt.hash(secret, this.bcryptRounds)
    }
    return this.hashPbkdf2(secret)
  }

  /**
   * シークレットを検証する
   * 不正な形式・未知の方式・バックエンド不在はすべて false（例外は投げない）
   * @param secret 平文のシークレット
   * @param hash 保存されているハッシュ
   */
  async verify(secret: string, hash: string): Promise<boolean> {
    switch (detectHashScheme(hash)) {
      case 'bcrypt': {
        const bcrypt = await this.getBcrypt()
        if (!bcrypt) {
          // パスワード不一致ではなくサーバー構成の問題
          logger.error('Cannot verify bcrypt hash: bcrypt backend is unavailable on this server')
          return false
        }
        try {
          return await bcrypt.compare(secret, hash)
        } catch (error) {
          logger.warn(`bcrypt comparison failed: ${error instanceof Error ? error.message : String(error)}`)
          return false
        }
      }
      case 'pbkdf2':
        return this.verifyPbkdf2(secret, hash)
      default:
        return false
    }
  }

  /**
   * より強い方式で再ハッシュすべきかどうか
   * PBKDF2で保存されたハッシュは、bcryptが利用可能になった時点でアップグレード対象
   */
  async needsRehash(hash: string): Promise<boolean> {
    if (detectHashScheme(hash) !== 'pbkdf2') return false
    return (await this.getBcrypt()) !== null
  }

  /**
   * 利用中のバックエンド名
   */
  async activeScheme(): Promise<Exclude<HashScheme, 'unknown'>> {
    return (await this.getBcrypt()) ? 'bcrypt' : 'pbkdf2'
  }

  private getBcrypt(): Promise<BcryptBackend | null> {
    if (!this.backend) {
      this.backend = this.loadBcrypt().catch((error: unknown) => {
        logger.warn(
          `bcrypt backend unavailable, falling back to PBKDF2-HMAC-SHA256: ${error instanceof Error ? error.message : String(error)}`,
        )
        return null
      })
    }
    return this.backend
  }

  private async hashPbkdf2(secret: string): Promise<string> {
    const salt = randomBytes(PBKDF2_SALT_BYTES)
    const derived = await pbkdf2Async(secret, salt, this.pbkdf2Iterations, PBKDF2_KEY_BYTES, 'sha256')
    return [PBKDF2_PREFIX, String(this.pbkdf2Iterations), salt.toString('base64url'), derived.toString('base64url')].join('$')
  }

  private async verifyPbkdf2(secret: string, hash: string): Promise<boolean> {
    const [, iterationsStr, saltStr, expectedStr, ...rest] = hash.split('$')
    if (rest.length > 0 || !iterationsStr || !saltStr || !expectedStr || !/^\d+$/.test(iterationsStr)) {
      return false
    }
    const iterations = parseInt(iterationsStr, 10)
    const salt = Buffer.from(saltStr, 'base64url')
    const expected = Buffer.from(expectedStr, 'base64url')
    if (iterations <= 0 || salt.length === 0 || expected.length === 0) return false

    try {
      const derived = await pbkdf2Async(secret, salt, iterations, expected.length, 'sha256')
      return timingSafeEqual(derived, expected)
    } catch (error) {
      logger.warn(`PBKDF2 verification failed: ${error instanceof Error ? error.message : String(error)}`)
      return false
    }
  }
}
