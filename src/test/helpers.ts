/**
 * テスト用ヘルパー
 */
import { createHash } from 'crypto'
import fs from 'fs/promises'
import os from 'os'
import path from 'path'
import { loadConfig, ServerConfig } from '../config.js'
import { AppContext, createContext } from '../context.js'
import { BcryptBackend, CredentialHasher } from '../services/credential-hasher.js'

/**
 * 一時ディレクトリを作成する
 */
export async function createTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'memory-gateway-oauth-'))
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true })
}

/**
 * テスト用の設定（データディレクトリは一時ディレクトリ）
 */
export function createTestConfig(dataDir: string, overrides: Partial<ServerConfig> = {}): ServerConfig {
  return {
    ...loadConfig({ OAUTH_DIR: dataDir, BCRYPT_ROUNDS: '4', PBKDF2_ITERATIONS: '1000' }),
    ...overrides,
  }
}

/**
 * bcryptが読み込めない環境を再現するローダー
 */
export const unavailableBcrypt = (): Promise<BcryptBackend> => Promise.reject(new Error('bcrypt binding not found'))

/**
 * ソルト無しSHA-256で動くbcrypt互換バックエンド
 * 生成されるハッシュは bcrypt 形式（$2b$04$ + 53文字）
 */
export function createFakeBcrypt(): BcryptBackend {
  const encode = (data: string): string => `$2b$04$${createHash('sha256').update(data).digest('hex').slice(0, 53)}`
  return {
    hash: async (data) => encode(data),
    compare: async (data, encrypted) => encode(data) === encrypted,
  }
}

/**
 * PBKDF2（低反復回数）で動くハッシャー
 */
export function createTestHasher(): CredentialHasher {
  return new CredentialHasher({ pbkdf2Iterations: 1000, loadBcrypt: unavailableBcrypt })
}

/**
 * 一時ディレクトリ上のコンテキスト
 */
export function createTestContext(
  dataDir: string,
  overrides: Partial<ServerConfig> = {},
  now?: () => Date,
): AppContext {
  return createContext(createTestConfig(dataDir, overrides), { hasher: createTestHasher(), now })
}
