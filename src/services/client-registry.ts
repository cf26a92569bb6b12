/**
 * クライアントレジストリ
 * 登録済みクライアント（ID・名前・説明・シークレットハッシュ・無効化状態）を管理する。
 * クライアントは削除せず、無効化のみ行う（監査のため履歴を残す）。
 */
import { randomBytes } from 'crypto'
import { JsonFileStore } from '../db/file-store.js'
import { ClientRecord, ClientSummary, GeneratedClient } from '../types/oauth.types.js'
import logger from '../utils/logger.js'
import { CredentialHasher } from './credential-hasher.js'

/**
 * クライアントIDのプレフィックス
 */
export const CLIENT_ID_PREFIX = 'smc_'

/**
 * クライアントIDのランダム部（16バイト → base64urlで22文字）
 */
const CLIENT_ID_BYTES = 16

/**
 * クライアントシークレットのバイト長
 */
const CLIENT_SECRET_BYTES = 48

export class ClientRegistry {
  constructor(
    private readonly store: JsonFileStore<ClientRecord>,
    private readonly hasher: CredentialHasher,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /**
   * クライアントを新規発行する
   * @param name 表示名
   * @param description 説明（任意）
   * @returns client_secret を含む発行結果（平文シークレットはこの時だけ返却）
   */
  async generate(name: string, description = ''): Promise<GeneratedClient> {
    const trimmedName = name.trim()
    if (!trimmedName) {
      throw new Error('Client name must not be empty')
    }

    const clientSecret = randomBytes(CLIENT_SECRET_BYTES).toString('base64url')
    // ハッシュ化はロック外で行う（bcryptは重い）
    const secretHash = await this.hasher.hash(clientSecret)

    const clientId = await this.store.update((records) => {
      let id = generateClientId()
      while (Object.hasOwn(records, id)) {
        id = generateClientId()
      }
      records[id] = {
        name: trimmedName,
        description,
        secret_hash: secretHash,
        created_at: this.now().toISOString(),
        revoked: false,
      }
      return id
    })

    logger.info(`OAuth client generated: client_id=${clientId}, name=${trimmedName}`)
    return { client_id: clientId, client_secret: clientSecret, name: trimmedName, description }
  }

  /**
   * 全クライアントの一覧（シークレットハッシュは含まない）
   */
  async list(): Promise<ClientSummary[]> {
    const records = await this.store.readAll()
    return Object.entries(records).map(([clientId, record]) => toSummary(clientId, record))
  }

  /**
   * クライアント情報を取得する
   * @param clientId クライアントID
   */
  async get(clientId: string): Promise<ClientSummary | null> {
    const record = await this.store.get(clientId)
    return record ? toSummary(clientId, record) : null
  }

  /**
   * クライアントが存在し、無効化されていないか
   * @param clientId クライアントID
   */
  async isActive(clientId: string): Promise<boolean> {
    const record = await this.store.get(clientId)
    return record !== null && !record.revoked
  }

  /**
   * クライアントを無効化する（冪等・元に戻せない）
   * @param clientId クライアントID
   * @returns 見つかった場合 true
   */
  async revoke(clientId: string): Promise<boolean> {
    const found = await this.store.update((records) => {
      if (!Object.hasOwn(records, clientId)) return false
      const record = records[clientId]
      if (!record.revoked) {
        record.revoked = true
        record.revoked_at = this.now().toISOString()
      }
      return true
    })

    if (found) {
      logger.info(`OAuth client revoked: client_id=${clientId}`)
    } else {
      logger.warn(`Revoke requested for unknown client: client_id=${clientId}`)
    }
    return found
  }

  /**
   * クライアント資格情報を検証する
   * @param clientId クライアントID
   * @param clientSecret 平文シークレット
   * @returns 存在し、無効化されておらず、シークレットが一致する場合 true
   */
  async verify(clientId: string, clientSecret: string): Promise<boolean> {
    const record = await this.store.get(clientId)
    if (!record || record.revoked) return false

    const valid = await this.hasher.verify(clientSecret, record.secret_hash)
    if (valid && (await this.hasher.needsRehash(record.secret_hash))) {
      await this.upgradeHash(clientId, clientSecret, record.secret_hash)
    }
    return valid
  }

  /**
   * 新規発行で使うハッシュ方式
   */
  async hashScheme(): Promise<'bcrypt' | 'pbkdf2'> {
    return this.hasher.activeScheme()
  }

  /**
   * 旧方式のハッシュを現行方式へ置き換える
   */
  private async upgradeHash(clientId: string, clientSecret: string, previousHash: string): Promise<void> {
    const upgraded = await this.hasher.hash(clientSecret)
    await this.store.update((records) => {
      const record = Object.hasOwn(records, clientId) ? records[clientId] : undefined
      // 検証後に別の更新が入っていた場合は上書きしない
      if (record && record.secret_hash === previousHash) {
        record.secret_hash = upgraded
      }
    })
    logger.info(`Client secret hash upgraded: client_id=${clientId}`)
  }
}

/**
 * クライアントIDを生成する
 * 例: smc_3q2-7wEhVYtUpJ0c5dJd8A
 */
export function generateClientId(): string {
  return `${CLIENT_ID_PREFIX}${randomBytes(CLIENT_ID_BYTES).toString('base64url')}`
}

function toSummary(clientId: string, record: ClientRecord): ClientSummary {
  const summary: ClientSummary = {
    client_id: clientId,
    name: record.name,
    description: record.description,
    created_at: record.created_at,
    revoked: record.revoked,
  }
  if (record.revoked_at) summary.revoked_at = record.revoked_at
  return summary
}
