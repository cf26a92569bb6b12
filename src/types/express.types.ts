/**
 * Express の res.locals 拡張
 */
import type { AccessTokenClaims } from './jwt.types.js'

declare global {
  namespace Express {
    interface Locals {
      /** Bearer認証ミドルウェアが検証済みのクレームを格納する */
      tokenClaims?: AccessTokenClaims
    }
  }
}

export {}
