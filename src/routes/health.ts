import { Router } from 'express'

export const SERVICE_NAME = 'memory-gateway-oauth'

const router = Router()

// ヘルスチェックエンドポイント
router.get('/', (req, res) => {
  res.json({ status: 'ok', service: SERVICE_NAME })
})

export default router
