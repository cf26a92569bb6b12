import { describe, expect, it } from 'vitest'
import { buildProtectedResourceMetadata, extractSuffix, PROTECTED_RESOURCE_METADATA_PATH } from './metadata.js'

describe('extractSuffix', () => {
  it('well-known パス以降を取り出す', () => {
    expect(extractSuffix('/.well-known/oauth-protected-resource/memory/mcp/', PROTECTED_RESOURCE_METADATA_PATH)).toBe(
      'memory/mcp',
    )
    expect(extractSuffix('/.well-known/oauth-protected-resource', PROTECTED_RESOURCE_METADATA_PATH)).toBe('')
    expect(extractSuffix('/other', PROTECTED_RESOURCE_METADATA_PATH)).toBe('')
  })
})

describe('buildProtectedResourceMetadata', () => {
  it('サフィックスがあればオリジンに付ける', () => {
    expect(buildProtectedResourceMetadata('https://a.example/p', 'https://a.example', '/mcp', 'x/y').resource).toBe(
      'https://a.example/x/y',
    )
  })

  it('サフィックスが無ければ公開URL + リソースパス', () => {
    expect(buildProtectedResourceMetadata('https://a.example/p', 'https://a.example', '/mcp', '').resource).toBe(
      'https://a.example/p/mcp',
    )
  })
})
