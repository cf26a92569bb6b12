import { describe, expect, it } from 'vitest'
import { addSeconds, parseTimeToSeconds, toEpochSeconds } from './time.js'

describe('parseTimeToSeconds', () => {
  it('日単位を変換できる', () => {
    expect(parseTimeToSeconds('1d')).toBe(86400)
    expect(parseTimeToSeconds('30d')).toBe(2592000)
  })

  it('時間・分・秒単位を変換できる', () => {
    expect(parseTimeToSeconds('1h')).toBe(3600)
    expect(parseTimeToSeconds('10m')).toBe(600)
    expect(parseTimeToSeconds('45s')).toBe(45)
  })

  it('複合指定を変換できる', () => {
    expect(parseTimeToSeconds('1d2h30m10s')).toBe(86400 + 7200 + 1800 + 10)
  })

  it('数値のみはそのまま秒数', () => {
    expect(parseTimeToSeconds('120')).toBe(120)
  })

  it('未指定・空文字はフォールバック値', () => {
    expect(parseTimeToSeconds(undefined, 600)).toBe(600)
    expect(parseTimeToSeconds('   ', 600)).toBe(600)
  })

  it('不正な文字列はフォールバック値', () => {
    expect(parseTimeToSeconds('abc')).toBe(3600)
    expect(parseTimeToSeconds('1x2y', 60)).toBe(60)
    expect(parseTimeToSeconds('10m-5s', 60)).toBe(60)
  })

  it('合計0秒はフォールバック値', () => {
    expect(parseTimeToSeconds('0s', 30)).toBe(30)
    expect(parseTimeToSeconds('0', 30)).toBe(30)
  })
})

describe('時刻ユーティリティ', () => {
  it('toEpochSecondsは秒単位に切り捨てる', () => {
    expect(toEpochSeconds(new Date(1_700_000_000_999))).toBe(1_700_000_000)
  })

  it('addSecondsは指定秒数後の日時を返す', () => {
    const base = new Date('2026-01-01T00:00:00.000Z')
    expect(addSeconds(base, 600).toISOString()).toBe('2026-01-01T00:10:00.000Z')
  })
})
