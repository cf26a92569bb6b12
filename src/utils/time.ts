/**
 * 時間形式文字列を秒数に変換する関数
 *
 * 対応形式:
 *   - "1d"   : 日（1日=86400秒）
 *   - "2h"   : 時間（1時間=3600秒）
 *   - "30m"  : 分（1分=60秒）
 *   - "10s"  : 秒
 *   - 複合指定（例: "1d2h30m10s"）も可
 *   - 数値のみ（例: "120"）はそのまま秒数として扱う
 *   - 未指定・不正な形式・合計0秒は fallbackSeconds
 *
 * @param timeStr 例: "1d2h30m10s", "120", "2h"
 * @param fallbackSeconds 解釈できない場合の秒数
 * @returns 秒数
 */
export function parseTimeToSeconds(timeStr: string | undefined, fallbackSeconds = 3600): number {
  const value = timeStr?.trim()
  if (!value) return fallbackSeconds

  // 数値のみの場合は秒数として解釈
  if (/^\d+$/.test(value)) {
    const seconds = parseInt(value, 10)
    return seconds > 0 ? seconds : fallbackSeconds
  }

  // 単位付きの表記は全体が (\d+[dhms])+ に一致する場合のみ受け付ける
  if (!/^(\d+[dhms])+$/.test(value)) return fallbackSeconds

  const units: Record<string, number> = { d: 86400, h: 3600, m: 60, s: 1 }
  let totalSeconds = 0
  for (const [, amount, unit] of value.matchAll(/(\d+)([dhms])/g)) {
    totalSeconds += parseInt(amount, 10) * units[unit]
  }

  return totalSeconds > 0 ? totalSeconds : fallbackSeconds
}

/**
 * Dateを秒単位のUNIX時刻に変換する
 */
export function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000)
}

/**
 * 指定秒数後の日時を返す
 */
export function addSeconds(date: Date, seconds: number): Date {
  return new Date(date.getTime() + seconds * 1000)
}
