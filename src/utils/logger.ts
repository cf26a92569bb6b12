import fs from 'fs'
import path from 'path'
import winston from 'winston'
import DailyRotateFile from 'winston-daily-rotate-file'

const logDir = process.env.LOG_DIR || 'logs'
const retentionDays = parseInt(process.env.LOG_RETENTION_DAYS || '14', 10)
const level = process.env.LOG_LEVEL || 'info'
const fileLevel = process.env.LOG_FILE_LEVEL || level
const consoleLevel = process.env.LOG_CONSOLE_LEVEL || level

/**
 * 共通のログ行フォーマット
 * 例: 2026/01/01 12:00:00 [INFO ] Token issued {"clientId":"smc_..."}
 */
const lineFormat = winston.format.printf(({ timestamp, level, message, ...meta }) => {
  // ログレベルを5文字で統一
  const paddedLevel = level.toUpperCase().padEnd(5, ' ')
  const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : ''
  return `${timestamp} [${paddedLevel}] ${message}${metaStr}`
})

// ログディレクトリが存在しない場合は作成
const logDirPath = path.resolve(process.cwd(), logDir)
if (!fs.existsSync(logDirPath)) {
  fs.mkdirSync(logDirPath, { recursive: true })
}

const transport = new DailyRotateFile({
  dirname: logDirPath,
  filename: 'oauth-%DATE%.log',
  datePattern: 'YYYY-MM-DD',
  zippedArchive: true,
  maxSize: '20m',
  maxFiles: `${retentionDays}d`,
  auditFile: path.join(logDirPath, 'audit.json'),
  createSymlink: true,
  symlinkName: 'oauth-current.log',
  level: fileLevel,
})

const logger = winston.createLogger({
  level,
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY/MM/DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    lineFormat,
  ),
  transports: [
    transport,
    new winston.transports.Console({
      level: consoleLevel,
      // CLIの標準出力と混ざらないよう、コンソールログは標準エラーへ
      stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
      format: winston.format.combine(
        winston.format.timestamp({ format: 'YYYY/MM/DD HH:mm:ss' }),
        lineFormat,
        winston.format.colorize({ all: true }),
      ),
    }),
  ],
})

transport.on('new', (filename: string) => {
  logger.info(`New log file created: ${filename}`)
})

transport.on('rotate', (oldFilename: string, newFilename: string) => {
  logger.info(`Log rotated from ${oldFilename} to ${newFilename}`)
})

logger.debug(`Log directory: ${logDirPath} (retention ${retentionDays} days, file=${fileLevel}, console=${consoleLevel})`)

export default logger
