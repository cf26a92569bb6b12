#!/usr/bin/env node
/**
 * 管理用CLI
 * クライアントの発行・一覧・無効化と、サーバーの起動を行う
 */
import 'dotenv/config'
import { Command, CommanderError, InvalidArgumentError } from 'commander'
import { loadConfig, ServerConfig } from './config.js'
import { AppContext, createContext } from './context.js'
import { registerGracefulShutdown, startServer } from './server.js'
import { isMainModule } from './utils/main-module.js'

export interface CliDependencies {
  /** 設定の読み込み（コマンド実行時に呼ばれる） */
  loadConfig: () => ServerConfig
  /** ストアの組み立て */
  createContext: (config: ServerConfig) => AppContext
  /** サーバー起動 */
  serve: (config: ServerConfig) => Promise<void>
  /** 標準出力 */
  writeOut: (text: string) => void
  /** 標準エラー出力 */
  writeErr: (text: string) => void
}

const defaultDependencies: CliDependencies = {
  loadConfig: () => loadConfig(),
  createContext: (config) => createContext(config),
  serve: async (config) => {
    registerGracefulShutdown(await startServer(config))
  },
  writeOut: (text) => process.stdout.write(text),
  writeErr: (text) => process.stderr.write(text),
}

/**
 * CLIプログラムを作成する
 * 終了コードは CommanderError として呼び出し側へ伝える（process.exit は呼ばない）
 * @param overrides 依存の差し替え（テスト用）
 */
export function createProgram(overrides: Partial<CliDependencies> = {}): Command {
  const deps: CliDependencies = { ...defaultDependencies, ...overrides }
  const println = (line = ''): void => deps.writeOut(`${line}\n`)

  const program = new Command()
  program
    .name('memory-gateway-oauth')
    .description('OAuth 2.0 authorization server for the memory gateway')
    .version('0.1.0')
    .exitOverride()
    .configureOutput({ writeOut: deps.writeOut, writeErr: deps.writeErr })

  program
    .command('generate-client')
    .description('register a new OAuth client and print its credentials')
    .requiredOption('--name <name>', 'client display name')
    .option('--description <text>', 'client description', '')
    .action(async (options: { name: string; description: string }) => {
      const { clients } = deps.createContext(deps.loadConfig())
      const client = await clients.generate(options.name, options.description)

      println('OAuth client generated.')
      println()
      println(`  client_id:     ${client.client_id}`)
      println(`  client_secret: ${client.client_secret}`)
      println(`  name:          ${client.name}`)
      if (client.description) println(`  description:   ${client.description}`)
      println()
      println('Store the client secret now. It cannot be shown again.')
    })

  program
    .command('list-clients')
    .description('list registered OAuth clients')
    .action(async () => {
      const { clients } = deps.createContext(deps.loadConfig())
      const summaries = await clients.list()
      if (summaries.length === 0) {
        println('No clients registered.')
        return
      }
      for (const client of summaries) {
        const status = client.revoked ? `revoked ${client.revoked_at ?? ''}`.trim() : 'active'
        println(`${client.client_id}  ${client.name}  [${status}]  created ${client.created_at}`)
        if (client.description) println(`    ${client.description}`)
      }
    })

  program
    .command('revoke-client')
    .description('revoke an OAuth client (tokens stop working immediately)')
    .requiredOption('--client-id <id>', 'client to revoke')
    .action(async (options: { clientId: string }) => {
      const { clients } = deps.createContext(deps.loadConfig())
      if (!(await clients.revoke(options.clientId))) {
        program.error(`Client not found: ${options.clientId}`, { exitCode: 1, code: 'client.notFound' })
      }
      println(`Client revoked: ${options.clientId}`)
    })

  program
    .command('serve')
    .description('start the authorization server')
    .option('--host <host>', 'bind address')
    .option('--port <port>', 'listen port', parsePort)
    .action(async (options: { host?: string; port?: number }) => {
      const config = deps.loadConfig()
      await deps.serve({
        ...config,
        host: options.host ?? config.host,
        port: options.port ?? config.port,
      })
    })

  return program
}

function parsePort(value: string): number {
  const port = Number(value)
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError('Must be an integer between 0 and 65535.')
  }
  return port
}

async function main(): Promise<void> {
  const program = createProgram()
  try {
    await program.parseAsync(process.argv)
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      process.exit(error.exitCode)
    }
    process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`)
    process.exit(1)
  }
}

if (isMainModule(import.meta.url)) {
  await main()
}
