import yargs from 'yargs'
import { createXmlApi, type XmlApiDependencies } from '../../application/xmlApi.js'
import { loadXmlApiConfig, type ConfiguredLogLevel } from '../../config/xmlApiConfig.js'
import { isXmlApiError } from '../../core/errors.js'
import { createConsoleLogger } from '../../infrastructure/logging/consoleLogger.js'
import type { IO } from './io.js'

/**
 * CLI adapter: parse commands → call the XML API
 *
 * Commands:
 * - methods
 * - call <method> [args..] [--raw]
 *
 * Settings come from CCU_* environment variables; --address and --timeout
 * override them.
 */
export async function runCli(opts: {
  argv: string[]
  env: Record<string, string | undefined>
  io: IO
  deps?: XmlApiDependencies
}): Promise<number> {
  const { argv, env, io, deps } = opts

  const openApi = (flags: { address?: string; timeout?: number; verbose: boolean }) => {
    const fromEnv = loadXmlApiConfig(env)
    const logLevel: ConfiguredLogLevel = flags.verbose ? 'debug' : fromEnv.logLevel
    const options: Record<string, unknown> = { ...fromEnv.options }
    if (flags.address !== undefined) options.address = flags.address
    if (flags.timeout !== undefined) options.connectTimeoutMs = flags.timeout

    return createXmlApi(options, {
      logger: createConsoleLogger({
        level: logLevel,
        sink: {
          debug: (line) => io.stderr(`${line}\n`),
          info: (line) => io.stderr(`${line}\n`),
          warn: (line) => io.stderr(`${line}\n`),
          error: (line) => io.stderr(`${line}\n`),
        },
      }),
      ...deps,
    })
  }

  const parser = yargs(argv)
    .scriptName('ccu-xml')
    .option('address', { type: 'string', describe: 'CCU host or URL (default: $CCU_ADDRESS)' })
    .option('timeout', { type: 'number', describe: 'Request timeout in milliseconds' })
    .option('verbose', { type: 'boolean', default: false, describe: 'Log every call to stderr' })
    .command(
      'methods',
      'List the methods the CCU offers',
      (y) => y,
      async (args) => {
        const api = openApi(args)
        await api.printMethods({ write: (text) => io.stdout(text) })
      }
    )
    .command(
      'call <method> [args..]',
      'Call a method by its local name, e.g. ccu_get_serial',
      (y) =>
        y
          .positional('method', { type: 'string', demandOption: true })
          .positional('args', {
            type: 'string',
            array: true,
            describe: 'JSON values (12345 is sent as an int, "12345" as a string)',
          })
          .option('raw', { type: 'boolean', default: false, describe: 'Send every argument as a plain string' }),
      async (args) => {
        const api = openApi(args)
        const params = (args.args ?? []).map((arg) => (args.raw ? arg : parseArgument(arg)))
        const result = await api.invoke(args.method, ...params)
        io.stdout(`${JSON.stringify(result, null, 2) ?? 'null'}\n`)
      }
    )
    .demandCommand(1)
    .strict()
    .exitProcess(false)
    .fail((message, error) => {
      throw error ?? new Error(message)
    })
    .help()

  try {
    await parser.parseAsync()
    return 0
  } catch (err) {
    if (isXmlApiError(err)) {
      io.stderr(`${err.name}: ${err.message}\n`)
    } else {
      io.stderr(`${err instanceof Error ? err.message : String(err)}\n`)
    }
    return 1
  }
}

/**
 * Arguments are JSON when they parse as such (`1`, `true`, `"x"`, `[..]`), else plain strings.
 * A serial like `0001234` is not JSON and stays a string; `12345` becomes an int.
 */
function parseArgument(raw: string): unknown {
  try {
    return JSON.parse(raw)
  } catch {
    return raw
  }
}
