#!/usr/bin/env node
import { Command } from 'commander'
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import { createRuntime, VERSION } from './runtime.js'

interface CliOptions {
  config?: string
  caldavUrl?: string
  caldavUsername?: string
  caldavPassword?: string
  verbose: number
}

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1
}

async function serve(options: CliOptions): Promise<void> {
  const { logger, client, server } = createRuntime({
    configPath: options.config,
    url: options.caldavUrl,
    username: options.caldavUsername,
    password: options.caldavPassword,
    verbosity: options.verbose,
  })

  if (client) {
    try {
      await client.connect()
    } catch (err) {
      logger.fatal(err instanceof Error ? err.message : String(err))
      process.exit(1)
    }
    logger.info({ provider: client.provider.name }, 'Connected to CalDAV server')
  }

  const transport = new StdioServerTransport()

  const shutdown = (signal: string): void => {
    logger.info({ signal }, 'Shutting down')
    client?.close()
    server.instance.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error(err instanceof Error ? err.message : String(err))
        process.exit(1)
      },
    )
  }
  process.on('SIGINT', () => shutdown('SIGINT'))
  process.on('SIGTERM', () => shutdown('SIGTERM'))

  await server.instance.connect(transport)
  logger.info('Calendar tools listening on stdio')
}

const program = new Command()
  .name('caldav-mcp')
  .description('MCP server exposing CalDAV calendar tools over stdio')
  .version(VERSION)
  .option('-c, --config <path>', 'YAML config file with a caldav section')
  .option('--caldav-url <url>', 'CalDAV server URL (env: CALDAV_URL)')
  .option('--caldav-username <username>', 'CalDAV username (env: CALDAV_USERNAME)')
  .option('--caldav-password <password>', 'CalDAV password or app password (env: CALDAV_PASSWORD)')
  .option('-v, --verbose', 'more logging on stderr (repeat for debug)', increaseVerbosity, 0)
  .action(async () => {
    await serve(program.opts<CliOptions>())
  })

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error('Fatal error:', err)
  process.exit(1)
})
