#!/usr/bin/env node
import React from 'react'
import { render } from 'ink'
import { ZodError } from 'zod'
import { App } from './app.js'
import { parseArgs, type CommandAction } from './cli/args.js'
import { loadConfigWithEnv } from './config/config-loader.js'
import { categoriesCommand, configCommand } from './cli/commands/index.js'
import { createFormatter, describeZodError } from './cli/output.js'

const runCommand = async (action: CommandAction) => {
  const { options } = action
  const formatter = createFormatter(options.format, options.quiet)

  let loaded: ReturnType<typeof loadConfigWithEnv>
  try {
    loaded = loadConfigWithEnv({ pageSize: options.pageSize, currencySymbol: options.currency })
  } catch (error) {
    if (error instanceof ZodError) {
      formatter.error(`Invalid configuration: ${describeZodError(error)}`)
    }
    throw error
  }

  switch (action.command) {
    case 'categories':
      categoriesCommand(options)
      break
    case 'config':
      configCommand(options, loaded.config, loaded.source)
      break
    case 'tui': {
      formatter.progress(`Starting expense tracker (config from ${loaded.source})`)
      const instance = render(<App config={loaded.config} />)
      await instance.waitUntilExit()
      break
    }
  }
}

const main = async () => {
  try {
    // Parse command line arguments
    const action = parseArgs(process.argv)

    // If null, --help or --version was displayed
    if (!action) {
      process.exit(0)
    }

    await runCommand(action)
  } catch (error) {
    if (error instanceof ZodError) {
      console.error('Error:', describeZodError(error))
    } else {
      console.error('Error:', error instanceof Error ? error.message : error)
    }
    process.exit(1)
  }
}

void main()
