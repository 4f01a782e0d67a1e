#!/usr/bin/env node
import 'reflect-metadata'
import 'dotenv/config'
import { Logger, configureLogging, red } from './util/logger'
const logger = new Logger()

import { hideBin } from 'yargs/helpers'

import { loadConfig } from './util/config'
import { buildCli } from './cli'
import { defaultCommandDeps } from './commands/corpus'

try {
    const config = loadConfig()
    configureLogging({ level: config.logLevel, directory: config.logDirectory })
    await buildCli(hideBin(process.argv), defaultCommandDeps(config)).parseAsync()
} catch (error) {
    logger.error(red(error instanceof Error ? `${error.name}: ${error.message}` : String(error)))
    process.exitCode = 1
}
