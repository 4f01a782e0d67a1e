import yargs from 'yargs'

import { generateCommand } from './commands/generate.command'
import { infoCommand } from './commands/info.command'
import type { CommandDeps } from './commands/corpus'

export function buildCli(argv: string[], deps: CommandDeps) {
    const cli = yargs(argv)
        .scriptName('feedchain')
        .usage('Usage: $0 [generate|info] <username> [options]')
    return infoCommand(generateCommand(cli, deps), deps)
        .strict()
        .help()
        .alias('help', 'h')
        .version(false)
        .exitProcess(false)
        .fail((msg, err, parser) => {
            // Runtime errors go to the caller; only argument mistakes get the usage screen
            if (err) throw err
            parser.showHelp()
            throw new Error(msg)
        })
}
