import { EventEmitter } from 'tseep'
import type { JSONResolvable } from '../types/types'
import fs from 'fs'
import path from 'path'

import chalk from 'chalk'
// Force colors to be enabled
chalk.level = 2
// Shortcut for using chalk colors alongside logger
export const { yellow, red, cyan, green, blue } = chalk

export type LogLevel = 'error' | 'warn' | 'info' | 'ok' | 'debug'
export type LogThreshold = 'silent' | 'error' | 'warn' | 'info' | 'debug'

// `ok` sits with `info`: it reports a finished step, not extra detail
const severity: Record<LogLevel, number> = {
    error: 1,
    warn: 2,
    info: 3,
    ok: 3,
    debug: 4
}
const thresholds: Record<LogThreshold, number> = {
    silent: 0,
    error: 1,
    warn: 2,
    info: 3,
    debug: 4
}

interface LoggingSettings {
    level: LogThreshold
    directory: string | null
}

const settings: LoggingSettings = {
    level: 'warn',
    directory: null
}
let logFile: string | null = null

/**
 * Applies to every Logger, including the ones created before this call
 */
export function configureLogging(options: Partial<LoggingSettings>) {
    if (options.level !== undefined) settings.level = options.level
    if (options.directory !== undefined && options.directory !== settings.directory) {
        settings.directory = options.directory
        logFile = null
    }
}

export class Logger extends EventEmitter<{
    error: (data: string) => void
    warn: (data: string) => void
    info: (data: string) => void
    ok: (data: string) => void
    debug: (data: string) => void
}> {
    module: string | undefined
    constructor(module?: string) {
        super()
        this.module = module
    }
    private _log(level: LogLevel, data: JSONResolvable) {
        if (severity[level] > thresholds[settings.level]) return
        // stdout carries the generated text
        console.error(logoutput(level, data, this.module, true))
        this.emit(level, logoutput(level, data, this.module))
        this.writeLogLine(logoutput(level, data, this.module))
    }

    error(data: JSONResolvable) {
        this._log('error', data)
    }
    warn(data: JSONResolvable) {
        this._log('warn', data)
    }
    info(data: JSONResolvable) {
        this._log('info', data)
    }
    ok(data: JSONResolvable) {
        this._log('ok', data)
    }
    debug(data: JSONResolvable) {
        this._log('debug', data)
    }

    writeLogLine(str: string) {
        const file = resolveLogFile()
        if (file) fs.appendFileSync(file, `${str}\n`)
    }
}

function resolveLogFile() {
    if (!settings.directory) return null
    if (logFile) return logFile
    if (!fs.existsSync(settings.directory)) fs.mkdirSync(settings.directory, { recursive: true })
    logFile = path.join(settings.directory, `${formatDate().replace(/[ :]/g, '.')}.log`)
    return logFile
}

export function formatDate(d = new Date()) {
    const pad = (n: number) => String(n).padStart(2, '0')
    return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`
}
export function logoutput(level: LogLevel, data: JSONResolvable, module?: string, formatting = false) {
    let str = ''
    const displayLevelsColored = {
        'error': red('error'),
        'warn' : yellow(' warn'),
        'info' : cyan(' info'),
        'ok'   : green('   ok'),
        'debug': blue('debug')
    }
    const displayLevels = {
        'error': 'error',
        'warn' : ' warn',
        'info' : ' info',
        'ok'   : '   ok',
        'debug': 'debug'
    }
    if (module) str += `${formatDate()} - ${formatting ? displayLevelsColored[level] : displayLevels[level]}: [${module}]`
    else str += `${formatDate()} - ${formatting ? displayLevelsColored[level] : displayLevels[level]}:`
    if (typeof data === 'string') str += ` ${data}`
    else str += ` ${JSON.stringify(data)}`
    return str
}
