import { describe, it, expect, vi, afterEach } from 'vitest'
import fs from 'fs'
import os from 'os'
import path from 'path'
import { Logger, configureLogging, formatDate, logoutput } from './logger'

afterEach(() => {
    configureLogging({ level: 'silent', directory: null })
    vi.restoreAllMocks()
})

describe('formatDate', () => {
    it('pads every field', () => {
        expect(formatDate(new Date(2024, 0, 5, 3, 4, 9))).toBe('2024-01-05 03:04:09')
    })
})

describe('logoutput', () => {
    it('tags the line with the level and module', () => {
        expect(logoutput('warn', 'careful', 'Cache')).toMatch(/^\d{4}-\d\d-\d\d \d\d:\d\d:\d\d -  warn: \[Cache\] careful$/)
    })

    it('serializes non-string data', () => {
        expect(logoutput('info', { posts: 3 })).toMatch(/ info: \{"posts":3\}$/)
    })
})

describe('Logger', () => {
    it('writes to stderr and emits the plain line', () => {
        const stderr = vi.spyOn(console, 'error').mockImplementation(() => {})
        configureLogging({ level: 'info' })
        const logger = new Logger('Test')
        const lines: string[] = []
        logger.on('ok', line => lines.push(line))

        logger.ok('done')

        expect(stderr).toHaveBeenCalledOnce()
        expect(lines).toHaveLength(1)
        expect(lines[0]).toMatch(/ {4}ok: \[Test\] done$/)
    })

    it('drops lines above the threshold', () => {
        const stderr = vi.spyOn(console, 'error').mockImplementation(() => {})
        configureLogging({ level: 'warn' })
        const logger = new Logger('Test')

        logger.info('hidden')
        logger.debug('hidden')
        logger.warn('shown')
        logger.error('shown')

        expect(stderr).toHaveBeenCalledTimes(2)
    })

    it('appends to a log file when a directory is set', () => {
        vi.spyOn(console, 'error').mockImplementation(() => {})
        const directory = fs.mkdtempSync(path.join(os.tmpdir(), 'feedchain-log-'))
        configureLogging({ level: 'debug', directory })
        const logger = new Logger('Test')

        logger.debug('first')
        logger.error('second')

        const files = fs.readdirSync(directory)
        expect(files).toHaveLength(1)
        const lines = fs.readFileSync(path.join(directory, files[0]), 'utf8').trimEnd().split('\n')
        expect(lines).toHaveLength(2)
        expect(lines[0]).toMatch(/debug: \[Test\] first$/)
        expect(lines[1]).toMatch(/error: \[Test\] second$/)

        fs.rmSync(directory, { recursive: true, force: true })
    })
})
