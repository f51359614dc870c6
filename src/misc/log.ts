// Imports =============================================================================================================

import { styleText } from 'node:util'
import { toGridString, type Printable } from './toGridString.js'

// Types ===============================================================================================================

export type TLogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'
export type TLogDetails = Record<string, Printable>

/** Anything that receives formatted log lines. Defaults to the console. */
export interface TLogSink {
    debug: (line: string) => void
    info:  (line: string) => void
    warn:  (line: string) => void
    error: (line: string) => void
}

// Exports =============================================================================================================

export const LOG_LEVELS: readonly TLogLevel[] = ['debug', 'info', 'warn', 'error', 'silent']

const severity = (level: TLogLevel) => LOG_LEVELS.indexOf(level)

const gray = (text: string) => styleText(['gray'], text)
const tags: Record<Exclude<TLogLevel, 'silent'>, (text: string) => string> = {
    debug: (text) => styleText(['gray'], text),
    info:  (text) => styleText(['cyan'], text),
    warn:  (text) => styleText(['yellow'], text),
    error: (text) => styleText(['red'], text),
}

/**
 * Scoped console logger.
 * Lines look like `[dsmeta:store] message`, followed by an optional
 * grid of details rendered with `toGridString`.
 */
export default class Log {

    public readonly scope: string
    public readonly level: TLogLevel
    private readonly sink: TLogSink

    constructor(scope: string, level: TLogLevel = 'warn', sink: TLogSink = console) {
        this.scope = scope
        this.level = level
        this.sink = sink
    }

    public enabled(level: Exclude<TLogLevel, 'silent'>) {
        return severity(level) >= severity(this.level)
    }

    public debug(message: string, details?: TLogDetails) { this.emit('debug', message, details) }
    public info (message: string, details?: TLogDetails) { this.emit('info',  message, details) }
    public warn (message: string, details?: TLogDetails) { this.emit('warn',  message, details) }
    public error(message: string, details?: TLogDetails) { this.emit('error', message, details) }

    private emit(level: Exclude<TLogLevel, 'silent'>, message: string, details?: TLogDetails) {
        if (!this.enabled(level)) return
        const head = tags[level](`[dsmeta:${this.scope}]`) + ' ' + message
        const body = details && Object.keys(details).length > 0 ? '\n' + gray(toGridString(details)) : ''
        this.sink[level](head + body)
    }

}
