// Imports =============================================================================================================

import fs from 'node:fs'
import ini from 'ini'
import { z } from 'zod'

import type * as T from '../types.js'
import DSMetaError from './errors/DSMetaError.js'
import Log, { type TLogLevel, type TLogSink } from './misc/log.js'
import * as C from './Constants.js'

// Types ===============================================================================================================

const list = (fallback: readonly string[]) => z
    .union([z.string(), z.array(z.string())])
    .transform(value => (Array.isArray(value) ? value : value.split(','))
        .map(item => item.trim())
        .filter(item => item.length > 0)
    )
    .default(fallback.join(','))

export const configSchema = z.object({
    store: z.object({
        filename:   z.string().min(1, 'Store filename is required').default(C.STORE_FILENAME),
        pageSize:   z.coerce.number().int().min(512).max(C.KB_64)
                        .refine(size => (size & (size - 1)) === 0, 'Page size must be a power of two')
                        .default(C.PAGE_SIZE),
    }).default({}),
    background: z.object({
        folders:    list(C.BACKGROUND_FOLDERS),
        extensions: list(C.IMAGE_EXTENSIONS),
    }).default({}),
    log: z.object({
        level:      z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('warn'),
    }).default({}),
})

export type TConfig = z.infer<typeof configSchema>
export type TConfigInput = z.input<typeof configSchema>

// Exports =============================================================================================================

/**
 * Explicit configuration passed to the store, the semantic layer and the CLI.
 * Built from defaults, from a plain object or from an INI file such as:
 * ```ini
 * [store]
 * filename = .DS_Store
 * pageSize = 4096
 *
 * [background]
 * folders = .background, .bg
 *
 * [log]
 * level = debug
 * ```
 */
export default class Config {

    private readonly params: TConfig
    private readonly sink?: TLogSink

    private constructor(params: TConfig, sink?: TLogSink) {
        this.params = params
        this.sink = sink
    }

    public static defaults(): Config {
        return new this(configSchema.parse({}))
    }

    public static from(input: unknown): T.XEav<Config, 'CF_INVALID'> {
        const result = configSchema.safeParse(input)
        if (!result.success) {
            const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ')
            return DSMetaError.eav('CF_INVALID', `Invalid configuration - ${issues}`, result.error)
        }
        return [null, new this(result.data)]
    }

    /** Reads and validates an INI configuration file. */
    public static load(file: string): T.XEav<Config, 'CF_LOAD' | 'CF_INVALID'> {
        let parsed: Record<string, unknown>
        try {
            parsed = ini.parse(fs.readFileSync(file, 'utf-8'))
        }
        catch (error) {
            return DSMetaError.eav('CF_LOAD', null, error as Error, { file })
        }
        return this.from(parsed)
    }

    /** Returns a copy of the configuration logging at `level`, optionally into a custom sink. */
    public withLogging(level: TLogLevel, sink: TLogSink | undefined = this.sink): Config {
        return new Config({ ...this.params, log: { level } }, sink)
    }

    public get storeFilename()     { return this.params.store.filename }
    public get pageSize()          { return this.params.store.pageSize }
    public get backgroundFolders() { return this.params.background.folders }
    public get imageExtensions()   { return this.params.background.extensions }
    public get logLevel()          { return this.params.log.level }

    public logger(scope: string): Log {
        return new Log(scope, this.params.log.level, this.sink)
    }

}
