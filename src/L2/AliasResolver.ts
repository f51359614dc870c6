// Imports =============================================================================================================

import fs from 'node:fs'
import path from 'node:path'

import Log from '../misc/log.js'
import * as C from '../Constants.js'

// Types ===============================================================================================================

export interface TAliasOptions {
    /** Hidden folders searched for a background image   */ folders:    readonly string[]
    /** Recognized image file extensions                 */ extensions: readonly string[]
    /** Diagnostics                                      */ log?:       Log
}

// Exports =============================================================================================================

const escape = (text: string) => text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')

const isFile = (file: string) => {
    const stat = fs.statSync(file, { throwIfNoEntry: false })
    return stat !== undefined && stat.isFile()
}

/**
 * Best-effort lookup of the image an alias record points to.
 *
 * Alias records are not decoded. Instead, the record is searched for an embedded
 * absolute path ending in an image extension, which is then checked as-is and
 * relative to `directory`. When that fails, the first image inside one of the
 * hidden background folders of `directory` is used.
 *
 * Returns `undefined` when nothing resolves. Never throws.
 */
export default function resolveAlias(data: Buffer, directory: string, options: TAliasOptions): string | undefined {

    const log = options.log ?? new Log('alias', 'silent')

    try {

        if (data.length < C.ALIAS_MIN_LENGTH) {
            log.debug('Alias record is too short to hold a path.', { length: data.length })
            return undefined
        }

        const extensions = options.extensions.map(escape).join('|')
        const pattern = new RegExp(`(/[^\\x00-\\x1F]+\\.(?:${extensions}))`, 'i')
        const embedded = pattern.exec(data.toString('utf-8'))?.[1]

        if (embedded) {
            if (isFile(embedded)) return embedded
            const relative = path.join(directory, embedded)
            if (isFile(relative)) return relative
            log.debug('Embedded alias path does not exist.', { embedded, directory })
        }

        const wanted = new Set(options.extensions.map(ext => `.${ext.toLowerCase()}`))
        for (const folder of options.folders) {
            const location = path.join(directory, folder)
            const stat = fs.statSync(location, { throwIfNoEntry: false })
            if (!stat || !stat.isDirectory()) continue
            const image = fs.readdirSync(location)
                .sort()
                .find(name => wanted.has(path.extname(name).toLowerCase()) && isFile(path.join(location, name)))
            if (image) return path.join(location, image)
        }

        return undefined

    }
    catch (error) {
        log.debug('Alias resolution failed.', { directory, reason: (error as Error).message })
        return undefined
    }

}
