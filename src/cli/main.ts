// Imports =============================================================================================================

import fs from 'node:fs'
import path from 'node:path'
import process from 'node:process'
import { parseArgs } from 'node:util'

import Config from '../Config.js'
import * as C from '../Constants.js'
import type { TLogSink } from '../misc/log.js'
import { toGridString } from '../misc/toGridString.js'
import EntryCodec, { type TRecord, type TRecordValue } from '../L0/EntryCodec.js'
import Plist from '../L0/Plist.js'
import BTreeStore from '../L1/BTreeStore.js'
import SemanticDecoder from '../L2/SemanticDecoder.js'
import SemanticEncoder from '../L2/SemanticEncoder.js'
import MetadataLoader, { describeMetadata, labelColorIndex, labelColorName } from '../L2/MetadataLoader.js'
import { Code } from '../L2/Codes.js'
import { asDict } from '../L2/values.js'
import {
    cloneMetadata,
    emptyMetadata,
    visibleColumns,
    type TBackground,
    type TDirectoryMetadata,
    type TIconArrangement,
    type TIconInfo,
    type TLabelPosition,
    type TViewStyle,
} from '../L2/DirectoryMetadata.js'

// Types ===============================================================================================================

export interface TOutput {
    write(text: string): unknown
}

export interface TCliIO {
    stdout: TOutput
    stderr: TOutput
}

interface TContext {
    config: Config
    out: (line?: string) => void
}

interface TCommand {
    /** Argument synopsis                                */ usage:  string
    /** One-line description                             */ help:   string
    /** Minimum and maximum argument count               */ arity:  [number, number]
    /** Runs the command and returns its exit code       */ run:    (ctx: TContext, args: string[]) => number
}

/** A directory setting exposed as a `get-<name>` / `set-<name>` command pair. */
interface TSetting<V> {
    /** Output label, e.g. "Icon size"                   */ label:       string
    /** Help text subject, e.g. "icon size in points"    */ subject:     string
    /** Synopsis of the value argument                   */ argument:    string
    /** Reads the value from decoded metadata            */ read:        (metadata: TDirectoryMetadata) => V | undefined
    /** Stores the value into metadata about to be saved */ write:       (metadata: TDirectoryMetadata, value: V) => void
    /** Parses the command line argument                 */ parse:       (text: string) => V
    /** Formats a value for output                       */ format:      (value: V) => string
}

// Errors ==============================================================================================================

export class CliError extends Error {
    constructor(message: string) {
        super(message)
        this.name = 'CliError'
    }
}

// Helpers =============================================================================================================

const defaultIO: TCliIO = {
    stdout: process.stdout,
    stderr: process.stderr,
}

const VIEW_STYLES: Record<string, TViewStyle> = {
    icon: 'Icon', list: 'List', column: 'Column', gallery: 'Gallery', coverflow: 'Coverflow', flow: 'Coverflow',
}

const MIN_ICON_SIZE = 16
const MAX_SIDEBAR_WIDTH = 4096
const MAX_COLUMN_WIDTH = 4096

const PLIST_CODES = new Set<string>([Code.WindowSettings, Code.IconViewSettings, Code.ListViewSettings, Code.ListViewSettingsAlt])

const toInteger = (text: string, name: string) => {
    const value = Number(text)
    if (text.trim() === '' || !Number.isInteger(value)) throw new CliError(`${name} must be an integer, got "${text}"`)
    return value
}

const toChannel = (text: string, name: string) => {
    const value = Number(text)
    if (text.trim() === '' || !(value >= 0 && value <= 1)) throw new CliError(`${name} must be between 0.0 and 1.0, got "${text}"`)
    return value
}

const toBounded = (text: string, name: string, min: number, max: number) => {
    const value = toInteger(text, name)
    if (value < min || value > max) throw new CliError(`${name} must be between ${min} and ${max}, got ${value}`)
    return value
}

const toPositive = (text: string, name: string) => {
    const value = Number(text)
    if (text.trim() === '' || !Number.isFinite(value) || value <= 0) throw new CliError(`${name} must be a positive number, got "${text}"`)
    return value
}

const toBoolean = (text: string, name: string) => {
    const value = text.toLowerCase()
    if (['1', 'true', 'yes', 'on'].includes(value)) return true
    if (['0', 'false', 'no', 'off'].includes(value)) return false
    throw new CliError(`${name} must be yes or no, got "${text}"`)
}

const toChoice = <V extends string>(choices: Record<string, V>, name: string) => (text: string): V => {
    const value = choices[text.toLowerCase()]
    if (!value) throw new CliError(`${name} must be one of ${Object.keys(choices).join(', ')}, got "${text}"`)
    return value
}

const yesNo = (value: boolean) => value ? 'yes' : 'no'

const hex = (data: Buffer) => [...data].map(byte => byte.toString(16).padStart(2, '0')).join(' ')

function formatValue(value: TRecordValue): string {
    switch (value.type) {
        case 'ustr':
        case 'type': return JSON.stringify(value.value)
        case 'blob': return value.value.length <= 16 ? `[${hex(value.value)}]` : `<${value.value.length} bytes>`
        case 'dutc': {
            const date = EntryCodec.dutcToDate(value.value)
            return Number.isNaN(date.getTime()) ? String(value.value) : date.toISOString()
        }
        default: return String(value.value)
    }
}

function describeRecord(record: TRecord): string {
    const value = record.value
    if (value.type === 'blob' && record.code === Code.IconLocation && value.value.length >= 8) {
        return `Icon position (${value.value.readInt32BE(0)}, ${value.value.readInt32BE(4)})`
    }
    if (value.type === 'blob' && PLIST_CODES.has(record.code)) {
        const [error, plist] = Plist.parse(value.value)
        const dict = error ? undefined : asDict(plist)
        if (dict) return `Property list {${Object.keys(dict).sort().join(', ')}}`
    }
    return formatValue(value)
}

function parseValue(type: string, text: string): TRecordValue {
    switch (type) {
        case 'bool': return { type, value: ['1', 'true', 'yes'].includes(text.toLowerCase()) }
        case 'long':
        case 'shor': return { type, value: toInteger(text, 'value') }
        case 'ustr':
        case 'type': return { type, value: text }
        case 'comp': {
            if (!/^-?\d+$/.test(text)) throw new CliError(`value must be an integer, got "${text}"`)
            return { type, value: BigInt(text) }
        }
        case 'dutc': {
            const seconds = Number(text)
            if (text.trim() === '' || !Number.isFinite(seconds)) throw new CliError(`value must be seconds since 1970, got "${text}"`)
            return { type, value: EntryCodec.dateToDutc(new Date(seconds * 1000)) }
        }
        case 'blob': {
            if (!/^([0-9a-f]{2})*$/i.test(text)) throw new CliError(`value must be a hex string, got "${text}"`)
            return { type, value: Buffer.from(text, 'hex') }
        }
        default:
            throw new CliError(`Unknown type "${type}"`)
    }
}

function describeBackground(background: TBackground): string {
    if (background.type === 'Color' && background.color) {
        const { red, green, blue } = background.color
        return `Color (${red.toFixed(2)}, ${green.toFixed(2)}, ${blue.toFixed(2)})`
    }
    if (background.type === 'Picture') return `Picture ${background.imagePath ?? ''}`.trimEnd()
    return 'Default'
}

// Store access ========================================================================================================

function openStore(ctx: TContext, file: string): BTreeStore {
    const [error, store] = BTreeStore.open(file, ctx.config)
    if (error?.code === 'L1_ST_NOT_FOUND') throw new CliError(`File not found: ${file}`)
    if (error) throw new CliError(`${error.message} (${file})`)
    return store
}

function openOrCreateStore(ctx: TContext, file: string): BTreeStore {
    const [error, store] = BTreeStore.open(file, ctx.config)
    if (error?.code === 'L1_ST_NOT_FOUND') return BTreeStore.create(file, ctx.config)
    if (error) throw new CliError(`${error.message} (${file})`)
    return store
}

function writeStore(store: BTreeStore) {
    const error = store.write()
    if (error) throw new CliError(`${error.message}${error.rootCause ? ` - ${error.rootCause.message}` : ''}`)
}

function decodeFile(ctx: TContext, file: string): TDirectoryMetadata {
    return new SemanticDecoder(openStore(ctx, file), { directory: path.dirname(file), config: ctx.config }).decode()
}

/** Applies `edit` to the decoded metadata of `file` and saves the result. A missing file starts out empty. */
function editFile(ctx: TContext, file: string, edit: (metadata: TDirectoryMetadata) => void) {

    const [openError, store] = BTreeStore.open(file, ctx.config)
    if (openError?.code === 'L1_ST_READ') throw new CliError(`${openError.message} (${file})`)

    const directory = path.dirname(file)
    const metadata = openError
        ? emptyMetadata(directory)
        : cloneMetadata(new SemanticDecoder(store, { directory, config: ctx.config }).decode())

    edit(metadata)

    const error = SemanticEncoder.saveFile(metadata, file, ctx.config)
    if (error) throw new CliError(`${error.message}${error.rootCause ? ` - ${error.rootCause.message}` : ''}`)

}

function editIcon(ctx: TContext, file: string, filename: string, edit: (info: TIconInfo) => void) {
    editFile(ctx, file, metadata => {
        const info = metadata.icons.get(filename) ?? { filename }
        edit(info)
        metadata.icons.set(filename, info)
    })
}

function setting<V>(name: string, options: TSetting<V>): Record<string, TCommand> {
    return {
        [`get-${name}`]: {
            usage: `get-${name} <file>`, help: `Print the ${options.subject}`, arity: [1, 1],
            run: (ctx, [file = '']) => {
                const value = options.read(decodeFile(ctx, file))
                ctx.out(`${options.label}: ${value === undefined ? 'not set' : options.format(value)}`)
                return 0
            },
        },
        [`set-${name}`]: {
            usage: `set-${name} <file> ${options.argument}`, help: `Set the ${options.subject}`, arity: [2, 2],
            run: (ctx, [file = '', text = '']) => {
                const value = options.parse(text)
                editFile(ctx, file, metadata => options.write(metadata, value))
                ctx.out(`Set ${options.label.toLowerCase()} to ${options.format(value)}`)
                return 0
            },
        },
    }
}

const flag = (label: string, subject: string, read: TSetting<boolean>['read'], write: TSetting<boolean>['write']) => ({
    label, subject, read, write, argument: '<yes|no>', parse: (text: string) => toBoolean(text, 'value'), format: yesNo,
})

// Commands ============================================================================================================

const commands: Record<string, TCommand> = {

    // Store ==================================================================

    'create': {
        usage: 'create <file>', help: 'Create an empty metadata file', arity: [1, 1],
        run: (ctx, [file = '']) => {
            writeStore(BTreeStore.create(file, ctx.config))
            ctx.out(`Created empty metadata file: ${file}`)
            return 0
        },
    },

    'list': {
        usage: 'list [file]', help: 'List all records', arity: [0, 1],
        run: (ctx, [file = ctx.config.storeFilename]) => {
            const records = [...openStore(ctx, file).entries()]
            ctx.out(`Found ${records.length} entries in ${file}:`)
            if (records.length > 0) {
                ctx.out(toGridString(records.map(record => ({ filename: record.filename, code: record.code, type: record.value.type }))))
            }
            return 0
        },
    },

    'dump': {
        usage: 'dump [file]', help: 'Dump every record with its interpreted value', arity: [0, 1],
        run: (ctx, [file = ctx.config.storeFilename]) => {
            const store = openStore(ctx, file)
            ctx.out(`Total entries: ${store.size}`)
            for (const filename of store.allFilenames()) {
                ctx.out()
                ctx.out(`File: '${filename}'`)
                for (const code of store.allCodes(filename)) {
                    const record = store.entry(filename, code)
                    if (record) ctx.out(`  ${code} (${record.value.type}): ${describeRecord(record)}`)
                }
            }
            return 0
        },
    },

    'info': {
        usage: 'info <file>', help: 'Show file information and statistics', arity: [1, 1],
        run: (ctx, [file = '']) => {
            const store = openStore(ctx, file)
            const stat = fs.statSync(file)
            const metadata = new SemanticDecoder(store, { directory: path.dirname(file), config: ctx.config }).decode()
            ctx.out(`File:       ${file}`)
            ctx.out(`Size:       ${stat.size} bytes`)
            ctx.out(`Modified:   ${stat.mtime.toISOString()}`)
            ctx.out(`Entries:    ${store.size}`)
            if (metadata.viewStyle) ctx.out(`View style: ${metadata.viewStyle}`)
            ctx.out(`Background: ${describeBackground(metadata.background)}`)
            return 0
        },
    },

    'validate': {
        usage: 'validate <file>', help: 'Check the structure of a metadata file', arity: [1, 1],
        run: (ctx, [file = '']) => {
            ctx.out(`Validation results for ${file}:`)
            const [error, store] = BTreeStore.open(file, ctx.config)
            if (error) {
                ctx.out(`  Status: invalid (${error.code}: ${error.rootCause?.message ?? error.message})`)
                return 1
            }
            const types = new Map<string, number>()
            for (const record of store.entries()) types.set(record.value.type, (types.get(record.value.type) ?? 0) + 1)
            ctx.out(`  Entries: ${store.size}`)
            if (store.superblock) {
                ctx.out(`  Levels: ${store.superblock.levels}`)
                ctx.out(`  Nodes: ${store.superblock.nodes}`)
                ctx.out(`  Page size: ${store.superblock.pageSize}`)
            }
            ctx.out('  Types:')
            for (const [type, count] of [...types].sort(([a], [b]) => a.localeCompare(b))) ctx.out(`    ${type}: ${count}`)
            const declared = store.superblock?.records
            if (declared !== undefined && declared !== store.size) {
                ctx.out(`  Status: record count mismatch (declared ${declared}, found ${store.size})`)
                return 1
            }
            ctx.out('  Status: valid')
            return 0
        },
    },

    'files': {
        usage: 'files <file>', help: 'List the file names that have records', arity: [1, 1],
        run: (ctx, [file = '']) => {
            const store = openStore(ctx, file)
            const filenames = [...store.allFilenames()]
            if (filenames.length === 0) {
                ctx.out('No files found')
                return 0
            }
            ctx.out('Files with entries:')
            for (const filename of filenames) ctx.out(`  ${filename} (${[...store.allCodes(filename)].length} fields)`)
            return 0
        },
    },

    'summary': {
        usage: 'summary <directory>', help: 'Show the decoded metadata of a directory', arity: [1, 1],
        run: (ctx, [directory = '']) => {
            ctx.out(describeMetadata(new MetadataLoader(ctx.config).load(directory)))
            return 0
        },
    },

    // Records ================================================================

    'fields': {
        usage: 'fields <file> <filename>', help: 'List the record codes of a file name', arity: [2, 2],
        run: (ctx, [file = '', filename = '']) => {
            const store = openStore(ctx, file)
            const codes = [...store.allCodes(filename)]
            if (codes.length === 0) {
                ctx.out(`No fields for ${filename}`)
                return 0
            }
            ctx.out(`Fields for ${filename}:`)
            for (const code of codes) {
                const record = store.entry(filename, code)
                if (record) ctx.out(`  ${code} (${record.value.type})`)
            }
            return 0
        },
    },

    'get': {
        usage: 'get <file> <filename> <code>', help: 'Print a record value', arity: [3, 3],
        run: (ctx, [file = '', filename = '', code = '']) => {
            const record = openStore(ctx, file).entry(filename, code)
            if (!record) ctx.out(`No field ${filename}:${code}`)
            else ctx.out(`${filename}:${code} = (${record.value.type}) ${formatValue(record.value)}`)
            return 0
        },
    },

    'set': {
        usage: 'set <file> <filename> <code> <type> <value>', help: 'Write a record (blob values in hex, dutc in seconds since 1970)', arity: [5, 5],
        run: (ctx, [file = '', filename = '', code = '', type = '', text = '']) => {
            if (!EntryCodec.isCode(code)) throw new CliError(`code must be 4 ASCII characters, got "${code}"`)
            const value = parseValue(type, text)
            const store = openOrCreateStore(ctx, file)
            store.setEntry({ filename, code, value })
            writeStore(store)
            ctx.out(`Set ${filename}:${code} to (${type}) ${formatValue(value)}`)
            return 0
        },
    },

    'remove': {
        usage: 'remove <file> <filename> <code>', help: 'Delete a record', arity: [3, 3],
        run: (ctx, [file = '', filename = '', code = '']) => {
            const store = openStore(ctx, file)
            if (!store.removeEntry(filename, code)) {
                ctx.out(`No field ${filename}:${code}`)
                return 0
            }
            writeStore(store)
            ctx.out(`Removed ${filename}:${code}`)
            return 0
        },
    },

    // Icons ==================================================================

    'get-pos': {
        usage: 'get-pos <file> <filename>', help: 'Print an icon position (center, top-left origin)', arity: [2, 2],
        run: (ctx, [file = '', filename = '']) => {
            const position = decodeFile(ctx, file).icons.get(filename)?.position
            ctx.out(position ? `Position of ${filename}: (${position.x}, ${position.y})` : `No position for ${filename}`)
            return 0
        },
    },

    'set-pos': {
        usage: 'set-pos <file> <filename> <x> <y>', help: 'Set an icon position (center, top-left origin)', arity: [4, 4],
        run: (ctx, [file = '', filename = '', xText = '', yText = '']) => {
            const position = { x: toInteger(xText, 'x'), y: toInteger(yText, 'y') }
            editIcon(ctx, file, filename, info => { info.position = position })
            ctx.out(`Set position of ${filename} to (${position.x}, ${position.y})`)
            return 0
        },
    },

    'get-comment': {
        usage: 'get-comment <file> <filename>', help: 'Print a file comment', arity: [2, 2],
        run: (ctx, [file = '', filename = '']) => {
            const comments = decodeFile(ctx, file).icons.get(filename)?.comments
            ctx.out(comments === undefined ? `No comment for ${filename}` : `Comment for ${filename}: ${comments}`)
            return 0
        },
    },

    'set-comment': {
        usage: 'set-comment <file> <filename> <text>', help: 'Set a file comment', arity: [3, 3],
        run: (ctx, [file = '', filename = '', text = '']) => {
            editIcon(ctx, file, filename, info => { info.comments = text })
            ctx.out(`Set comment for ${filename}: ${text}`)
            return 0
        },
    },

    'get-label': {
        usage: 'get-label <file> <filename>', help: 'Print a file label color', arity: [2, 2],
        run: (ctx, [file = '', filename = '']) => {
            const label = decodeFile(ctx, file).icons.get(filename)?.labelColor ?? 0
            ctx.out(`Label color for ${filename}: ${labelColorName(label)}`)
            return 0
        },
    },

    'set-label': {
        usage: 'set-label <file> <filename> <color>', help: 'Set a label color (none, red, orange, yellow, green, blue, purple, grey)', arity: [3, 3],
        run: (ctx, [file = '', filename = '', color = '']) => {
            const index = labelColorIndex(color)
            if (index === undefined) throw new CliError(`Unknown label color "${color}"`)
            editIcon(ctx, file, filename, info => { info.labelColor = index === 0 ? undefined : index })
            ctx.out(`Set label color for ${filename} to ${labelColorName(index)}`)
            return 0
        },
    },

    // Directory ==============================================================

    'get-view': {
        usage: 'get-view <file>', help: 'Print the view style and icon view settings', arity: [1, 1],
        run: (ctx, [file = '']) => {
            const metadata = decodeFile(ctx, file)
            const view = metadata.iconView
            ctx.out(`View style: ${metadata.viewStyle ?? 'not set'}`)
            if (view.iconSize !== undefined) ctx.out(`Icon size: ${view.iconSize}`)
            if (view.arrangement) ctx.out(`Arrangement: ${view.arrangement}`)
            if (view.labelPosition) ctx.out(`Label position: ${view.labelPosition}`)
            if (view.gridSpacing !== undefined) ctx.out(`Grid spacing: ${view.gridSpacing}`)
            if (view.textSize !== undefined) ctx.out(`Text size: ${view.textSize}`)
            return 0
        },
    },

    'set-view': {
        usage: 'set-view <file> <style>', help: 'Set the view style (icon, list, column, gallery, coverflow)', arity: [2, 2],
        run: (ctx, [file = '', name = '']) => {
            const style = VIEW_STYLES[name.toLowerCase()]
            if (!style) throw new CliError(`Unknown view style "${name}"`)
            editFile(ctx, file, metadata => { metadata.viewStyle = style })
            ctx.out(`Set view style to ${style}`)
            return 0
        },
    },

    'get-bg': {
        usage: 'get-bg <file>', help: 'Print the window background', arity: [1, 1],
        run: (ctx, [file = '']) => {
            ctx.out(`Background: ${describeBackground(decodeFile(ctx, file).background)}`)
            return 0
        },
    },

    'set-bg-color': {
        usage: 'set-bg-color <file> <r> <g> <b>', help: 'Set a solid background color (channels 0.0-1.0)', arity: [4, 4],
        run: (ctx, [file = '', r = '', g = '', b = '']) => {
            const background: TBackground = { type: 'Color', color: { red: toChannel(r, 'r'), green: toChannel(g, 'g'), blue: toChannel(b, 'b') } }
            editFile(ctx, file, metadata => { metadata.background = background })
            ctx.out(`Set background to ${describeBackground(background)}`)
            return 0
        },
    },

    'set-bg-image': {
        usage: 'set-bg-image <file> <image>', help: 'Use an image file as the window background', arity: [2, 2],
        run: (ctx, [file = '', image = '']) => {
            const imagePath = path.resolve(image)
            if (!fs.statSync(imagePath, { throwIfNoEntry: false })?.isFile()) throw new CliError(`Image not found: ${image}`)
            const background: TBackground = { type: 'Picture', imagePath }
            editFile(ctx, file, metadata => { metadata.background = background })
            ctx.out(`Set background to ${describeBackground(background)}`)
            return 0
        },
    },

    'remove-bg': {
        usage: 'remove-bg <file>', help: 'Reset the window background to the default', arity: [1, 1],
        run: (ctx, [file = '']) => {
            editFile(ctx, file, metadata => { metadata.background = { type: 'Default' } })
            ctx.out('Removed background settings')
            return 0
        },
    },

    // Icon view ==============================================================

    ...setting('iconsize', {
        label: 'Icon size', subject: 'icon size in points (16-512)', argument: '<size>',
        read: metadata => metadata.iconView.iconSize,
        write: (metadata, size) => { metadata.iconView.iconSize = size },
        parse: text => toBounded(text, 'size', MIN_ICON_SIZE, C.ICON_SIZE_MAX),
        format: String,
    }),

    ...setting('gridspacing', {
        label: 'Grid spacing', subject: 'icon grid spacing in points', argument: '<spacing>',
        read: metadata => metadata.iconView.gridSpacing,
        write: (metadata, spacing) => { metadata.iconView.gridSpacing = spacing },
        parse: text => toPositive(text, 'spacing'),
        format: String,
    }),

    ...setting('textsize', {
        label: 'Text size', subject: 'icon label text size in points', argument: '<size>',
        read: metadata => metadata.iconView.textSize,
        write: (metadata, size) => { metadata.iconView.textSize = size },
        parse: text => toPositive(text, 'size'),
        format: String,
    }),

    ...setting<TLabelPosition>('labelpos', {
        label: 'Label position', subject: 'icon label position', argument: '<bottom|right>',
        read: metadata => metadata.iconView.labelPosition,
        write: (metadata, position) => { metadata.iconView.labelPosition = position },
        parse: toChoice({ bottom: 'Bottom', right: 'Right' }, 'position'),
        format: String,
    }),

    ...setting<TIconArrangement>('arrangement', {
        label: 'Arrangement', subject: 'icon arrangement', argument: '<none|grid>',
        read: metadata => metadata.iconView.arrangement,
        write: (metadata, arrangement) => { metadata.iconView.arrangement = arrangement },
        parse: toChoice({ none: 'None', grid: 'Grid' }, 'arrangement'),
        format: String,
    }),

    ...setting('sortby', {
        label: 'Sort by', subject: 'key icons are sorted by (name, kind, dateModified, ...)', argument: '<key>',
        read: metadata => metadata.sortBy,
        write: (metadata, key) => { metadata.sortBy = key },
        parse: text => {
            if (text.trim() === '') throw new CliError('key must not be empty')
            return text
        },
        format: String,
    }),

    ...setting('showinfo', flag('Show item info', 'item info display',
        metadata => metadata.iconView.showItemInfo,
        (metadata, show) => { metadata.iconView.showItemInfo = show })),

    ...setting('preview', flag('Show icon preview', 'icon preview display',
        metadata => metadata.iconView.showIconPreview,
        (metadata, show) => { metadata.iconView.showIconPreview = show })),

    // Window =================================================================

    ...setting('sidebar-width', {
        label: 'Sidebar width', subject: 'sidebar width in points', argument: '<width>',
        read: metadata => metadata.sidebarWidth,
        write: (metadata, width) => { metadata.sidebarWidth = width },
        parse: text => toBounded(text, 'width', 0, MAX_SIDEBAR_WIDTH),
        format: String,
    }),

    ...setting('toolbar', flag('Show toolbar', 'toolbar visibility',
        metadata => metadata.chrome.showToolbar,
        (metadata, show) => { metadata.chrome.showToolbar = show })),

    ...setting('sidebar', flag('Show sidebar', 'sidebar visibility',
        metadata => metadata.chrome.showSidebar,
        (metadata, show) => { metadata.chrome.showSidebar = show })),

    ...setting('pathbar', flag('Show path bar', 'path bar visibility',
        metadata => metadata.chrome.showPathBar,
        (metadata, show) => { metadata.chrome.showPathBar = show })),

    ...setting('statusbar', flag('Show status bar', 'status bar visibility',
        metadata => metadata.chrome.showStatusBar,
        (metadata, show) => { metadata.chrome.showStatusBar = show })),

    // List view ==============================================================

    ...setting('relative-dates', flag('Relative dates', 'use of relative dates in list view',
        metadata => metadata.listView.showRelativeDates,
        (metadata, show) => { metadata.listView.showRelativeDates = show })),

    'get-column-width': {
        usage: 'get-column-width <file> <column>', help: 'Print the width of a list view column', arity: [2, 2],
        run: (ctx, [file = '', column = '']) => {
            const width = decodeFile(ctx, file).listView.columnWidths[column]
            ctx.out(width === undefined ? `No width for column ${column}` : `Width of column ${column}: ${width}`)
            return 0
        },
    },

    'set-column-width': {
        usage: 'set-column-width <file> <column> <width>', help: 'Set the width of a list view column', arity: [3, 3],
        run: (ctx, [file = '', column = '', text = '']) => {
            const width = toBounded(text, 'width', 1, MAX_COLUMN_WIDTH)
            editFile(ctx, file, metadata => { metadata.listView.columnWidths[column] = width })
            ctx.out(`Set width of column ${column} to ${width}`)
            return 0
        },
    },

    'get-column-visible': {
        usage: 'get-column-visible <file> [column]', help: 'Print whether a list view column is shown, or list the shown columns', arity: [1, 2],
        run: (ctx, [file = '', column]) => {
            const view = decodeFile(ctx, file).listView
            if (column === undefined) {
                const columns = visibleColumns(view)
                ctx.out(columns.length === 0 ? 'No visible columns' : `Visible columns: ${columns.join(', ')}`)
                return 0
            }
            const visible = view.columnVisible[column]
            ctx.out(`Column ${column}: ${visible === undefined ? 'not set' : visible ? 'visible' : 'hidden'}`)
            return 0
        },
    },

    'set-column-visible': {
        usage: 'set-column-visible <file> <column> <yes|no>', help: 'Show or hide a list view column', arity: [3, 3],
        run: (ctx, [file = '', column = '', text = '']) => {
            const visible = toBoolean(text, 'value')
            editFile(ctx, file, metadata => { metadata.listView.columnVisible[column] = visible })
            ctx.out(`Set column ${column} to ${visible ? 'visible' : 'hidden'}`)
            return 0
        },
    },

}

function usage(): string {
    const width = Math.max(...Object.values(commands).map(command => command.usage.length))
    return [
        'Usage:',
        '  dsutil [-v|--verbose] [-c|--config <ini>] <command> [arguments]',
        '  dsutil [-v|--verbose] [-c|--config <ini>] <directory>',
        '',
        'Commands:',
        ...Object.values(commands).map(command => `  ${command.usage.padEnd(width)}  ${command.help}`),
        '',
        'Negative numbers must follow "--", as in: dsutil set-pos .DS_Store a.txt -- -10 20',
    ].join('\n')
}

// Exports =============================================================================================================

/** Runs `dsutil` with `argv` (without the node and script paths) and returns the exit code. */
export function main(argv: readonly string[] = process.argv.slice(2), io: TCliIO = defaultIO): number {

    let values: { verbose?: boolean, config?: string, help?: boolean }
    let positionals: string[]
    try {
        ({ values, positionals } = parseArgs({
            args: [...argv],
            options: {
                verbose: { type: 'boolean', short: 'v' },
                config:  { type: 'string',  short: 'c' },
                help:    { type: 'boolean', short: 'h' },
            },
            allowPositionals: true,
        }))
    }
    catch (error) {
        io.stderr.write(`ERROR: ${(error as Error).message}\n`)
        return 1
    }

    const [name, ...args] = positionals
    if (values.help || !name) {
        (values.help ? io.stdout : io.stderr).write(usage() + '\n')
        return values.help ? 0 : 1
    }

    let config = Config.defaults()
    if (values.config) {
        const [error, loaded] = Config.load(values.config)
        if (error) {
            io.stderr.write(`ERROR: ${error.message}${error.rootCause && error.code === 'CF_LOAD' ? ` - ${error.rootCause.message}` : ''}\n`)
            return 1
        }
        config = loaded
    }

    const sink: TLogSink = {
        debug: line => io.stderr.write(line + '\n'),
        info:  line => io.stderr.write(line + '\n'),
        warn:  line => io.stderr.write(line + '\n'),
        error: line => io.stderr.write(line + '\n'),
    }

    const ctx: TContext = {
        config: config.withLogging(values.verbose ? 'debug' : config.logLevel, sink),
        out: (line = '') => io.stdout.write(line + '\n'),
    }

    let command = commands[name]
    let commandArgs = args
    if (!command && args.length === 0 && fs.statSync(name, { throwIfNoEntry: false })?.isDirectory()) {
        command = commands.summary
        commandArgs = [name]
    }

    if (!command) {
        io.stderr.write(`ERROR: Unknown command "${name}"\n\n${usage()}\n`)
        return 1
    }

    const [min, max] = command.arity
    if (commandArgs.length < min || commandArgs.length > max) {
        io.stderr.write(`ERROR: Usage: dsutil ${command.usage}\n`)
        return 1
    }

    try {
        return command.run(ctx, commandArgs)
    }
    catch (error) {
        io.stderr.write(`ERROR: ${(error as Error).message}\n`)
        return 1
    }

}
