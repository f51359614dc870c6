// Imports =============================================================================================================

import path from 'node:path'

import type * as T from '../../types.js'
import DSMetaError from '../errors/DSMetaError.js'
import Config from '../Config.js'
import Log from '../misc/log.js'
import isEqual from '../misc/equal.js'
import * as C from '../Constants.js'
import Plist, { PlistReal, type TPlistDict, type TPlistValue } from '../L0/Plist.js'
import EntryCodec, { type TRecord, type TRecordKey } from '../L0/EntryCodec.js'
import BTreeStore, { type TChangeSet, type TRecordSource } from '../L1/BTreeStore.js'
import SemanticDecoder from './SemanticDecoder.js'
import { formatRectString } from './Coordinates.js'
import { Code, viewStyleToCode } from './Codes.js'
import { asBuffer, asDict, asString } from './values.js'
import type { TDirectoryMetadata, TIconInfo, TPoint } from './DirectoryMetadata.js'

// Types ===============================================================================================================

export interface TEncoderOptions {
    /** Configuration (logging)                          */ config?:    Config
}

type TSaveCode = 'L2_SV_READ' | 'L2_SV_ENCODE' | 'L2_SV_WRITE'

// Exports =============================================================================================================

const ILOC_TRAILER = Buffer.from([0xFF, 0xFF, 0xFF, 0xFF, 0xFF, 0xFF, 0x00, 0x00])
const COLOR_KEYS = ['backgroundColorRed', 'backgroundColorGreen', 'backgroundColorBlue'] as const

/**
 * Produces the records that turn one `TDirectoryMetadata` into another.
 *
 * Only fields that differ between the two models are written, and only in the
 * modern formats. Property list records are edited in place so that keys this
 * library does not model survive. Legacy records are left alone, except for the
 * legacy background record, which is removed when the background changes since
 * it would otherwise take precedence over the new value.
 */
export default class SemanticEncoder {

    private readonly source: TRecordSource
    private readonly log: Log

    private set: TRecord[] = []
    private remove: TRecordKey[] = []

    /** @param source Records currently on disk, used to merge property lists and detect stale records. */
    constructor(source: TRecordSource, options: TEncoderOptions = {}) {
        this.source = source
        this.log = (options.config ?? Config.defaults()).logger('encoder')
    }

    /**
     * Persists `metadata` into the metadata file of `directory`.
     * The file is re-read first; only fields that differ from it are written back.
     * Nothing is written when nothing changed.
     */
    public static save(metadata: TDirectoryMetadata, directory = metadata.directory, config = Config.defaults()): T.XEavS<TSaveCode> {
        return this.saveFile(metadata, path.join(directory, config.storeFilename), config)
    }

    /** Like `save`, for a metadata file at an explicit location. */
    public static saveFile(metadata: TDirectoryMetadata, file: string, config = Config.defaults()): T.XEavS<TSaveCode> {

        const log = config.logger('encoder')
        const directory = path.dirname(file)

        let store: BTreeStore
        const [openError, opened] = BTreeStore.open(file, config)
        if (!openError) store = opened
        else if (openError.code === 'L1_ST_READ') return new DSMetaError('L2_SV_READ', null, openError, { directory })
        else {
            if (openError.code === 'L1_ST_CORRUPT') log.warn('Replacing corrupt metadata file.', { file, reason: openError.rootCause?.message })
            store = BTreeStore.create(file, config)
        }

        const baseline = new SemanticDecoder(store, { directory, config }).decode()
        const [encodeError, changes] = new SemanticEncoder(store, { config }).encode(baseline, metadata)
        if (encodeError) return encodeError

        if (changes.set.length === 0 && changes.remove.length === 0) {
            log.debug('No changes to save.', { directory })
            return
        }

        store.apply(changes)
        const writeError = store.write()
        if (writeError) return new DSMetaError('L2_SV_WRITE', null, writeError, { directory })

        log.debug('Saved directory metadata.', { directory, set: changes.set.length, removed: changes.remove.length })

    }

    /** Computes the records that turn `baseline` (decoded from the source) into `next`. */
    public encode(baseline: TDirectoryMetadata, next: TDirectoryMetadata): T.XEav<TChangeSet, 'L2_SV_ENCODE'> {

        this.set = []
        this.remove = []

        try {

            this.encodeWindow(baseline, next)
            this.encodeViewStyle(baseline, next)
            this.encodeSortBy(baseline, next)
            this.encodeIconView(baseline, next)
            this.encodeListView(baseline, next)

            for (const filename of new Set([...baseline.icons.keys(), ...next.icons.keys()])) {
                this.encodeIcon(filename, baseline.icons.get(filename), next.icons.get(filename))
            }

            return [null, { set: this.set, remove: this.remove }]

        }
        catch (error) {
            return DSMetaError.eav('L2_SV_ENCODE', null, error as Error, { directory: next.directory })
        }

    }

    // Directory ==============================================================

    private encodeWindow(baseline: TDirectoryMetadata, next: TDirectoryMetadata) {

        const frameChanged = !isEqual(baseline.windowFrame, next.windowFrame)
        const sidebarChanged = baseline.sidebarWidth !== next.sidebarWidth
        const chromeChanged = !isEqual(baseline.chrome, next.chrome)
        if (!frameChanged && !sidebarChanged && !chromeChanged) return

        const settings = this.plist(Code.WindowSettings) ?? {}

        if (frameChanged) assign(settings, 'WindowBounds', next.windowFrame && formatRectString(next.windowFrame))
        if (sidebarChanged) assign(settings, 'SidebarWidth', next.sidebarWidth)
        if (chromeChanged) {
            assign(settings, 'ShowSidebar', next.chrome.showSidebar)
            assign(settings, 'ShowToolbar', next.chrome.showToolbar)
            assign(settings, 'ShowStatusBar', next.chrome.showStatusBar)
            assign(settings, 'ShowPathbar', next.chrome.showPathBar)
        }

        this.putPlist(Code.WindowSettings, settings)

    }

    private encodeViewStyle(baseline: TDirectoryMetadata, next: TDirectoryMetadata) {
        if (baseline.viewStyle === next.viewStyle) return
        if (next.viewStyle) this.put({ filename: C.DIRECTORY_FILENAME, code: Code.ViewStyle, value: { type: 'type', value: viewStyleToCode(next.viewStyle) } })
        else this.drop(C.DIRECTORY_FILENAME, Code.ViewStyle)
    }

    private encodeSortBy(baseline: TDirectoryMetadata, next: TDirectoryMetadata) {
        if (baseline.sortBy === next.sortBy) return
        if (next.sortBy !== undefined) this.put({ filename: C.DIRECTORY_FILENAME, code: Code.SortBy, value: { type: 'ustr', value: next.sortBy } })
        else this.drop(C.DIRECTORY_FILENAME, Code.SortBy)
    }

    private encodeIconView(baseline: TDirectoryMetadata, next: TDirectoryMetadata) {

        const before = baseline.iconView
        const after = next.iconView
        const backgroundChanged = !isEqual(baseline.background, next.background)
        if (isEqual(before, after) && !backgroundChanged) return

        const settings = this.plist(Code.IconViewSettings) ?? {}

        if (before.iconSize !== after.iconSize) {
            const size = this.iconSize(after.iconSize)
            if (size !== null) assign(settings, 'iconSize', real(size))
        }
        if (before.arrangement !== after.arrangement)
            assign(settings, 'arrangeBy', after.arrangement?.toLowerCase())
        if (before.labelPosition !== after.labelPosition)
            assign(settings, 'labelOnBottom', after.labelPosition === undefined ? undefined : after.labelPosition === 'Bottom')
        if (before.gridSpacing !== after.gridSpacing)
            assign(settings, 'gridSpacing', real(after.gridSpacing))
        if (before.textSize !== after.textSize)
            assign(settings, 'textSize', real(after.textSize))
        if (before.showItemInfo !== after.showItemInfo)
            assign(settings, 'showItemInfo', after.showItemInfo)
        if (before.showIconPreview !== after.showIconPreview)
            assign(settings, 'showIconPreview', after.showIconPreview)

        if (backgroundChanged) {

            const background = next.background
            settings.backgroundType = { Default: 0, Color: 1, Picture: 2 }[background.type]

            if (background.color) {
                settings.backgroundColorRed   = new PlistReal(background.color.red)
                settings.backgroundColorGreen = new PlistReal(background.color.green)
                settings.backgroundColorBlue  = new PlistReal(background.color.blue)
            }

            if (background.type === 'Default') {
                if (!background.color) for (const key of COLOR_KEYS) delete settings[key]
                if (!background.imagePath) delete settings.backgroundImageAlias
            }

            const legacy = this.source.entry(C.DIRECTORY_FILENAME, Code.Background) !== undefined
            const stale = legacy
                || background.imagePath !== baseline.background.imagePath
                || asBuffer(settings.backgroundImageAlias) === undefined

            if (background.imagePath && stale) {
                settings.backgroundImageAlias = aliasFor(path.resolve(next.directory, background.imagePath))
            }

            if (legacy) {
                this.log.debug('Dropping legacy background record superseded by the icon view settings.')
                this.drop(C.DIRECTORY_FILENAME, Code.Background)
            }

        }

        this.putPlist(Code.IconViewSettings, settings)

    }

    /** Sizes outside the range viewers accept are clamped into it. `null` leaves the stored size alone. */
    private iconSize(size: number | undefined): number | undefined | null {
        if (size === undefined || (size >= C.ICON_SIZE_MIN && size <= C.ICON_SIZE_MAX)) return size
        if (Number.isNaN(size)) {
            this.log.warn('Icon size is not a number and was not written.')
            return null
        }
        const clamped = Math.min(Math.max(size, C.ICON_SIZE_MIN), C.ICON_SIZE_MAX)
        this.log.warn('Icon size out of range, clamped.', { iconSize: size, clamped })
        return clamped
    }

    private encodeListView(baseline: TDirectoryMetadata, next: TDirectoryMetadata) {

        const before = baseline.listView
        const after = next.listView
        if (isEqual(before, after)) return

        const settings = this.plist(Code.ListViewSettings) ?? this.plist(Code.ListViewSettingsAlt) ?? {}

        if (before.textSize !== after.textSize) assign(settings, 'textSize', keepKind(settings.textSize, after.textSize))
        if (before.iconSize !== after.iconSize) assign(settings, 'iconSize', keepKind(settings.iconSize, after.iconSize))
        if (before.sortColumn !== after.sortColumn) assign(settings, 'sortColumn', after.sortColumn)
        if (before.showRelativeDates !== after.showRelativeDates) assign(settings, 'useRelativeDates', after.showRelativeDates)

        const names = new Set([
            ...Object.keys(before.columnWidths), ...Object.keys(after.columnWidths),
            ...Object.keys(before.columnVisible), ...Object.keys(after.columnVisible),
        ])
        if (after.sortColumn && after.sortAscending !== undefined) names.add(after.sortColumn)

        const columns = settings.columns
        const list = Array.isArray(columns) ? columns : undefined
        const dict = asDict(columns) ?? {}

        for (const name of names) {

            const sortChanged = name === after.sortColumn && (before.sortAscending !== after.sortAscending || before.sortColumn !== after.sortColumn)
            const widthChanged = before.columnWidths[name] !== after.columnWidths[name]
            const visibleChanged = before.columnVisible[name] !== after.columnVisible[name]
            if (!sortChanged && !widthChanged && !visibleChanged) continue

            let column = list
                ? list.map(item => asDict(item)).find(item => asString(item?.identifier) === name)
                : asDict(dict[name])

            if (!column) {
                column = list ? { identifier: name } : {}
                if (list) list.push(column)
                else dict[name] = column
            }

            if (widthChanged) assign(column, 'width', after.columnWidths[name])
            if (visibleChanged) assign(column, 'visible', after.columnVisible[name])
            if (sortChanged) assign(column, 'ascending', after.sortAscending)

        }

        if (names.size > 0 && !list) settings.columns = dict

        this.putPlist(Code.ListViewSettings, settings)

    }

    // Files ==================================================================

    private encodeIcon(filename: string, before: TIconInfo | undefined, after: TIconInfo | undefined) {

        if (!isEqual(before?.position, after?.position)) {
            if (after?.position) this.put({ filename, code: Code.IconLocation, value: { type: 'blob', value: this.iconLocation(filename, after.position) } })
            else this.drop(filename, Code.IconLocation)
        }

        if (before?.comments !== after?.comments) {
            if (after?.comments !== undefined) this.put({ filename, code: Code.Comments, value: { type: 'ustr', value: after.comments } })
            else this.drop(filename, Code.Comments)
        }

        if (before?.labelColor !== after?.labelColor) {
            const label = after?.labelColor
            if (label === undefined) this.drop(filename, Code.LabelColor)
            else if (Number.isInteger(label) && label >= 0 && label <= C.LABEL_COLOR_MAX) this.put({ filename, code: Code.LabelColor, value: { type: 'long', value: label } })
            else this.log.warn('Label color out of range, not written.', { filename, labelColor: label })
        }

        if (before?.logicalSize !== after?.logicalSize) this.putSize(filename, Code.LogicalSize, after?.logicalSize)
        if (before?.physicalSize !== after?.physicalSize) this.putSize(filename, Code.PhysicalSize, after?.physicalSize)

        if (!isEqual(before?.modificationDate, after?.modificationDate)) {
            const date = after?.modificationDate
            if (!date) this.drop(filename, Code.ModificationDate)
            else if (Number.isNaN(date.getTime())) this.log.warn('Invalid modification date, not written.', { filename })
            else this.put({ filename, code: Code.ModificationDate, value: { type: 'dutc', value: EntryCodec.dateToDutc(date) } })
        }

    }

    private putSize(filename: string, code: string, size: number | undefined) {
        if (size === undefined) return this.drop(filename, code)
        if (!Number.isSafeInteger(size) || size < 0) return this.log.warn('File size is not a whole number of bytes, not written.', { filename, code, size })
        this.put({ filename, code, value: { type: 'comp', value: BigInt(size) } })
    }

    /**
     * Icon location record: x and y (Int32) followed by 8 bytes of which only the
     * first 8 are understood. The tail of an existing record is kept as it was.
     * Coordinates are rounded to whole points.
     */
    private iconLocation(filename: string, position: TPoint): Buffer {
        const existing = this.source.entry(filename, Code.IconLocation)?.value
        const location = existing?.type === 'blob' && existing.value.length >= 16
            ? Buffer.from(existing.value)
            : Buffer.concat([Buffer.alloc(8), ILOC_TRAILER])
        location.writeInt32BE(Math.round(position.x), 0)
        location.writeInt32BE(Math.round(position.y), 4)
        return location
    }

    // Records ================================================================

    private put(record: TRecord) {
        this.set.push(record)
    }

    private drop(filename: string, code: string) {
        if (this.source.entry(filename, code)) this.remove.push({ filename, code })
    }

    private plist(code: string): TPlistDict | undefined {
        const existing = this.source.entry(C.DIRECTORY_FILENAME, code)?.value
        if (existing?.type !== 'blob') return undefined
        const [error, value] = Plist.parse(existing.value)
        if (error) {
            this.log.debug('Existing property list is unreadable and will be replaced.', { code })
            return undefined
        }
        return asDict(value)
    }

    private putPlist(code: string, settings: TPlistDict) {
        if (Object.keys(settings).length === 0) return this.drop(C.DIRECTORY_FILENAME, code)
        const [error, data] = Plist.serialize(settings)
        if (error) throw error
        this.put({ filename: C.DIRECTORY_FILENAME, code, value: { type: 'blob', value: data } })
    }

}

/** Sets `key`, or deletes it when `value` is undefined. */
function assign(dict: TPlistDict, key: string, value: TPlistValue | undefined) {
    if (value === undefined) delete dict[key]
    else dict[key] = value
}

function real(value: number | undefined) {
    return value === undefined ? undefined : new PlistReal(value)
}

/** Writes a number as a real if the value it replaces was one. */
function keepKind(previous: TPlistValue | undefined, value: number | undefined) {
    if (value === undefined) return undefined
    return previous instanceof PlistReal ? new PlistReal(value) : value
}

/**
 * Minimal alias record for a new background image: the absolute path, padded
 * with zeros so the record is as long as a real alias. Readers that decode
 * aliases fully will not resolve it; path-scanning readers will.
 */
function aliasFor(imagePath: string): Buffer {
    const data = Buffer.from(imagePath, 'utf-8')
    return Buffer.concat([data, Buffer.alloc(Math.max(C.ALIAS_MIN_LENGTH - data.length, 1))])
}
