// Imports =============================================================================================================

import path from 'node:path'

import Config from '../Config.js'
import Log from '../misc/log.js'
import * as C from '../Constants.js'
import Plist, { type TPlistDict } from '../L0/Plist.js'
import EntryCodec, { type TRecordValue } from '../L0/EntryCodec.js'
import type { TRecordSource } from '../L1/BTreeStore.js'
import resolveAlias from './AliasResolver.js'
import { parseRectString } from './Coordinates.js'
import { Code, viewStyleFromCode } from './Codes.js'
import { asBoolean, asBuffer, asDict, asNumber, asString } from './values.js'
import {
    emptyMetadata,
    type TBackground,
    type TColor,
    type TDirectoryMetadata,
    type TIconInfo,
    type TIconViewSettings,
    type TListViewSettings,
} from './DirectoryMetadata.js'

// Types ===============================================================================================================

export interface TDecoderOptions {
    /** Directory the records belong to                  */ directory:  string
    /** Configuration (alias folders, logging)           */ config?:    Config
}

// Exports =============================================================================================================

const U16_MAX = 0xFFFF

const isIconSize = (size: number | undefined): size is number =>
    size !== undefined && size >= C.ICON_SIZE_MIN && size <= C.ICON_SIZE_MAX

const arrangementOf = (value: string | undefined) =>
    value === 'none' || value === '0' ? 'None' as const : value === 'grid' ? 'Grid' as const : undefined

/**
 * Turns the records of one directory into its `TDirectoryMetadata`.
 *
 * Several fields can be recorded both in a modern plist-based form and in one
 * or more legacy binary forms. The modern form always wins; a legacy form is only
 * consulted for what the modern one leaves unset. The legacy background record
 * (`BKGD`) is the exception and overrides the icon view plist when present.
 */
export default class SemanticDecoder {

    private readonly source: TRecordSource
    private readonly directory: string
    private readonly config: Config
    private readonly log: Log

    constructor(source: TRecordSource, options: TDecoderOptions) {
        this.source = source
        this.directory = options.directory
        this.config = options.config ?? Config.defaults()
        this.log = this.config.logger('decoder')
    }

    /** Decodes the directory-level settings and every per-file entry. */
    public decode(): TDirectoryMetadata {

        const metadata = this.decodeDirectory()

        for (const filename of this.source.allFilenames()) {
            if (filename === C.DIRECTORY_FILENAME) continue
            const icon = this.decodeIcon(filename)
            if (icon) metadata.icons.set(filename, icon)
        }

        return metadata

    }

    /** Decodes the records stored under "." (no per-file entries). */
    public decodeDirectory(): TDirectoryMetadata {

        const metadata = emptyMetadata(this.directory)
        metadata.loaded = true

        this.decodeWindow(metadata)
        this.decodeViewStyle(metadata)
        this.decodeIconView(metadata)
        this.decodeBackground(metadata)
        this.decodeListView(metadata.listView)

        return metadata

    }

    /** Decodes the per-file entry of `filename`, if it records any of the modelled fields. */
    public decodeIcon(filename: string): TIconInfo | undefined {

        const info: TIconInfo = { filename }

        const location = this.blob(Code.IconLocation, filename)
        if (location && location.length >= 8) {
            info.position = { x: location.readInt32BE(0), y: location.readInt32BE(4) }
        }

        const comments = this.value(Code.Comments, filename)
        if (comments?.type === 'ustr') info.comments = comments.value

        const label = this.integer(Code.LabelColor, filename)
        if (label !== undefined && label >= 0 && label <= C.LABEL_COLOR_MAX) info.labelColor = label

        const logicalSize = this.size(Code.LogicalSize, filename) ?? this.size(Code.LogicalSizeLegacy, filename)
        if (logicalSize !== undefined) info.logicalSize = logicalSize

        const physicalSize = this.size(Code.PhysicalSize, filename) ?? this.size(Code.PhysicalSizeLegacy, filename)
        if (physicalSize !== undefined) info.physicalSize = physicalSize

        const modified = this.date(Code.ModificationDate, filename) ?? this.date(Code.ModificationDateLegacy, filename)
        if (modified) info.modificationDate = modified

        return Object.keys(info).length > 1 ? info : undefined

    }

    // Window =================================================================

    private decodeWindow(metadata: TDirectoryMetadata) {

        const settings = this.plist(Code.WindowSettings)
        if (settings) {

            const bounds = parseRectString(asString(settings.WindowBounds) ?? '')
            if (bounds && bounds.width > 0 && bounds.height > 0) metadata.windowFrame = bounds

            const sidebar = asNumber(settings.SidebarWidth)
            if (sidebar !== undefined) metadata.sidebarWidth = sidebar

            metadata.chrome = {
                showSidebar:    asBoolean(settings.ShowSidebar),
                showToolbar:    asBoolean(settings.ShowToolbar),
                showStatusBar:  asBoolean(settings.ShowStatusBar),
                showPathBar:    asBoolean(settings.ShowPathbar),
            }

        }

        if (!metadata.windowFrame) {
            const info = this.blob(Code.WindowInfo)
            if (info && info.length >= 16) {
                const top    = info.readInt16BE(0)
                const left   = info.readInt16BE(2)
                const bottom = info.readInt16BE(4)
                const right  = info.readInt16BE(6)
                metadata.windowFrame = { x: left, y: top, width: right - left, height: bottom - top }
                this.log.debug('Window frame taken from the legacy window record.', { top, left, bottom, right })
            }
        }

        if (metadata.sidebarWidth === undefined) {
            metadata.sidebarWidth = this.integer(Code.SidebarWidth)
        }

    }

    private decodeViewStyle(metadata: TDirectoryMetadata) {

        const sortBy = this.value(Code.SortBy)
        if (sortBy?.type === 'ustr') metadata.sortBy = sortBy.value

        const style = this.value(Code.ViewStyle)
        if (style?.type !== 'type') return
        metadata.viewStyle = viewStyleFromCode(style.value)
        if (!metadata.viewStyle) this.log.debug('Unknown view style.', { code: style.value })

    }

    // Icon view ==============================================================

    private decodeIconView(metadata: TDirectoryMetadata) {

        const view = metadata.iconView
        const settings = this.plist(Code.IconViewSettings)

        if (settings) {

            const size = asNumber(settings.iconSize)
            if (isIconSize(size)) view.iconSize = size

            view.arrangement     = arrangementOf(asString(settings.arrangeBy))
            view.gridSpacing     = asNumber(settings.gridSpacing)
            view.textSize        = asNumber(settings.textSize)
            view.showItemInfo    = asBoolean(settings.showItemInfo)
            view.showIconPreview = asBoolean(settings.showIconPreview)

            const labelOnBottom = asBoolean(settings.labelOnBottom)
            if (labelOnBottom !== undefined) view.labelPosition = labelOnBottom ? 'Bottom' : 'Right'

            metadata.background = this.iconViewBackground(settings)

        }

        if (view.iconSize === undefined || !view.arrangement || !view.labelPosition) this.decodeLegacyIconView(view)

        for (const code of [Code.IconGridOffset, Code.IconScrollPosition]) {
            const diagnostic = this.blob(code)
            if (diagnostic) this.log.debug('Icon view diagnostic record.', { code, hex: diagnostic.toString('hex') })
        }

    }

    /**
     * Fills what the icon view plist left unset from the legacy record, which
     * comes in two layouts told apart by their leading magic.
     *
        Magic | Size at | Arrangement at | Label position at
        ------|---------|----------------|------------------
        icvo  | 12 (2B) | 14 (4B)        | -
        icv4  | 4 (2B)  | 6 (4B)         | 10 (4B) "botm" / "rght"
     */
    private decodeLegacyIconView(view: TIconViewSettings) {

        const options = this.blob(Code.IconViewOptions)
        if (!options || options.length < 4) return

        const magic = options.toString('latin1', 0, 4)
        let size: number | undefined
        let arrangement: string | undefined
        let label: string | undefined

        if (magic === 'icvo' && options.length >= 18) {
            size = options.readUInt16BE(12)
            arrangement = options.toString('latin1', 14, 18)
        }
        else if (magic === 'icv4' && options.length >= 14) {
            size = options.readUInt16BE(4)
            arrangement = options.toString('latin1', 6, 10)
            label = options.toString('latin1', 10, 14)
        }
        else {
            this.log.debug('Unrecognized legacy icon view record.', { magic, length: options.length })
            return
        }

        if (view.iconSize === undefined && isIconSize(size)) view.iconSize = size
        if (!view.arrangement) view.arrangement = arrangementOf(arrangement)
        if (!view.labelPosition && label === 'botm') view.labelPosition = 'Bottom'
        if (!view.labelPosition && label === 'rght') view.labelPosition = 'Right'

    }

    // Background =============================================================

    private iconViewBackground(settings: TPlistDict): TBackground {

        const red = asNumber(settings.backgroundColorRed)
        const green = asNumber(settings.backgroundColorGreen)
        const blue = asNumber(settings.backgroundColorBlue)
        const color: TColor | undefined = red !== undefined && green !== undefined && blue !== undefined
            ? { red, green, blue }
            : undefined

        const fallback: TBackground = color ? { type: 'Color', color } : { type: 'Default' }

        switch (asNumber(settings.backgroundType)) {
            case 1:
                return fallback
            case 2: {
                const alias = asBuffer(settings.backgroundImageAlias)
                const imagePath = alias ? this.resolveAlias(alias) : undefined
                if (imagePath) return { type: 'Picture', imagePath, color }
                this.log.warn('Background image alias could not be resolved.', { directory: this.directory, code: 'L2_AL_UNRESOLVED' })
                return fallback
            }
            default:
                return color ? { type: 'Default', color } : { type: 'Default' }
        }

    }

    /**
     * Applies the legacy background record, which overrides the icon view plist.
     *
        Offset | Size | Description
        -------|------|------------------------------------------
        0      | 4B   | "DefB", "ClrB" or "PctB"
        4      | 2B   | Red   (ClrB only, 0-65535)
        6      | 2B   | Green (ClrB only, 0-65535)
        8      | 2B   | Blue  (ClrB only, 0-65535)
     */
    private decodeBackground(metadata: TDirectoryMetadata) {

        const background = this.blob(Code.Background)
        if (!background || background.length < 4) return

        const kind = background.toString('latin1', 0, 4)

        if (kind === 'DefB') {
            metadata.background = { type: 'Default' }
        }
        else if (kind === 'ClrB' && background.length >= 10) {
            metadata.background = {
                type: 'Color',
                color: {
                    red:   background.readUInt16BE(4) / U16_MAX,
                    green: background.readUInt16BE(6) / U16_MAX,
                    blue:  background.readUInt16BE(8) / U16_MAX,
                },
            }
        }
        else if (kind === 'PctB') {
            const imagePath = this.backgroundPicture()
            if (imagePath) metadata.background = { type: 'Picture', imagePath }
            else {
                this.log.warn('Legacy background picture could not be resolved.', { directory: this.directory, code: 'L2_AL_UNRESOLVED' })
                metadata.background = { type: 'Default' }
            }
        }
        else {
            this.log.debug('Unrecognized legacy background record.', { kind, length: background.length })
        }

    }

    /** The picture of a legacy background: a path string or an alias record. */
    private backgroundPicture(): string | undefined {
        const picture = this.value(Code.BackgroundPicture)
        if (picture?.type === 'ustr') return path.resolve(this.directory, picture.value)
        if (picture?.type === 'blob') return this.resolveAlias(picture.value)
        return undefined
    }

    private resolveAlias(alias: Buffer) {
        return resolveAlias(alias, this.directory, {
            folders: this.config.backgroundFolders,
            extensions: this.config.imageExtensions,
            log: this.log,
        })
    }

    // List view ==============================================================

    private decodeListView(view: TListViewSettings) {

        const settings = this.plist(Code.ListViewSettings) ?? this.plist(Code.ListViewSettingsAlt)

        if (!settings) {
            if (this.blob(Code.ListViewOptions)) this.log.debug('Legacy list view record present, not decoded.')
            return
        }

        view.textSize   = asNumber(settings.textSize)
        view.iconSize   = asNumber(settings.iconSize)
        view.sortColumn = asString(settings.sortColumn)

        const relativeDates = asBoolean(settings.useRelativeDates)
        if (relativeDates !== undefined) view.showRelativeDates = relativeDates

        const apply = (identifier: string, column: TPlistDict) => {
            const width = asNumber(column.width)
            const visible = asBoolean(column.visible)
            const ascending = asBoolean(column.ascending)
            if (width !== undefined) view.columnWidths[identifier] = width
            if (visible !== undefined) view.columnVisible[identifier] = visible
            if (identifier === view.sortColumn && ascending !== undefined) view.sortAscending = ascending
        }

        const columns = settings.columns
        if (Array.isArray(columns)) {
            for (const item of columns) {
                const column = asDict(item)
                const identifier = asString(column?.identifier)
                if (column && identifier) apply(identifier, column)
            }
        }
        else {
            for (const [identifier, item] of Object.entries(asDict(columns) ?? {})) {
                const column = asDict(item)
                if (column) apply(identifier, column)
            }
        }

    }

    // Records ================================================================

    private value(code: string, filename = C.DIRECTORY_FILENAME): TRecordValue | undefined {
        return this.source.entry(filename, code)?.value
    }

    private blob(code: string, filename = C.DIRECTORY_FILENAME): Buffer | undefined {
        const value = this.value(code, filename)
        return value?.type === 'blob' ? value.value : undefined
    }

    private integer(code: string, filename = C.DIRECTORY_FILENAME): number | undefined {
        const value = this.value(code, filename)
        return value?.type === 'long' || value?.type === 'shor' ? value.value : undefined
    }

    /** File sizes are stored as `long` by older writers and as `comp` by newer ones. */
    private size(code: string, filename: string): number | undefined {
        const value = this.value(code, filename)
        const size = value?.type === 'comp' ? Number(value.value) : this.integer(code, filename)
        return size !== undefined && size >= 0 ? size : undefined
    }

    private date(code: string, filename: string): Date | undefined {
        const value = this.value(code, filename)
        if (value?.type !== 'dutc') return undefined
        const date = EntryCodec.dutcToDate(value.value)
        return Number.isNaN(date.getTime()) ? undefined : date
    }

    private plist(code: string): TPlistDict | undefined {

        const data = this.blob(code)
        if (!data) return undefined

        const [error, value] = Plist.parse(data)
        if (error) {
            this.log.debug('Ignoring undecodable property list.', { code, reason: error.rootCause?.message ?? error.message })
            return undefined
        }

        const dict = asDict(value)
        if (!dict) this.log.debug('Property list is not a dictionary.', { code })
        return dict

    }

}
