// Imports =============================================================================================================

import path from 'node:path'

import type * as T from '../../types.js'
import Config from '../Config.js'
import Log from '../misc/log.js'
import { toGridString } from '../misc/toGridString.js'
import BTreeStore from '../L1/BTreeStore.js'
import SemanticDecoder from './SemanticDecoder.js'
import SemanticEncoder from './SemanticEncoder.js'
import { emptyMetadata, type TDirectoryMetadata } from './DirectoryMetadata.js'

// Exports =============================================================================================================

/**
 * Entry point for viewers and the file watcher.
 * Every `load` builds a new model; models are never updated in place.
 */
export default class MetadataLoader {

    private readonly config: Config
    private readonly log: Log

    constructor(config = Config.defaults()) {
        this.config = config
        this.log = config.logger('loader')
    }

    /**
     * Reads the metadata of `directory`.
     * Always returns a model: a missing, unreadable or corrupt file yields the
     * defaults with `loaded` set to false.
     */
    public load(directory: string): TDirectoryMetadata {

        const file = path.join(directory, this.config.storeFilename)
        const [error, store] = BTreeStore.open(file, this.config)

        if (error) {
            if (error.code === 'L1_ST_NOT_FOUND') this.log.debug('No metadata file.', { directory })
            else this.log.warn('Ignoring unusable metadata file.', { file, code: error.code, reason: error.rootCause?.message })
            return emptyMetadata(directory)
        }

        return new SemanticDecoder(store, { directory, config: this.config }).decode()

    }

    /** Called when the metadata file of `directory` changed on disk. */
    public reload = (directory: string): TDirectoryMetadata => {
        this.log.debug('Reloading.', { directory })
        return this.load(directory)
    }

    /** Persists the fields of `metadata` that differ from what is on disk. */
    public save(metadata: TDirectoryMetadata, directory = metadata.directory): T.XEavS<'L2_SV_READ' | 'L2_SV_ENCODE' | 'L2_SV_WRITE'> {
        return SemanticEncoder.save(metadata, directory, this.config)
    }

}

const LABEL_COLORS = ['none', 'red', 'orange', 'yellow', 'green', 'blue', 'purple', 'grey'] as const

/** Display name of a label color index. */
export function labelColorName(index: number): string {
    return LABEL_COLORS[index] ?? String(index)
}

/** Label color index of a display name ("gray" is accepted too). */
export function labelColorIndex(name: string): number | undefined {
    const normalized = name.toLowerCase() === 'gray' ? 'grey' : name.toLowerCase()
    const index = LABEL_COLORS.findIndex(color => color === normalized)
    return index === -1 ? undefined : index
}

const num = (value: number) => Number.isInteger(value) ? String(value) : value.toFixed(2)
const yesNo = (value: boolean) => value ? 'yes' : 'no'

/**
 * Human readable summary of a model: one `Label: value` line per recorded
 * field, followed by a table of the per-file entries.
 */
export function describeMetadata(metadata: TDirectoryMetadata): string {

    const fields: [string, string][] = [
        ['Directory', metadata.directory],
        ['Loaded', yesNo(metadata.loaded)],
    ]

    if (metadata.viewStyle) fields.push(['View style', metadata.viewStyle])

    const frame = metadata.windowFrame
    if (frame) fields.push(['Window', `x=${num(frame.x)} y=${num(frame.y)} width=${num(frame.width)} height=${num(frame.height)}`])
    if (metadata.sidebarWidth !== undefined) fields.push(['Sidebar width', num(metadata.sidebarWidth)])

    const chrome = Object.entries(metadata.chrome)
        .flatMap(([key, value]) => value === undefined ? [] : [`${key}=${yesNo(value)}`])
    if (chrome.length > 0) fields.push(['Chrome', chrome.join(' ')])

    const icon = metadata.iconView
    const iconView = [
        icon.iconSize !== undefined && `size=${num(icon.iconSize)}`,
        icon.arrangement && `arrangement=${icon.arrangement}`,
        icon.labelPosition && `labels=${icon.labelPosition}`,
        icon.gridSpacing !== undefined && `spacing=${num(icon.gridSpacing)}`,
        icon.textSize !== undefined && `text=${num(icon.textSize)}`,
    ].filter(part => typeof part === 'string')
    if (iconView.length > 0) fields.push(['Icon view', iconView.join(' ')])

    const background = metadata.background
    if (background.type === 'Picture') fields.push(['Background', `Picture ${background.imagePath ?? ''}`.trimEnd()])
    else if (background.type === 'Color' && background.color) {
        const { red, green, blue } = background.color
        fields.push(['Background', `Color (${red.toFixed(2)}, ${green.toFixed(2)}, ${blue.toFixed(2)})`])
    }
    else fields.push(['Background', 'Default'])

    const list = metadata.listView
    if (list.sortColumn) {
        const direction = list.sortAscending === undefined ? '' : list.sortAscending ? ' ascending' : ' descending'
        fields.push(['Sort', `${list.sortColumn}${direction}`])
    }

    const width = Math.max(...fields.map(([label]) => label.length)) + 1
    const lines = fields.map(([label, value]) => `${(label + ':').padEnd(width)}  ${value}`)

    if (metadata.icons.size > 0) {
        const rows = [...metadata.icons.values()].map(info => ({
            file:    info.filename,
            x:       info.position?.x,
            y:       info.position?.y,
            label:   info.labelColor === undefined ? undefined : labelColorName(info.labelColor),
            comment: info.comments,
        }))
        lines.push('', toGridString(rows))
    }

    return lines.join('\n')

}
