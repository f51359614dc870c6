import type { TViewStyle } from './DirectoryMetadata.js'

/** Field codes understood by the semantic layer. */
export const Code = {
    /** Window settings plist (bounds, sidebar, bars)   */ WindowSettings:     'bwsp',
    /** Legacy window rectangle and view                 */ WindowInfo:         'fwi0',
    /** Legacy sidebar width                             */ SidebarWidth:       'fwsw',
    /** View style                                       */ ViewStyle:          'vstl',
    /** Icon view settings plist                         */ IconViewSettings:   'icvp',
    /** Legacy icon view settings                        */ IconViewOptions:    'icvo',
    /** Icon view grid offset (diagnostics only)         */ IconGridOffset:     'icgo',
    /** Icon view scroll position (diagnostics only)     */ IconScrollPosition: 'icsp',
    /** List view settings plist                         */ ListViewSettings:   'lsvp',
    /** List view settings plist, alternate form         */ ListViewSettingsAlt:'lsvP',
    /** Legacy list view settings                        */ ListViewOptions:    'lsvo',
    /** Legacy background                                */ Background:         'BKGD',
    /** Background picture for the legacy background    */ BackgroundPicture:  'pict',
    /** Icon location                                    */ IconLocation:       'Iloc',
    /** Finder comment                                   */ Comments:           'cmmt',
    /** Label color                                      */ LabelColor:         'lclr',
    /** Sort / group-by key (ustr)                       */ SortBy:             'GRP0',
    /** Logical file size                                */ LogicalSize:        'lg1S',
    /** Legacy logical file size                         */ LogicalSizeLegacy:  'logS',
    /** Physical file size                               */ PhysicalSize:       'ph1S',
    /** Legacy physical file size                        */ PhysicalSizeLegacy: 'phyS',
    /** Modification date (dutc)                         */ ModificationDate:   'modD',
    /** Legacy modification date (dutc)                  */ ModificationDateLegacy: 'moDD',
} as const

export type TCode = typeof Code[keyof typeof Code]

const VIEW_STYLES: ReadonlyArray<readonly [TViewStyle, string]> = [
    ['Icon',      'icnv'],
    ['List',      'Nlsv'],
    ['Column',    'clmv'],
    ['Gallery',   'glyv'],
    ['Coverflow', 'Flwv'],
]

export function viewStyleFromCode(code: string): TViewStyle | undefined {
    return VIEW_STYLES.find(([, known]) => known === code)?.[0]
}

export function viewStyleToCode(style: TViewStyle): string {
    return VIEW_STYLES.find(([known]) => known === style)?.[1] ?? 'icnv'
}

export type TSortKey =
    | 'name' | 'dateModified' | 'dateCreated' | 'dateAdded' | 'dateLastOpened'
    | 'size' | 'kind' | 'label' | 'version' | 'comments'

const SORT_COLUMNS: ReadonlyArray<readonly [string, TSortKey]> = [
    ['name',            'name'],
    ['dateModified',    'dateModified'],
    ['modificationDate','dateModified'],
    ['dateCreated',     'dateCreated'],
    ['creationDate',    'dateCreated'],
    ['dateAdded',       'dateAdded'],
    ['dateLastOpened',  'dateLastOpened'],
    ['size',            'size'],
    ['kind',            'kind'],
    ['label',           'label'],
    ['version',         'version'],
    ['comments',        'comments'],
]

/** Maps a list view column identifier to the attribute a viewer sorts by. */
export function sortKeyForColumn(column: string): TSortKey | undefined {
    return SORT_COLUMNS.find(([known]) => known === column)?.[1]
}
